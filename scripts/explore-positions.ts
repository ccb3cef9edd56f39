#!/usr/bin/env ts-node
/**
 * Depth-bounded position enumeration.
 *
 * Usage:
 *   npm run explore -- [options]
 *
 * Options:
 *   --depth=N          Plies to explore (default: SHOGI_EXPLORATION_MAX_DEPTH)
 *   --maxPositions=N   Stop after N discovered positions
 *   --timeoutMs=N      Wall-clock budget
 *   --diagram=path     Start from a board diagram instead of the even-game position
 */

import * as fs from 'fs';
import { decodeBoardDiagram } from '../src/shared/engine/codecs/boardDiagram';
import { createStartingPosition } from '../src/shared/engine/initialState';
import type { Position } from '../src/shared/engine/position';
import { runExploration } from '../src/server/analysis/explorationRunner';
import type { ExplorationRunOptions } from '../src/server/analysis/explorationRunner';
import { logger } from '../src/server/utils/logger';

interface Args extends ExplorationRunOptions {
  diagramPath?: string;
}

function positiveInt(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${flag} expects a positive integer, got "${raw}"`);
  }
  return value;
}

function parseArgs(argv: string[]): Args {
  const args: Args = {};
  for (const arg of argv) {
    if (arg.startsWith('--depth=')) {
      args.maxDepth = positiveInt('--depth', arg.slice('--depth='.length));
    } else if (arg.startsWith('--maxPositions=')) {
      args.maxPositions = positiveInt('--maxPositions', arg.slice('--maxPositions='.length));
    } else if (arg.startsWith('--timeoutMs=')) {
      args.timeoutMs = positiveInt('--timeoutMs', arg.slice('--timeoutMs='.length));
    } else if (arg.startsWith('--diagram=')) {
      args.diagramPath = arg.slice('--diagram='.length);
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return args;
}

function loadRoot(diagramPath: string | undefined): Position {
  if (!diagramPath) return createStartingPosition();
  return decodeBoardDiagram(fs.readFileSync(diagramPath, 'utf8'));
}

async function main(): Promise<void> {
  const { diagramPath, ...options } = parseArgs(process.argv.slice(2));
  const root = loadRoot(diagramPath);
  const report = await runExploration(root, options);

  report.result.countsByDepth.forEach((count, index) => {
    console.log(`depth ${index + 1}: ${count}`);
  });
  console.log(`total: ${report.result.positions.length} (${report.outcome})`);
}

main().catch((error: unknown) => {
  logger.error('Position exploration failed', { error });
  process.exitCode = 1;
});
