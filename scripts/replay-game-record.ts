#!/usr/bin/env ts-node
/**
 * Replay a CSA game record and print the final board diagram.
 *
 * Usage:
 *   npm run replay -- path/to/game.csa [--moves]
 *
 *   --moves   also print the move list
 */

import * as fs from 'fs';
import { encodeBoardDiagram } from '../src/shared/engine/codecs/boardDiagram';
import { decodeGameRecord, finalPosition } from '../src/shared/engine/codecs/gameRecord';
import { formatMove, formatMoveList } from '../src/shared/engine/notation';
import { logger } from '../src/server/utils/logger';

function main(): void {
  const argv = process.argv.slice(2);
  const showMoves = argv.includes('--moves');
  const file = argv.find((arg) => !arg.startsWith('--'));
  if (!file) {
    throw new Error('Usage: replay-game-record <file.csa> [--moves]');
  }

  const record = decodeGameRecord(fs.readFileSync(file, 'utf8'));
  logger.info('Game record replayed', {
    file,
    moves: record.moves.length,
    sente: record.names.sente,
    gote: record.names.gote,
  });

  if (showMoves) {
    for (const line of formatMoveList(record.moves)) console.log(line);
  }
  const last = finalPosition(record);
  if (last) console.log(encodeBoardDiagram(last));
  if (record.result) console.log(formatMove(record.result));
}

try {
  main();
} catch (error) {
  logger.error('Game record replay failed', { error });
  process.exitCode = 1;
}
