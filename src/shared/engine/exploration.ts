import type { CancellationToken } from '../utils/cancellation';
import { applyMove } from './movementApplication';
import { generateMoves } from './movementLogic';
import type { Position } from './position';

/**
 * Depth-bounded enumeration of future positions.
 *
 * Exploration is an explicit FIFO worklist of (position, depth) entries, so
 * stack depth stays constant, the depth cap is enforced per entry and a
 * host can run the work in slices via {@link PositionExplorer.step}.
 *
 * There is no memoisation or cycle detection: a position reached along two
 * different move orders is expanded twice. Cost grows as
 * branching_factor^depth; callers must bound `maxDepth`.
 */

export interface ExplorationOptions {
  /** Plies to look ahead; 1 yields exactly the successors of the root. */
  maxDepth: number;
  /** Stop (with `truncated = true`) once this many positions are discovered. */
  maxPositions?: number;
  /** Checked before each worklist item is expanded. */
  token?: CancellationToken;
}

export interface ExplorationResult {
  /** Every discovered position in discovery order, root excluded. */
  positions: Position[];
  /** `countsByDepth[d - 1]` is the number of positions found at ply d. */
  countsByDepth: number[];
  /** True when `maxPositions` stopped the exploration early. */
  truncated: boolean;
}

interface WorkItem {
  position: Position;
  depth: number;
}

export class PositionExplorer {
  private readonly maxDepth: number;
  private readonly maxPositions: number;
  private readonly token: CancellationToken | undefined;
  private readonly queue: WorkItem[];
  private head = 0;
  private readonly positions: Position[] = [];
  private readonly countsByDepth: number[];
  private truncated = false;

  constructor(root: Position, options: ExplorationOptions) {
    if (!Number.isInteger(options.maxDepth) || options.maxDepth < 1) {
      throw new RangeError(`maxDepth must be a positive integer, got ${options.maxDepth}`);
    }
    this.maxDepth = options.maxDepth;
    this.maxPositions = options.maxPositions ?? Number.POSITIVE_INFINITY;
    this.token = options.token;
    this.queue = [{ position: root, depth: 0 }];
    this.countsByDepth = new Array<number>(options.maxDepth).fill(0);
  }

  /** True while worklist items remain and no cap has been hit. */
  get hasPendingWork(): boolean {
    return !this.truncated && this.head < this.queue.length;
  }

  /** Number of positions discovered so far. */
  get discovered(): number {
    return this.positions.length;
  }

  /**
   * Expand at most `budget` worklist items. Returns true while work remains.
   * Throws the token's CanceledError when cancellation is observed.
   */
  step(budget: number): boolean {
    let processed = 0;
    while (processed < budget && this.hasPendingWork) {
      this.token?.throwIfCanceled('position exploration');
      const item = this.queue[this.head];
      this.head += 1;
      processed += 1;
      if (item) this.expand(item);
    }
    // Release expanded entries so long runs do not hold every parent.
    if (this.head > 4096) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }
    return this.hasPendingWork;
  }

  /** Drain the worklist synchronously. */
  run(): ExplorationResult {
    while (this.step(Number.POSITIVE_INFINITY)) {
      // step() drains until empty or truncated
    }
    return this.result();
  }

  result(): ExplorationResult {
    return {
      positions: [...this.positions],
      countsByDepth: [...this.countsByDepth],
      truncated: this.truncated,
    };
  }

  private expand(item: WorkItem): void {
    const depth = item.depth + 1;
    for (const move of generateMoves(item.position)) {
      const next = applyMove(item.position, move);
      if (!next) continue;
      if (this.positions.length >= this.maxPositions) {
        this.truncated = true;
        return;
      }
      this.positions.push(next);
      this.countsByDepth[depth - 1] = (this.countsByDepth[depth - 1] ?? 0) + 1;
      if (depth < this.maxDepth) {
        this.queue.push({ position: next, depth });
      }
    }
  }
}

/**
 * Enumerate every position reachable within `options.maxDepth` plies.
 */
export function explorePositions(root: Position, options: ExplorationOptions): ExplorationResult {
  return new PositionExplorer(root, options).run();
}
