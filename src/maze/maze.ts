import { config } from '../config';
import { warnOnce } from '../utils/warnings';
import type { MazeCell } from './maze.cell';
import MazeGrid from './maze.grid';
import type { Position } from './maze.position';
import { MazeSeed, RandomFn, createRandom } from './maze.random';
import { TraversalState, createTraversal, stepTraversal } from './maze.traversal';

/** Construction options for {@link Maze}. */
export interface MazeOptions {
  /** Deterministic seed (unsigned 64-bit after reduction). Omit for entropy seeding. */
  seed?: MazeSeed;
  /**
   * Custom random source returning floats in [0, 1). Takes precedence over `seed`.
   * Useful to inject a deterministic stub in tests or tooling.
   */
  random?: RandomFn;
}

/** Progress counters returned by {@link Maze.stats}. */
export interface MazeStats {
  /** step() calls that did work, the completing one included. */
  steps: number;
  moves: number;
  backtracks: number;
  /** Cells visited so far. */
  visited: number;
  /** Current tail depth. */
  tailLength: number;
  complete: boolean;
}

/**
 * A perfect maze generated by randomized depth-first traversal.
 *
 * Dimensions are fixed at construction. Generation is driven by the caller, either
 * one move at a time ({@link step}, for animation) or in bulk ({@link generate}).
 * All state survives between calls, so a paused generation resumes where it stopped.
 *
 * @example
 * const maze = Maze.fromSeed(16, 9, 42n);
 * maze.generate();
 * maze.cellAt(3, 4).right; // is the edge (3,4)-(4,4) closed?
 *
 * @example
 * // animate one move per frame
 * const maze = new Maze(32, 32);
 * const tick = () => { if (!maze.step()) requestAnimationFrame(tick); draw(maze.cellsView()); };
 */
export default class Maze {
  private readonly grid: MazeGrid;
  private readonly traversal: TraversalState;

  /**
   * @param width Column count. Zero is accepted but the maze cannot be stepped.
   * @param height Row count. Zero is accepted but the maze cannot be stepped.
   * @param options Seed or random source; unseeded when omitted.
   */
  constructor(width: number, height: number, options: MazeOptions = {}) {
    this.grid = new MazeGrid(width, height);
    const random = options.random ?? createRandom(options.seed);
    this.traversal = createTraversal(this.grid, random);
    if (this.grid.isEmpty) {
      warnOnce(
        'empty-maze',
        `Created a ${width}x${height} maze; it has no cells and cannot be stepped.`
      );
    }
  }

  /** Deterministic construction: the same dimensions and seed reproduce the same maze. */
  static fromSeed(width: number, height: number, seed: MazeSeed): Maze {
    return new Maze(width, height, { seed });
  }

  get width(): number {
    return this.grid.width;
  }

  get height(): number {
    return this.grid.height;
  }

  /** Copy of the cell at (x, y). Throws `RangeError` when out of bounds. */
  cellAt(x: number, y: number): MazeCell {
    return this.grid.cellAt(x, y);
  }

  /** Linear index of (x, y) into {@link cellsView}. */
  offsetOf(x: number, y: number): number {
    return this.grid.offsetOf(x, y);
  }

  /**
   * Zero-copy, row-major view of every packed cell (see `CELL_*` masks). Reflects
   * later generation steps. Read-only by contract.
   */
  cellsView(): Readonly<Uint8Array> {
    return this.grid.view();
  }

  /** Row-major copy of every packed cell. */
  copyCells(): Uint8Array {
    return this.grid.snapshot();
  }

  /** Current traversal position. */
  get cursor(): Position {
    return { ...this.traversal.cursor };
  }

  /** Copy of the backtracking stack, start cell first. */
  get tail(): readonly Position[] {
    return this.traversal.tail.map((pos) => ({ ...pos }));
  }

  /** True once a step has reported completion. */
  get isComplete(): boolean {
    return this.traversal.complete;
  }

  stats(): MazeStats {
    const t = this.traversal;
    return {
      steps: t.steps,
      moves: t.moves,
      backtracks: t.backtracks,
      visited: t.visited,
      tailLength: t.tail.length,
      complete: t.complete,
    };
  }

  /**
   * Advance generation by one move.
   *
   * @returns true iff the maze is fully generated. Further calls keep returning true
   * without touching any cell.
   */
  step(): boolean {
    return stepTraversal(this.grid, this.traversal);
  }

  /**
   * Run {@link step} until completion or until `limit` steps have been taken.
   *
   * @param limit Maximum number of steps; unbounded when omitted. `0` takes no step.
   * @returns true when generation completed within the budget, false when the budget
   * ran out first (call again to resume).
   */
  generate(limit?: number): boolean {
    if (limit === undefined) {
      if (this.grid.size > config.largeMazeCells) {
        warnOnce(
          'large-unbounded-generate',
          `Generating ${this.grid.size} cells in one call; pass a step limit to spread the work.`
        );
      }
      for (;;) {
        if (this.step()) return true;
      }
    }
    if (!Number.isSafeInteger(limit) || limit < 0) {
      throw new RangeError(`Step limit must be a non-negative integer, got ${limit}`);
    }
    for (let i = 0; i < limit; i++) {
      if (this.step()) return true;
    }
    return false;
  }
}
