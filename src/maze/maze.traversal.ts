import type MazeGrid from './maze.grid';
import { CELL_BOTTOM_WALL, CELL_RIGHT_WALL, CELL_VISITED } from './maze.cell';
import { DIRECTIONS, Direction, Position, neighbourIn } from './maze.position';
import { RandomFn, shuffleInPlace } from './maze.random';

/**
 * Randomized depth-first traversal with backtracking.
 *
 * The traversal owns a cursor, a stack of visited positions (the "tail") and a random
 * source. Each call to {@link stepTraversal} performs one atomic move:
 *
 *  1. Shuffle Left/Right/Top/Bottom.
 *  2. Pick the first direction whose neighbour is in bounds and not yet visited.
 *  3. Move: open the wall owned by whichever cell is left of / above the crossed edge,
 *     mark the neighbour visited and push it.
 *  4. Dead end: pop the tail and jump back to the popped position. Once the tail is
 *     empty every further call reports completion and leaves the state untouched.
 *
 * A full run over W×H cells takes exactly 2·W·H steps: W·H − 1 moves, W·H pops and
 * the final completion report.
 *
 * @module maze.traversal
 */

/** Mutable traversal state. */
export interface TraversalState {
  cursor: Position;
  /** Backtracking stack; bottom entry is the start cell. */
  readonly tail: Position[];
  random: RandomFn;
  /** Calls to stepTraversal, including ones that only report completion. */
  steps: number;
  /** Forward moves into a new cell. */
  moves: number;
  /** Tail pops. */
  backtracks: number;
  /** Cells marked visited so far, start cell included. */
  visited: number;
  complete: boolean;
}

/**
 * Prepare a grid and a fresh traversal state: mark (0,0) visited and seed the tail
 * with it. An empty grid keeps its (unusable) cursor at (0,0) with nothing marked.
 */
export function createTraversal(grid: MazeGrid, random: RandomFn): TraversalState {
  const start: Position = { x: 0, y: 0 };
  if (!grid.isEmpty) grid.setFlagUnchecked(0, 0, CELL_VISITED, true);
  return {
    cursor: start,
    tail: [start],
    random,
    steps: 0,
    moves: 0,
    backtracks: 0,
    visited: grid.isEmpty ? 0 : 1,
    complete: false,
  };
}

interface Move {
  dir: Direction;
  to: Position;
}

/** First shuffled direction leading to an unvisited in-bounds neighbour. */
function pickMove(grid: MazeGrid, state: TraversalState): Move | undefined {
  const order = shuffleInPlace(DIRECTIONS.slice(), state.random);
  for (const dir of order) {
    const to = neighbourIn(state.cursor, dir, grid.width, grid.height);
    if (!to) continue;
    if (grid.hasFlagUnchecked(to.x, to.y, CELL_VISITED)) continue;
    return { dir, to };
  }
  return undefined;
}

/**
 * Advance the traversal by one move.
 *
 * @returns true iff the maze is fully generated.
 */
export function stepTraversal(grid: MazeGrid, state: TraversalState): boolean {
  if (grid.isEmpty) {
    throw new Error(
      `Cannot step a ${grid.width}x${grid.height} maze: it has no cells`
    );
  }
  if (state.complete) return true;
  state.steps++;

  const move = pickMove(grid, state);
  if (!move) {
    const previous = state.tail.pop();
    if (!previous) {
      state.complete = true;
      return true;
    }
    state.cursor = previous;
    state.backtracks++;
    return false;
  }

  const from = state.cursor;
  const { to } = move;
  // the crossed edge belongs to the cell on its left / upper side
  switch (move.dir) {
    case Direction.Right:
      grid.setFlagUnchecked(from.x, from.y, CELL_RIGHT_WALL, false);
      break;
    case Direction.Bottom:
      grid.setFlagUnchecked(from.x, from.y, CELL_BOTTOM_WALL, false);
      break;
    case Direction.Left:
      grid.setFlagUnchecked(to.x, to.y, CELL_RIGHT_WALL, false);
      break;
    case Direction.Top:
      grid.setFlagUnchecked(to.x, to.y, CELL_BOTTOM_WALL, false);
      break;
  }
  grid.setFlagUnchecked(to.x, to.y, CELL_VISITED, true);
  state.cursor = to;
  state.tail.push(to);
  state.moves++;
  state.visited++;
  return false;
}
