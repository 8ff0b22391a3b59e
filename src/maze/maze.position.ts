/** Grid coordinate. Value type: two positions are the same when x and y match. */
export interface Position {
  readonly x: number;
  readonly y: number;
}

/** The four orthogonal moves available to the traversal. */
export enum Direction {
  Left = 'left',
  Right = 'right',
  Top = 'top',
  Bottom = 'bottom',
}

/** Candidate order before shuffling. */
export const DIRECTIONS: readonly Direction[] = [
  Direction.Left,
  Direction.Right,
  Direction.Top,
  Direction.Bottom,
];

/**
 * The position one cell away from `pos` in direction `dir`. May lie outside the grid;
 * see {@link neighbourIn} for the bounded variant.
 */
export function stepIn(pos: Position, dir: Direction): Position {
  switch (dir) {
    case Direction.Left:
      return { x: pos.x - 1, y: pos.y };
    case Direction.Right:
      return { x: pos.x + 1, y: pos.y };
    case Direction.Top:
      return { x: pos.x, y: pos.y - 1 };
    case Direction.Bottom:
      return { x: pos.x, y: pos.y + 1 };
  }
}

/**
 * Neighbour of `pos` in direction `dir`, or `undefined` when it falls outside a
 * `width`×`height` grid.
 */
export function neighbourIn(
  pos: Position,
  dir: Direction,
  width: number,
  height: number
): Position | undefined {
  const next = stepIn(pos, dir);
  if (next.x < 0 || next.y < 0 || next.x >= width || next.y >= height) {
    return undefined;
  }
  return next;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}
