/**
 * Packed maze cell representation.
 *
 * Each cell is a single byte holding three independent flags:
 *  - bit 0 `visited`: the traversal has entered the cell.
 *  - bit 1 `right`: the edge to the right-hand neighbour is still closed.
 *  - bit 2 `bottom`: the edge to the neighbour below is still closed.
 *
 * Wall ownership is asymmetric: the edge between (x,y) and (x+1,y) is stored only in
 * (x,y)'s `right` bit, the edge between (x,y) and (x,y+1) only in (x,y)'s `bottom` bit.
 * There is no left or top wall. The outer boundary is therefore the `right` bits of the
 * last column plus the `bottom` bits of the last row, and generation never clears them.
 *
 * @module maze.cell
 */

/** Mask of the `visited` flag. */
export const CELL_VISITED = 0b001;
/** Mask of the right-wall flag. */
export const CELL_RIGHT_WALL = 0b010;
/** Mask of the bottom-wall flag. */
export const CELL_BOTTOM_WALL = 0b100;
/** Fresh cell: not visited, both owned walls closed. */
export const DEFAULT_CELL_BITS = CELL_RIGHT_WALL | CELL_BOTTOM_WALL;

/** True when every bit of `mask` is set in `bits`. */
export function hasFlag(bits: number, mask: number): boolean {
  return (bits & mask) === mask;
}

/** Return `bits` with `mask` set (`on`) or cleared, truncated to a byte. */
export function withFlag(bits: number, mask: number, on: boolean): number {
  return (on ? bits | mask : bits & ~mask) & 0xff;
}

/**
 * Value copy of one cell. Flags are independently settable; no cross-flag rule is
 * enforced here (the wall-ownership convention is maintained by the traversal).
 *
 * @example
 * const cell = new MazeCell();
 * cell.visited = true;
 * cell.bits; // 0b111
 */
export class MazeCell {
  private _bits: number;

  constructor(bits: number = DEFAULT_CELL_BITS) {
    this._bits = bits & 0xff;
  }

  /** Packed byte. */
  get bits(): number {
    return this._bits;
  }

  get visited(): boolean {
    return hasFlag(this._bits, CELL_VISITED);
  }
  set visited(on: boolean) {
    this._bits = withFlag(this._bits, CELL_VISITED, on);
  }

  /** Right-hand edge closed. */
  get right(): boolean {
    return hasFlag(this._bits, CELL_RIGHT_WALL);
  }
  set right(on: boolean) {
    this._bits = withFlag(this._bits, CELL_RIGHT_WALL, on);
  }

  /** Lower edge closed. */
  get bottom(): boolean {
    return hasFlag(this._bits, CELL_BOTTOM_WALL);
  }
  set bottom(on: boolean) {
    this._bits = withFlag(this._bits, CELL_BOTTOM_WALL, on);
  }

  clone(): MazeCell {
    return new MazeCell(this._bits);
  }

  equals(other: MazeCell): boolean {
    return this._bits === other._bits;
  }

  /** Plain-object form, handy for logging and test assertions. */
  toJSON(): { visited: boolean; right: boolean; bottom: boolean } {
    return { visited: this.visited, right: this.right, bottom: this.bottom };
  }
}
