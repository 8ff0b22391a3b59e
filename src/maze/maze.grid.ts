import { DEFAULT_CELL_BITS, MazeCell, hasFlag, withFlag } from './maze.cell';

/**
 * Flat cell store for a fixed-size maze.
 *
 * Cells live in one `Uint8Array` of `width * height` packed bytes, row-major, addressed
 * by `x + y * width`. The store is sized once and never reallocated.
 *
 * Public accessors validate coordinates and throw `RangeError` on a miss: an
 * out-of-range coordinate is a defect in the calling code. The `*Unchecked`
 * variants skip the test and are reserved for the traversal, which only visits
 * in-bounds positions.
 */
export default class MazeGrid {
  readonly width: number;
  readonly height: number;
  private readonly cells: Uint8Array;

  /**
   * @param width Column count, a non-negative integer (zero gives an empty store).
   * @param height Row count, a non-negative integer (zero gives an empty store).
   */
  constructor(width: number, height: number) {
    assertDimension('width', width);
    assertDimension('height', height);
    const size = width * height;
    if (!Number.isSafeInteger(size)) {
      throw new RangeError(`Maze of ${width}x${height} cells is too large`);
    }
    this.width = width;
    this.height = height;
    this.cells = new Uint8Array(size).fill(DEFAULT_CELL_BITS);
  }

  /** Number of cells in the store. */
  get size(): number {
    return this.cells.length;
  }

  /** True when either dimension is zero. */
  get isEmpty(): boolean {
    return this.cells.length === 0;
  }

  /** True when (x, y) addresses an allocated cell. */
  contains(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      y >= 0 &&
      x < this.width &&
      y < this.height
    );
  }

  /** Linear offset of (x, y). Throws `RangeError` when out of bounds. */
  offsetOf(x: number, y: number): number {
    this.assertInBounds(x, y);
    return x + y * this.width;
  }

  /** Copy of the cell at (x, y). */
  cellAt(x: number, y: number): MazeCell {
    return new MazeCell(this.cells[this.offsetOf(x, y)]);
  }

  /** Packed byte at (x, y). */
  bitsAt(x: number, y: number): number {
    return this.cells[this.offsetOf(x, y)];
  }

  /** @internal */
  hasFlagUnchecked(x: number, y: number, mask: number): boolean {
    return hasFlag(this.cells[x + y * this.width], mask);
  }

  /** @internal */
  setFlagUnchecked(x: number, y: number, mask: number, on: boolean): void {
    const offset = x + y * this.width;
    this.cells[offset] = withFlag(this.cells[offset], mask, on);
  }

  /**
   * Zero-copy view of the backing store. Callers must treat it as read-only; writes
   * through the view bypass the traversal and can break the maze invariants.
   */
  view(): Readonly<Uint8Array> {
    return this.cells;
  }

  /** Single copy of the backing store. */
  snapshot(): Uint8Array {
    return this.cells.slice();
  }

  private assertInBounds(x: number, y: number): void {
    if (!this.contains(x, y)) {
      throw new RangeError(
        `Cell (${x}, ${y}) is outside the ${this.width}x${this.height} maze`
      );
    }
  }
}

function assertDimension(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Maze ${name} must be a non-negative integer, got ${value}`);
  }
}
