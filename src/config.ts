/**
 * Global mazecraft configuration contract & default instance.
 *
 * A central `config` object gives end-users (and tests) one documented place to
 * tweak library behaviour without digging through scattered constants.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'mazecraft-ts';
 *   config.warnings = true;          // enable runtime warnings
 *   config.largeMazeCells = 250_000; // warn earlier on unbounded generate()
 *
 * Adjust BEFORE constructing mazes so that construction-time checks read the
 * intended values.
 */
export interface MazecraftConfig {
  /**
   * Emit guidance warnings (zero-sized mazes, unbounded generation of very
   * large grids) through `console.warn`. Each warning is emitted once.
   * Default: false
   */
  warnings: boolean;

  /**
   * Cell count above which an unbounded `generate()` call warns that it will
   * run the whole maze in a single synchronous call.
   * Default: 1_000_000
   */
  largeMazeCells: number;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: MazecraftConfig = {
  warnings: false, // emit runtime guidance
  largeMazeCells: 1_000_000, // unbounded generate() warning threshold
};
