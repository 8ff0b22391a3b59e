import Maze from './maze/maze';
import MazeGrid from './maze/maze.grid';
import { config } from './config';

export { Maze, MazeGrid, config };
export type { MazeOptions, MazeStats } from './maze/maze';
export type { MazecraftConfig } from './config';
export {
  MazeCell,
  CELL_VISITED,
  CELL_RIGHT_WALL,
  CELL_BOTTOM_WALL,
  DEFAULT_CELL_BITS,
  hasFlag,
  withFlag,
} from './maze/maze.cell';
export { Direction, DIRECTIONS, stepIn, neighbourIn, samePosition } from './maze/maze.position';
export type { Position } from './maze/maze.position';
export { createRandom, normalizeSeed, shuffleInPlace } from './maze/maze.random';
export type { RandomFn, MazeSeed } from './maze/maze.random';
export { resetWarnings } from './utils/warnings';
