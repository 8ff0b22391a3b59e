import { Maze, config, resetWarnings } from '../../src/mazecraft';

describe('Runtime warnings', () => {
  const defaults = { ...config };
  let warn: jest.SpyInstance;

  beforeEach(() => {
    resetWarnings();
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });
  afterEach(() => {
    Object.assign(config, defaults);
    warn.mockRestore();
  });

  describe('Scenario: warnings disabled (default)', () => {
    it('stays silent for a zero-sized maze', () => {
      new Maze(0, 3, { seed: 1 });
      expect(warn).not.toHaveBeenCalled();
    });
  });

  describe('Scenario: warnings enabled', () => {
    beforeEach(() => {
      config.warnings = true;
    });
    it('warns about a zero-sized maze', () => {
      new Maze(0, 3, { seed: 1 });
      expect(warn).toHaveBeenCalledWith(
        '[mazecraft] Created a 0x3 maze; it has no cells and cannot be stepped.'
      );
    });
    it('warns only once per condition', () => {
      new Maze(0, 3, { seed: 1 });
      new Maze(4, 0, { seed: 1 });
      expect(warn).toHaveBeenCalledTimes(1);
    });
    it('warns about unbounded generation above largeMazeCells', () => {
      config.largeMazeCells = 3;
      Maze.fromSeed(2, 2, 0).generate();
      expect(warn).toHaveBeenCalledWith(
        '[mazecraft] Generating 4 cells in one call; pass a step limit to spread the work.'
      );
    });
    it('does not warn when a step limit is given', () => {
      config.largeMazeCells = 3;
      Maze.fromSeed(2, 2, 0).generate(100);
      expect(warn).not.toHaveBeenCalled();
    });
    it('does not warn at or below the threshold', () => {
      config.largeMazeCells = 4;
      Maze.fromSeed(2, 2, 0).generate();
      expect(warn).not.toHaveBeenCalled();
    });
  });
});
