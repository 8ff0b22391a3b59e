import {
  CELL_BOTTOM_WALL,
  CELL_RIGHT_WALL,
  CELL_VISITED,
  DEFAULT_CELL_BITS,
  MazeCell,
  hasFlag,
  withFlag,
} from '../../src/maze/maze.cell';

describe('MazeCell', () => {
  describe('Scenario: default cell', () => {
    const cell = new MazeCell();
    it('packs right and bottom walls only', () => {
      expect(cell.bits).toBe(0b110);
    });
    it('is not visited', () => {
      expect(cell.visited).toBe(false);
    });
    it('has a closed right wall', () => {
      expect(cell.right).toBe(true);
    });
    it('has a closed bottom wall', () => {
      expect(cell.bottom).toBe(true);
    });
    it('matches DEFAULT_CELL_BITS', () => {
      expect(DEFAULT_CELL_BITS).toBe(CELL_RIGHT_WALL | CELL_BOTTOM_WALL);
    });
  });

  describe('Scenario: independent flag writes', () => {
    it('setting visited keeps both walls', () => {
      // Arrange
      const cell = new MazeCell();
      // Act
      cell.visited = true;
      // Assert
      expect(cell.bits).toBe(0b111);
    });
    it('clearing right leaves bottom closed', () => {
      const cell = new MazeCell();
      cell.right = false;
      expect(cell.toJSON()).toEqual({ visited: false, right: false, bottom: true });
    });
    it('clearing bottom leaves right closed', () => {
      const cell = new MazeCell();
      cell.bottom = false;
      expect(cell.bits).toBe(CELL_RIGHT_WALL);
    });
    it('allows any flag combination', () => {
      const cell = new MazeCell(0);
      cell.visited = true;
      cell.bottom = true;
      expect(cell.bits).toBe(CELL_VISITED | CELL_BOTTOM_WALL);
    });
  });

  describe('Scenario: value semantics', () => {
    it('clone is independent of the original', () => {
      const original = new MazeCell();
      const copy = original.clone();
      copy.visited = true;
      expect(original.visited).toBe(false);
    });
    it('equals compares packed bits', () => {
      expect(new MazeCell(5).equals(new MazeCell(5))).toBe(true);
    });
    it('cells with different bits are not equal', () => {
      expect(new MazeCell(5).equals(new MazeCell(7))).toBe(false);
    });
    it('truncates constructor input to a byte', () => {
      expect(new MazeCell(0x107).bits).toBe(7);
    });
  });

  describe('bit helpers', () => {
    it('hasFlag detects a set mask', () => {
      expect(hasFlag(0b101, CELL_BOTTOM_WALL)).toBe(true);
    });
    it('hasFlag rejects an unset mask', () => {
      expect(hasFlag(0b101, CELL_RIGHT_WALL)).toBe(false);
    });
    it('withFlag sets a mask', () => {
      expect(withFlag(0, CELL_BOTTOM_WALL, true)).toBe(4);
    });
    it('withFlag clears a mask', () => {
      expect(withFlag(7, CELL_VISITED, false)).toBe(6);
    });
  });
});
