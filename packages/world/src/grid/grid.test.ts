import { describe, it, expect } from 'vitest';
import { Grid } from './grid.js';
import { Entity } from '../entity/entity.js';
import {
  AlreadyPlacedError,
  CellOccupiedError,
  InvariantViolationError,
  OutOfBoundsError,
  isGridError,
} from '../errors.js';

function makeEntity(id: string): Entity {
  return new Entity({ id, name: id, kind: 'npc', color: [1, 2, 3] });
}

describe('Grid', () => {
  it('addresses tiles by column and row', () => {
    const grid = new Grid(4, 3);
    const tile = grid.tileAt(3, 2);

    expect(tile.col).toBe(3);
    expect(tile.row).toBe(2);
    expect(tile.id).toBe(11);
    expect(grid.tileById(11)).toBe(tile);
    expect(grid.coordOf(5)).toEqual({ col: 1, row: 1 });
  });

  it('rejects coordinates outside the grid', () => {
    const grid = new Grid(4, 3);

    expect(() => grid.tileAt(4, 0)).toThrow(OutOfBoundsError);
    expect(() => grid.tileAt(0, -1)).toThrow(OutOfBoundsError);
    expect(() => grid.tileById(12)).toThrow(OutOfBoundsError);
    expect(grid.inBounds(3, 2)).toBe(true);
    expect(grid.inBounds(1.5, 0)).toBe(false);

    try {
      grid.tileAt(-1, 7);
    } catch (error) {
      expect(isGridError(error)).toBe(true);
      if (isGridError(error)) {
        expect(error.code).toBe('OUT_OF_BOUNDS');
        expect(error.message).toBe('(-1,7) is outside the 4x3 grid');
      }
    }
  });

  it('rejects invalid sizes', () => {
    expect(() => new Grid(0, 5)).toThrow(RangeError);
    expect(() => new Grid(3, 2.5)).toThrow(RangeError);
  });

  it('sets both sides of the occupancy link on place', () => {
    const grid = new Grid(5, 5);
    const entity = makeEntity('a');

    const tile = grid.place(entity, 2, 3);

    expect(tile.occupant).toBe('a');
    expect(entity.occupiedTile).toBe(tile.id);
    expect(() => grid.verifyOccupancy([entity])).not.toThrow();
  });

  it('refuses to place onto an occupied tile', () => {
    const grid = new Grid(5, 5);
    const a = makeEntity('a');
    const b = makeEntity('b');
    grid.place(a, 1, 1);

    expect(() => grid.place(b, 1, 1)).toThrow(CellOccupiedError);
    expect(b.occupiedTile).toBeNull();
    expect(grid.tileAt(1, 1).occupant).toBe('a');
  });

  it('refuses to place an entity that is already on the grid', () => {
    const grid = new Grid(5, 5);
    const a = makeEntity('a');
    grid.place(a, 1, 1);

    expect(() => grid.place(a, 2, 2)).toThrow(AlreadyPlacedError);
    expect(grid.tileAt(2, 2).occupant).toBeNull();
    expect(a.occupiedTile).toBe(grid.tileIdOf(1, 1));
  });

  it('refuses to place out of bounds', () => {
    const grid = new Grid(5, 5);
    const a = makeEntity('a');

    expect(() => grid.place(a, 5, 0)).toThrow(OutOfBoundsError);
    expect(a.occupiedTile).toBeNull();
  });

  it('vacates only the tile side', () => {
    const grid = new Grid(5, 5);
    const a = makeEntity('a');
    const tile = grid.place(a, 0, 0);

    expect(grid.vacate(tile)).toBe('a');
    expect(tile.occupant).toBeNull();
    expect(a.occupiedTile).toBe(tile.id);
    expect(() => grid.verifyOccupancy([a])).toThrow(InvariantViolationError);
  });

  it('removes an entity from both sides', () => {
    const grid = new Grid(5, 5);
    const a = makeEntity('a');
    const tile = grid.place(a, 4, 4);

    expect(grid.remove(a)).toBe(tile);
    expect(tile.occupant).toBeNull();
    expect(a.occupiedTile).toBeNull();
    expect(grid.remove(a)).toBeNull();
  });

  it('relocates atomically', () => {
    const grid = new Grid(5, 5);
    const a = makeEntity('a');
    grid.place(a, 1, 1);

    const { from, to } = grid.relocate(a, 2, 1);

    expect(from.occupant).toBeNull();
    expect(to.occupant).toBe('a');
    expect(a.occupiedTile).toBe(to.id);
    expect(grid.countOccupied()).toBe(1);
  });

  it('leaves both entities untouched when relocating onto an occupied tile', () => {
    const grid = new Grid(5, 5);
    const a = makeEntity('a');
    const b = makeEntity('b');
    grid.place(a, 1, 1);
    grid.place(b, 2, 1);

    expect(() => grid.relocate(a, 2, 1)).toThrow(CellOccupiedError);
    expect(grid.tileAt(1, 1).occupant).toBe('a');
    expect(grid.tileAt(2, 1).occupant).toBe('b');
    expect(a.occupiedTile).toBe(grid.tileIdOf(1, 1));
    expect(b.occupiedTile).toBe(grid.tileIdOf(2, 1));
  });

  it('detects a tile pointing at an entity that points elsewhere', () => {
    const grid = new Grid(3, 3);
    const a = makeEntity('a');
    grid.place(a, 0, 0);
    grid.tileAt(2, 2).occupant = 'a';

    expect(() => grid.verifyOccupancy([a])).toThrow(InvariantViolationError);
  });

  it('iterates a window bottom row first and clips it to the grid', () => {
    const grid = new Grid(3, 3);
    const coords = Array.from(grid.tilesIn({ minCol: 1, maxCol: 5, minRow: -2, maxRow: 1 }), (t) => [
      t.col,
      t.row,
    ]);

    expect(coords).toEqual([
      [1, 0],
      [2, 0],
      [1, 1],
      [2, 1],
    ]);
  });
});
