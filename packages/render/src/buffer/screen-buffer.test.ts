import { describe, it, expect } from 'vitest';
import { ScreenBuffer } from './screen-buffer.js';

describe('ScreenBuffer', () => {
  it('starts fully dirty and blank', () => {
    const buffer = new ScreenBuffer(3, 2);

    expect(buffer.rowText(0)).toBe('   ');
    expect(buffer.getDirtyRuns().map((run) => [run.x, run.y, run.cells.length])).toEqual([
      [0, 0, 3],
      [0, 1, 3],
    ]);
  });

  it('groups changed cells into runs per row', () => {
    const buffer = new ScreenBuffer(6, 2);
    buffer.clearDirty();

    buffer.writeText(1, 0, 'ab');
    buffer.setCell(4, 0, { char: 'c' });
    buffer.setCell(0, 1, { char: ' ' });

    expect(buffer.getDirtyRuns().map((run) => [run.x, run.y, run.cells.map((cell) => cell.char).join('')])).toEqual([
      [1, 0, 'ab'],
      [4, 0, 'c'],
    ]);
  });

  it('clips writes to the buffer', () => {
    const buffer = new ScreenBuffer(3, 1);

    buffer.writeText(1, 0, 'xyz');
    buffer.setCell(-1, 0, { char: 'q' });
    buffer.setCell(0, 5, { char: 'q' });

    expect(buffer.rowText(0)).toBe(' xy');
    expect(buffer.getCell(3, 0)).toBeNull();
  });

  it('marks only differing cells when blitting', () => {
    const target = new ScreenBuffer(3, 1);
    target.writeText(0, 0, 'abc');
    target.clearDirty();

    const source = new ScreenBuffer(3, 1);
    source.writeText(0, 0, 'abd');
    target.blit(source);

    expect(target.getDirtyRuns().map((run) => [run.x, run.cells.length])).toEqual([[2, 1]]);
    expect(target.rowText(0)).toBe('abd');
  });
});
