import type { Cell, Color } from '@tilecrawl/protocol';
import { createCell, cellsEqual } from './cell.js';

/**
 * Screen buffer with per-cell damage tracking
 */
export class ScreenBuffer {
  private cells: Cell[];
  private dirty: boolean[];
  public readonly width: number;
  public readonly height: number;

  constructor(width: number, height: number) {
    this.width = Math.max(0, width);
    this.height = Math.max(0, height);
    const size = this.width * this.height;
    this.cells = Array.from({ length: size }, () => createCell());
    this.dirty = Array.from({ length: size }, () => true);
  }

  private indexOf(x: number, y: number): number {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
      return -1;
    }
    return y * this.width + x;
  }

  /**
   * Get cell at position (returns null if out of bounds)
   */
  getCell(x: number, y: number): Cell | null {
    return this.cells[this.indexOf(x, y)] ?? null;
  }

  /**
   * Set cell at position (no-op if out of bounds)
   */
  setCell(x: number, y: number, cell: Partial<Cell>): void {
    const index = this.indexOf(x, y);
    const current = this.cells[index];
    if (!current) return;

    const next = createCell({ ...current, ...cell });
    // Only mark dirty if actually changed
    if (!cellsEqual(current, next)) {
      this.cells[index] = next;
      this.dirty[index] = true;
    }
  }

  /**
   * Write text starting at position, clipped to the buffer width
   */
  writeText(x: number, y: number, text: string, fg?: Color): void {
    let offset = 0;
    for (const char of text) {
      if (x + offset >= this.width) break;
      this.setCell(x + offset, y, fg ? { char, fg } : { char });
      offset++;
    }
  }

  /**
   * Mark all cells as dirty (forces full redraw)
   */
  markAllDirty(): void {
    this.dirty.fill(true);
  }

  clearDirty(): void {
    this.dirty.fill(false);
  }

  /**
   * Dirty cells grouped into contiguous runs per row, top to bottom
   */
  getDirtyRuns(): Array<{ x: number; y: number; cells: Cell[] }> {
    const runs: Array<{ x: number; y: number; cells: Cell[] }> = [];

    for (let y = 0; y < this.height; y++) {
      let run: { x: number; y: number; cells: Cell[] } | null = null;
      for (let x = 0; x < this.width; x++) {
        const index = y * this.width + x;
        const cell = this.cells[index];
        if (cell && this.dirty[index]) {
          if (!run) {
            run = { x, y, cells: [] };
            runs.push(run);
          }
          run.cells.push(cell);
        } else {
          run = null;
        }
      }
    }

    return runs;
  }

  /**
   * Copy another buffer onto this one. Only cells that differ become dirty.
   */
  blit(source: ScreenBuffer): void {
    for (let y = 0; y < source.height; y++) {
      for (let x = 0; x < source.width; x++) {
        const cell = source.getCell(x, y);
        if (cell) {
          this.setCell(x, y, cell);
        }
      }
    }
  }

  /**
   * Row of cells (empty if out of bounds)
   */
  getRow(y: number): Cell[] {
    if (y < 0 || y >= this.height) return [];
    return this.cells.slice(y * this.width, (y + 1) * this.width);
  }

  /**
   * Row as plain characters, for inspection
   */
  rowText(y: number): string {
    return this.getRow(y)
      .map((cell) => cell.char)
      .join('');
  }
}
