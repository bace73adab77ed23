import {
  SILENT_DIAGNOSTICS,
  type Diagnostics,
  type Direction,
  type GridCoord,
  type GridWindow,
  type RenderHooks,
  type ScreenCoord,
  type TileId,
} from '@tilecrawl/protocol';
import type { Grid } from '../grid/grid.js';
import type { Tile } from '../grid/tile.js';
import { InvariantViolationError } from '../errors.js';
import {
  computeAxisRange,
  computeVisibleTiles,
  rectDifference,
  windowContains,
  type AxisRange,
} from './window.js';

/**
 * Viewport configuration
 */
export interface ViewportConfig {
  tileWidth: number;   // Tile width in screen units
  tileHeight: number;  // Tile height in screen units
  origin?: ScreenCoord; // Layout position of tile (0,0)
}

/**
 * Outcome of recomputing the visible window
 */
export interface ViewportChange {
  window: GridWindow;
  activated: number;
  deactivated: number;
  fullRefresh: boolean;
  camera: ScreenCoord;
}

/**
 * Scrolling camera over the grid. Keeps exactly the tiles of the current
 * window active and tells the render hooks about every change.
 */
export class Viewport {
  private grid: Grid;
  private hooks: RenderHooks;
  private diagnostics: Diagnostics;
  private tileWidth: number;
  private tileHeight: number;
  private origin: ScreenCoord;

  private windowWidth: number = 0;
  private windowHeight: number = 0;
  private visibleCols: number = 1;
  private visibleRows: number = 1;
  private focus: GridCoord | null = null;
  private window: GridWindow | null = null;
  private clampOffset: { cols: number; rows: number } = { cols: 0, rows: 0 };
  private camera: ScreenCoord = { x: 0, y: 0 };
  private activeTiles: Set<TileId> = new Set();

  constructor(
    grid: Grid,
    hooks: RenderHooks,
    config: ViewportConfig,
    diagnostics: Diagnostics = SILENT_DIAGNOSTICS
  ) {
    if (config.tileWidth <= 0 || config.tileHeight <= 0) {
      throw new RangeError(`Invalid tile size ${config.tileWidth}x${config.tileHeight}`);
    }
    this.grid = grid;
    this.hooks = hooks;
    this.diagnostics = diagnostics;
    this.tileWidth = config.tileWidth;
    this.tileHeight = config.tileHeight;
    this.origin = config.origin ?? { x: 0, y: 0 };
  }

  /**
   * Window size changed: recount tiles and re-diff the whole window.
   * Returns null while there is no focus yet.
   */
  resize(width: number, height: number): ViewportChange | null {
    this.windowWidth = Math.max(0, width);
    this.windowHeight = Math.max(0, height);
    this.visibleCols = computeVisibleTiles(this.windowWidth, this.tileWidth);
    this.visibleRows = computeVisibleTiles(this.windowHeight, this.tileHeight);
    this.diagnostics.debug(
      'Viewport resized to %dx%d (%dx%d tiles)',
      width,
      height,
      this.visibleCols,
      this.visibleRows
    );

    if (!this.focus) return null;
    return this.rebuild();
  }

  /**
   * Re-center on a grid cell. With the direction of the move that got us
   * here, only the strips that left or entered the window are touched.
   */
  focusOn(coord: GridCoord, direction?: Direction): ViewportChange {
    // Throws OutOfBoundsError off the grid
    this.grid.tileAt(coord.col, coord.row);
    this.focus = { col: coord.col, row: coord.row };
    return this.rebuild(direction);
  }

  /**
   * Layout position of a tile: left-to-right, bottom-to-top from the origin
   */
  layoutPosition(col: number, row: number): ScreenCoord {
    return {
      x: this.origin.x + col * this.tileWidth,
      y: this.origin.y + row * this.tileHeight,
    };
  }

  contains(col: number, row: number): boolean {
    return this.window !== null && windowContains(this.window, col, row);
  }

  getWindow(): GridWindow | null {
    return this.window ? { ...this.window } : null;
  }

  getFocus(): GridCoord | null {
    return this.focus ? { ...this.focus } : null;
  }

  getVisibleSize(): { cols: number; rows: number } {
    return { cols: this.visibleCols, rows: this.visibleRows };
  }

  getClampOffset(): { cols: number; rows: number } {
    return { ...this.clampOffset };
  }

  getCamera(): ScreenCoord {
    return { ...this.camera };
  }

  getActiveCount(): number {
    return this.activeTiles.size;
  }

  /**
   * Every tile in the window is active and nothing outside it is
   */
  verifyActivation(): void {
    for (const tile of this.grid.allTiles()) {
      const inside = this.contains(tile.col, tile.row);
      if (tile.active !== inside || this.activeTiles.has(tile.id) !== inside) {
        throw new InvariantViolationError(
          `Tile (${tile.col},${tile.row}) is ${tile.active ? 'active' : 'inactive'} but ${inside ? 'inside' : 'outside'} the viewport`
        );
      }
    }
  }

  private rebuild(direction?: Direction): ViewportChange {
    const focus = this.focus;
    if (!focus) {
      throw new InvariantViolationError('Viewport has no focus');
    }

    const cols = computeAxisRange(focus.col, this.visibleCols, this.grid.cols);
    const rows = computeAxisRange(focus.row, this.visibleRows, this.grid.rows);
    const next: GridWindow = { minCol: cols.min, maxCol: cols.max, minRow: rows.min, maxRow: rows.max };
    const previous = this.window;
    const fullRefresh = direction === undefined || previous === null;

    this.window = next;
    this.clampOffset = { cols: cols.offset, rows: rows.offset };

    let activated = 0;
    let deactivated = 0;

    if (fullRefresh) {
      for (const id of Array.from(this.activeTiles)) {
        const tile = this.grid.tileById(id);
        if (!windowContains(next, tile.col, tile.row) && this.deactivate(tile)) {
          deactivated++;
        }
      }
      for (const tile of this.grid.tilesIn(next)) {
        if (this.activate(tile)) activated++;
      }
    } else {
      for (const strip of rectDifference(previous, next)) {
        for (const tile of this.grid.tilesIn(strip)) {
          if (this.deactivate(tile)) deactivated++;
        }
      }
      for (const strip of rectDifference(next, previous)) {
        for (const tile of this.grid.tilesIn(strip)) {
          if (this.activate(tile)) activated++;
        }
      }
    }

    this.moveCamera(focus, cols, rows, fullRefresh);

    return { window: { ...next }, activated, deactivated, fullRefresh, camera: { ...this.camera } };
  }

  private moveCamera(focus: GridCoord, cols: AxisRange, rows: AxisRange, force: boolean): void {
    const x = this.cameraAxis(focus.col, cols, this.origin.x, this.tileWidth, this.windowWidth);
    const y = this.cameraAxis(focus.row, rows, this.origin.y, this.tileHeight, this.windowHeight);

    if (!force && x === this.camera.x && y === this.camera.y) return;

    this.camera = { x, y };
    this.hooks.onCameraMoved(x, y);
  }

  /**
   * Centered on the focus while the window is free. A window pushed against
   * the grid edge is aligned with that edge so its outer tiles stay on screen,
   * and a window no wider than the screen starts at the screen edge.
   */
  private cameraAxis(focus: number, range: AxisRange, origin: number, tile: number, window: number): number {
    const low = origin + range.min * tile;
    const high = origin + (range.max + 1) * tile - window;
    if (high <= low || range.offset > 0) return low;
    if (range.offset < 0) return high;
    return origin + focus * tile + Math.floor(tile / 2) - Math.floor(window / 2);
  }

  private activate(tile: Tile): boolean {
    if (tile.active) return false;

    const position = this.layoutPosition(tile.col, tile.row);
    tile.active = true;
    tile.screenPosition = position;
    this.activeTiles.add(tile.id);
    this.hooks.onTileActivated(tile.toView(), position.x, position.y);
    return true;
  }

  private deactivate(tile: Tile): boolean {
    if (!tile.active) return false;

    tile.active = false;
    tile.screenPosition = null;
    this.activeTiles.delete(tile.id);
    this.hooks.onTileDeactivated(tile.toView());
    return true;
  }
}
