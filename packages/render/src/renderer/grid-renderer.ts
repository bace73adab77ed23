import {
  ENTITY_GLYPH,
  FLOOR_GLYPH,
  STATUS_LINE_HEIGHT,
  WALL_GLYPH,
  type Cell,
  type EntityId,
  type EntityKind,
  type EntityView,
  type RenderHooks,
  type RGB,
  type ScreenCoord,
  type TileId,
  type TileView,
} from '@tilecrawl/protocol';
import { ANSIBuilder } from '../ansi/builder.js';
import { color16, rgb } from '../ansi/colors.js';
import { ScreenBuffer } from '../buffer/screen-buffer.js';

/**
 * Terminal grid renderer configuration
 */
export interface TerminalGridRendererConfig {
  cols: number;          // Terminal columns
  rows: number;          // Terminal rows
  tileWidth: number;     // Cells per tile horizontally
  tileHeight: number;    // Cells per tile vertically
  statusHeight?: number; // Rows reserved at the top
}

interface DrawnTile {
  x: number;
  y: number;
  walkable: boolean;
}

interface DrawnEntity {
  x: number;
  y: number;
  color: RGB;
  kind: EntityKind;
}

const FLOOR_COLOR = color16(8); // bright black
const WALL_COLOR = color16(7);
const STATUS_COLOR = color16(15);

/**
 * Draws the active part of the grid into a terminal.
 * Holds what the render hooks report (tile and entity layout positions and
 * the camera) and turns it into cells on each draw. Layout y grows upward,
 * so the bottom of the map area is the lowest layout row.
 */
export class TerminalGridRenderer implements RenderHooks {
  private tiles: Map<TileId, DrawnTile> = new Map();
  private entities: Map<EntityId, DrawnEntity> = new Map();
  private camera: ScreenCoord = { x: 0, y: 0 };

  private screenBuffer: ScreenBuffer;
  private ansi: ANSIBuilder = new ANSIBuilder();
  private stream: NodeJS.WritableStream | null = null;
  private forceFullRedraw: boolean = true;
  private cols: number;
  private rows: number;
  private readonly tileWidth: number;
  private readonly tileHeight: number;
  private readonly statusHeight: number;

  constructor(config: TerminalGridRendererConfig) {
    if (config.tileWidth <= 0 || config.tileHeight <= 0) {
      throw new RangeError(`Invalid tile size ${config.tileWidth}x${config.tileHeight}`);
    }
    this.cols = Math.max(0, config.cols);
    this.rows = Math.max(0, config.rows);
    this.tileWidth = config.tileWidth;
    this.tileHeight = config.tileHeight;
    this.statusHeight = config.statusHeight ?? STATUS_LINE_HEIGHT;
    this.screenBuffer = new ScreenBuffer(this.cols, this.rows);
  }

  // Render hooks

  onTileActivated(tile: TileView, screenX: number, screenY: number): void {
    this.tiles.set(tile.id, { x: screenX, y: screenY, walkable: tile.walkable });
  }

  onTileDeactivated(tile: TileView): void {
    this.tiles.delete(tile.id);
  }

  onEntityMoved(entity: EntityView, screenX: number, screenY: number): void {
    this.entities.set(entity.id, { x: screenX, y: screenY, color: entity.color, kind: entity.kind });
  }

  onEntityRemoved(entity: EntityView): void {
    this.entities.delete(entity.id);
  }

  onCameraMoved(offsetX: number, offsetY: number): void {
    this.camera = { x: offsetX, y: offsetY };
  }

  /**
   * Attach output stream
   */
  attachStream(stream: NodeJS.WritableStream): void {
    this.stream = stream;
  }

  /**
   * Enter the alternate screen, hide the cursor and switch the keypad to application mode
   */
  initialize(): void {
    if (!this.stream) return;

    const init = this.ansi
      .enterAlternateScreen()
      .hideCursor()
      .disableLineWrap()
      .applicationKeypad()
      .enableFocusReporting()
      .clearScreen()
      .build();

    this.stream.write(init);
    this.forceFullRedraw = true;
  }

  /**
   * Restore the terminal
   */
  cleanup(): void {
    if (!this.stream) return;

    const cleanup = this.ansi
      .disableFocusReporting()
      .numericKeypad()
      .exitAlternateScreen()
      .showCursor()
      .enableLineWrap()
      .resetAttributes()
      .build();

    this.stream.write(cleanup);
  }

  /**
   * Handle terminal resize
   */
  resize(cols: number, rows: number): void {
    this.cols = Math.max(0, cols);
    this.rows = Math.max(0, rows);
    this.screenBuffer = new ScreenBuffer(this.cols, this.rows);
    this.forceFullRedraw = true;
  }

  /**
   * Size of the map area in cells (what the viewport should be resized to)
   */
  getViewSize(): { width: number; height: number } {
    return { width: this.cols, height: Math.max(0, this.rows - this.statusHeight) };
  }

  getDimensions(): { cols: number; rows: number } {
    return { cols: this.cols, rows: this.rows };
  }

  /**
   * Force full redraw on next draw
   */
  invalidate(): void {
    this.forceFullRedraw = true;
  }

  /**
   * Compose a frame and write what changed to the attached stream
   */
  draw(status: string): void {
    const frame = this.compose(status);
    this.screenBuffer.blit(frame);
    this.flush();
  }

  /**
   * Current screen contents
   */
  getBuffer(): ScreenBuffer {
    return this.screenBuffer;
  }

  getActiveTileCount(): number {
    return this.tiles.size;
  }

  getCamera(): ScreenCoord {
    return { ...this.camera };
  }

  private compose(status: string): ScreenBuffer {
    const frame = new ScreenBuffer(this.cols, this.rows);

    frame.writeText(0, 0, status.slice(0, this.cols), STATUS_COLOR);

    for (const tile of this.tiles.values()) {
      const glyph = tile.walkable ? FLOOR_GLYPH : WALL_GLYPH;
      const fg = tile.walkable ? FLOOR_COLOR : WALL_COLOR;
      this.stamp(frame, tile.x, tile.y, { char: glyph, fg });
    }

    // Player last so it stays on top
    const ordered = [...this.entities.values()].sort(
      (a, b) => Number(a.kind === 'player') - Number(b.kind === 'player')
    );
    for (const entity of ordered) {
      this.stamp(frame, entity.x, entity.y, {
        char: ENTITY_GLYPH,
        fg: rgb(entity.color),
        bold: entity.kind === 'player',
      });
    }

    return frame;
  }

  /**
   * Fill the cells covered by a tile at a layout position: the glyph in the
   * first cell, blanks in the rest. Clipped to the map area.
   */
  private stamp(frame: ScreenBuffer, layoutX: number, layoutY: number, cell: Partial<Cell>): void {
    const viewHeight = this.rows - this.statusHeight;
    const left = layoutX - this.camera.x;
    const bottom = layoutY - this.camera.y;

    for (let dy = 0; dy < this.tileHeight; dy++) {
      const fromBottom = bottom + dy;
      if (fromBottom < 0 || fromBottom >= viewHeight) continue;
      const y = this.statusHeight + (viewHeight - 1 - fromBottom);

      for (let dx = 0; dx < this.tileWidth; dx++) {
        const x = left + dx;
        if (x < 0 || x >= this.cols) continue;
        frame.setCell(x, y, dx === 0 && dy === 0 ? cell : { ...cell, char: ' ' });
      }
    }
  }

  /**
   * Flush changes to stream
   */
  private flush(): void {
    if (this.forceFullRedraw) {
      this.screenBuffer.markAllDirty();
      this.ansi.clearScreen();
      this.forceFullRedraw = false;
    }

    for (const run of this.screenBuffer.getDirtyRuns()) {
      this.ansi.writeCells(run.cells, run.x, run.y);
    }
    this.screenBuffer.clearDirty();

    if (this.ansi.length === 0) return;
    this.ansi.resetAttributes();
    const output = this.ansi.build();
    if (this.stream) {
      this.stream.write(output);
    }
  }
}
