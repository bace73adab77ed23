import { describe, it, expect } from 'vitest';
import { Writable } from 'stream';
import type { EntityView, TileView } from '@tilecrawl/protocol';
import { TerminalGridRenderer } from './grid-renderer.js';

function tile(id: number, walkable = true): TileView {
  return { id, col: id, row: 0, occupant: null, walkable, active: true, screenPosition: null };
}

function entity(id: string, kind: EntityView['kind'] = 'npc'): EntityView {
  return { id, name: id, kind, color: [10, 20, 30], position: null };
}

function capture() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, chunks };
}

/**
 * 10x4 terminal: status row plus a 3-row map area, tiles two cells wide
 */
function setup() {
  const renderer = new TerminalGridRenderer({ cols: 10, rows: 4, tileWidth: 2, tileHeight: 1 });
  renderer.onTileActivated(tile(0), 0, 0);
  renderer.onTileActivated(tile(1, false), 2, 0);
  renderer.onTileActivated(tile(2), 0, 2);
  renderer.onEntityMoved(entity('n'), 2, 2);
  return renderer;
}

describe('TerminalGridRenderer', () => {
  it('draws the status line and the map bottom-to-top', () => {
    const renderer = setup();

    renderer.draw('T1');

    const buffer = renderer.getBuffer();
    expect(buffer.rowText(0)).toBe('T1        ');
    expect(buffer.rowText(1)).toBe('. @       ');
    expect(buffer.rowText(2)).toBe('          ');
    expect(buffer.rowText(3)).toBe('. #       ');
  });

  it('shifts everything by the camera offset', () => {
    const renderer = setup();

    renderer.onCameraMoved(2, 0);
    renderer.draw('');

    const buffer = renderer.getBuffer();
    expect(buffer.rowText(1)).toBe('@         ');
    expect(buffer.rowText(3)).toBe('#         ');
  });

  it('forgets deactivated tiles and removed entities', () => {
    const renderer = setup();

    renderer.onTileDeactivated(tile(1));
    renderer.onEntityRemoved(entity('n'));
    renderer.draw('');

    expect(renderer.getActiveTileCount()).toBe(2);
    expect(renderer.getBuffer().rowText(1)).toBe('.         ');
    expect(renderer.getBuffer().rowText(3)).toBe('.         ');
  });

  it('reserves the status rows when reporting the view size', () => {
    const renderer = setup();
    expect(renderer.getViewSize()).toEqual({ width: 10, height: 3 });

    renderer.resize(40, 12);
    expect(renderer.getViewSize()).toEqual({ width: 40, height: 11 });
  });

  it('writes only the cells that changed after the first frame', () => {
    const renderer = setup();
    const { stream, chunks } = capture();
    renderer.attachStream(stream);

    renderer.draw('a');
    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.startsWith('\x1b[2J\x1b[1;1H')).toBe(true);

    renderer.draw('a');
    expect(chunks).toHaveLength(1);

    renderer.draw('b');
    expect(chunks[1]).toBe('\x1b[1;1H\x1b[0m\x1b[97mb\x1b[0m');
  });

  it('writes the player bold in its own color', () => {
    const renderer = new TerminalGridRenderer({ cols: 2, rows: 2, tileWidth: 1, tileHeight: 1 });
    const { stream, chunks } = capture();
    renderer.attachStream(stream);
    renderer.onEntityMoved({ id: 'p', name: 'p', kind: 'player', color: [1, 2, 3], position: null }, 0, 0);

    renderer.draw('');

    expect(chunks).toEqual([
      '\x1b[2J' +
        '\x1b[1;1H\x1b[0m\x1b[39m  ' +
        '\x1b[2;1H\x1b[0m\x1b[38;2;1;2;3m\x1b[1m@\x1b[0m\x1b[39m ' +
        '\x1b[0m',
    ]);
  });

  it('redraws everything after invalidate', () => {
    const renderer = setup();
    const { stream, chunks } = capture();
    renderer.attachStream(stream);

    renderer.draw('a');
    renderer.invalidate();
    renderer.draw('a');

    expect(chunks).toHaveLength(2);
    expect(chunks[1]).toBe(chunks[0]);
  });

  it('restores the terminal on cleanup', () => {
    const renderer = setup();
    const { stream, chunks } = capture();
    renderer.attachStream(stream);

    renderer.cleanup();

    expect(chunks).toEqual(['\x1b[?1004l\x1b>\x1b[?1049l\x1b[?25h\x1b[?7h\x1b[0m']);
  });
});
