import { EventEmitter } from 'events';
import {
  NOOP_RENDER_HOOKS,
  PLAYER_COLOR,
  PLAYER_NAME,
  SILENT_DIAGNOSTICS,
  type Diagnostics,
  type Direction,
  type EntityId,
  type EntityKind,
  type EntityView,
  type GameEvent,
  type GridCoord,
  type GridWindow,
  type InputToken,
  type RenderHooks,
  type RGB,
  type ScreenCoord,
} from '@tilecrawl/protocol';
import { Grid } from '../grid/grid.js';
import { Entity } from '../entity/entity.js';
import { EntityRegistry } from '../entity/entity-registry.js';
import {
  MovementResolver,
  clearPendingMove,
  setPendingMove,
  type MoveResult,
} from '../movement/movement-resolver.js';
import { Viewport, type ViewportChange, type ViewportConfig } from '../viewport/viewport.js';

export interface WorldSessionConfig extends ViewportConfig {
  cols: number;
  rows: number;
  hooks?: RenderHooks;
  diagnostics?: Diagnostics;
}

export interface SpawnSpec {
  kind: EntityKind;
  col: number;
  row: number;
  name?: string;
  id?: EntityId;
  color?: RGB;
}

export interface WorldSessionStats {
  tick: number;
  elapsed: number;
  entities: number;
  activeTiles: number;
}

const DEFAULT_NPC_COLOR: RGB = [200, 200, 200];

/**
 * One running level: grid, entities, movement and camera behind the
 * entry points the environment drives (input, tick, resize).
 */
export class WorldSession extends EventEmitter {
  readonly grid: Grid;
  private registry: EntityRegistry = new EntityRegistry();
  private resolver: MovementResolver;
  private viewport: Viewport;
  private hooks: RenderHooks;
  private diagnostics: Diagnostics;
  private playerId: EntityId | null = null;
  private npcCounter: number = 0;
  private tick: number = 0;
  private elapsed: number = 0;

  constructor(config: WorldSessionConfig) {
    super();
    this.hooks = config.hooks ?? NOOP_RENDER_HOOKS;
    this.diagnostics = config.diagnostics ?? SILENT_DIAGNOSTICS;
    this.grid = new Grid(config.cols, config.rows);
    this.resolver = new MovementResolver(this.grid, this.diagnostics);
    this.viewport = new Viewport(
      this.grid,
      this.hooks,
      { tileWidth: config.tileWidth, tileHeight: config.tileHeight, origin: config.origin },
      this.diagnostics
    );
  }

  /**
   * Create an entity and place it. The first player becomes the camera focus.
   */
  spawn(spec: SpawnSpec): EntityView {
    if (spec.kind === 'player' && this.playerId !== null) {
      throw new Error(`Session already has a player ('${this.playerId}')`);
    }

    const id = spec.id ?? (spec.kind === 'player' ? PLAYER_NAME : this.nextNpcId());
    const entity = new Entity({
      id,
      name: spec.name ?? id,
      kind: spec.kind,
      color: spec.color ?? (spec.kind === 'player' ? PLAYER_COLOR : DEFAULT_NPC_COLOR),
    });

    // Validate placement before registering so a failure leaves no trace
    const tile = this.grid.tileAt(spec.col, spec.row);
    this.registry.add(entity);
    try {
      this.grid.place(entity, tile.col, tile.row);
    } catch (error) {
      this.registry.delete(entity.id);
      throw error;
    }

    this.diagnostics.debug("Added entity '%s' on grid(%d,%d)", entity.name, tile.col, tile.row);

    if (entity.kind === 'player') {
      this.playerId = entity.id;
      const change = this.viewport.focusOn({ col: tile.col, row: tile.row });
      this.emitViewportChange(change);
    }

    const view = this.viewOf(entity);
    const position = this.viewport.layoutPosition(tile.col, tile.row);
    this.hooks.onEntityMoved(view, position.x, position.y);
    return view;
  }

  /**
   * Remove an entity, clearing both sides of its occupancy link
   */
  despawn(id: EntityId): void {
    const entity = this.registry.require(id);
    const view = this.viewOf(entity);

    this.grid.remove(entity);
    this.registry.delete(id);
    if (this.playerId === id) {
      this.playerId = null;
    }

    this.hooks.onEntityRemoved(view);
    this.diagnostics.debug("Removed entity '%s'", entity.name);
  }

  setPendingMove(id: EntityId, direction: Direction, token: InputToken): void {
    setPendingMove(this.registry.require(id), direction, token);
  }

  clearPendingMove(id: EntityId, token: InputToken): boolean {
    return clearPendingMove(this.registry.require(id), token);
  }

  /**
   * Advance one tick: resolve every pending move, player first
   */
  update(deltaTime: number): void {
    this.tick++;
    this.elapsed += deltaTime;

    for (const entity of this.resolutionOrder()) {
      const result = this.resolver.resolve(entity);
      if (result) {
        this.applyResult(entity, result);
      }
    }
  }

  /**
   * Window size changed (screen units); full activation re-diff
   */
  resize(width: number, height: number): ViewportChange | null {
    this.diagnostics.debug('The window was resized to %dx%d', width, height);
    const change = this.viewport.resize(width, height);
    if (change) {
      this.emitViewportChange(change);
    }
    return change;
  }

  getPlayer(): EntityView | null {
    if (this.playerId === null) return null;
    const player = this.registry.get(this.playerId);
    return player ? this.viewOf(player) : null;
  }

  getEntity(id: EntityId): EntityView | null {
    const entity = this.registry.get(id);
    return entity ? this.viewOf(entity) : null;
  }

  getEntities(): EntityView[] {
    return Array.from(this.registry.values(), (entity) => this.viewOf(entity));
  }

  hasPendingMove(id: EntityId): boolean {
    return this.registry.require(id).pendingMove !== null;
  }

  positionOf(id: EntityId): GridCoord | null {
    const entity = this.registry.require(id);
    return entity.occupiedTile === null ? null : this.grid.coordOf(entity.occupiedTile);
  }

  entityAt(col: number, row: number): EntityView | null {
    const occupant = this.grid.tileAt(col, row).occupant;
    if (occupant === null) return null;
    return this.getEntity(occupant);
  }

  getWindow(): GridWindow | null {
    return this.viewport.getWindow();
  }

  getCamera(): ScreenCoord {
    return this.viewport.getCamera();
  }

  getVisibleSize(): { cols: number; rows: number } {
    return this.viewport.getVisibleSize();
  }

  getFocus(): GridCoord | null {
    return this.viewport.getFocus();
  }

  /**
   * Throws InvariantViolationError if occupancy or activation is inconsistent
   */
  verifyInvariants(): void {
    this.grid.verifyOccupancy(this.registry.values());
    if (this.viewport.getFocus()) {
      this.viewport.verifyActivation();
    }
  }

  getStats(): WorldSessionStats {
    return {
      tick: this.tick,
      elapsed: this.elapsed,
      entities: this.registry.size,
      activeTiles: this.viewport.getActiveCount(),
    };
  }

  onGameEvent(listener: (event: GameEvent) => void): void {
    this.on('gameEvent', listener);
  }

  private resolutionOrder(): Entity[] {
    const pending = this.registry.withPendingMoves();
    const player = pending.find((entity) => entity.id === this.playerId);
    if (!player) return pending;
    return [player, ...pending.filter((entity) => entity !== player)];
  }

  private applyResult(entity: Entity, result: MoveResult): void {
    if (!result.moved) {
      this.emitGameEvent({
        type: 'moveBlocked',
        tick: this.tick,
        entityId: entity.id,
        direction: result.direction,
        target: result.target,
        reason: result.reason,
      });
      return;
    }

    const position = this.viewport.layoutPosition(result.to.col, result.to.row);
    this.hooks.onEntityMoved(this.viewOf(entity), position.x, position.y);
    this.emitGameEvent({
      type: 'entityMoved',
      tick: this.tick,
      entityId: entity.id,
      direction: result.direction,
      from: result.from,
      to: result.to,
    });

    if (entity.id === this.playerId) {
      this.emitViewportChange(this.viewport.focusOn(result.to, result.direction));
    }
  }

  private emitViewportChange(change: ViewportChange): void {
    this.emitGameEvent({
      type: 'viewportChanged',
      tick: this.tick,
      window: change.window,
      activated: change.activated,
      deactivated: change.deactivated,
      fullRefresh: change.fullRefresh,
    });
  }

  private emitGameEvent(event: GameEvent): void {
    this.emit('gameEvent', event);
    this.emit(event.type, event);
  }

  private viewOf(entity: Entity): EntityView {
    const position = entity.occupiedTile === null ? null : this.grid.coordOf(entity.occupiedTile);
    return entity.toView(position);
  }

  private nextNpcId(): EntityId {
    let id = `npc${this.npcCounter++}`;
    while (this.registry.has(id)) {
      id = `npc${this.npcCounter++}`;
    }
    return id;
  }
}
