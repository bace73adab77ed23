import type { EntityId } from '@tilecrawl/protocol';
import { Entity } from './entity.js';
import { UnknownEntityError } from '../errors.js';

/**
 * Entity arena keyed by stable id, iterated in insertion order
 */
export class EntityRegistry {
  private entities: Map<EntityId, Entity> = new Map();

  add(entity: Entity): Entity {
    if (this.entities.has(entity.id)) {
      throw new Error(`Entity id '${entity.id}' is already registered`);
    }
    this.entities.set(entity.id, entity);
    return entity;
  }

  get(id: EntityId): Entity | undefined {
    return this.entities.get(id);
  }

  require(id: EntityId): Entity {
    const entity = this.entities.get(id);
    if (!entity) {
      throw new UnknownEntityError(id);
    }
    return entity;
  }

  has(id: EntityId): boolean {
    return this.entities.has(id);
  }

  delete(id: EntityId): boolean {
    return this.entities.delete(id);
  }

  values(): IterableIterator<Entity> {
    return this.entities.values();
  }

  /**
   * Entities that currently hold a pending move
   */
  withPendingMoves(): Entity[] {
    return Array.from(this.entities.values()).filter((e) => e.pendingMove !== null);
  }

  get size(): number {
    return this.entities.size;
  }
}
