import EventEmitter from 'events';
import type { UpdateEntity } from './wud/entity';
import type { EntityState } from './wud/types';
import { zone } from './logging/zone';

const log = zone('registry');

/**
 * Holds every update entity the running instances have created.
 *
 * Events:
 * - 'added' (entity) when an entity is registered
 * - 'state' (EntityState) whenever a registered entity republishes
 * - 'removed' (entity) when it is dropped
 */
export class EntityRegistry extends EventEmitter {
    private entities = new Map<string, UpdateEntity>();

    add(entity: UpdateEntity): void {
        if (this.entities.has(entity.entityId)) {
            log.warn({ message: 'Entity already registered, replacing it', data: { entityId: entity.entityId } });
            this.remove(entity.entityId);
        }

        this.entities.set(entity.entityId, entity);
        entity.attach((state: EntityState) => this.emit('state', state));
        this.emit('added', entity);
        log.debug({ message: 'Entity registered', data: { entityId: entity.entityId } });
    }

    addAll(entities: Iterable<UpdateEntity>): void {
        for (const entity of entities) {
            this.add(entity);
        }
    }

    remove(entityId: string): void {
        const entity = this.entities.get(entityId);
        if (!entity) return;

        entity.remove();
        this.entities.delete(entityId);
        this.emit('removed', entity);
    }

    removeInstance(instanceId: string): void {
        for (const entity of this.getAll()) {
            if (entity.coordinator.instanceId === instanceId) {
                this.remove(entity.entityId);
            }
        }
    }

    get(entityId: string): UpdateEntity | undefined {
        return this.entities.get(entityId);
    }

    getAll(): UpdateEntity[] {
        return Array.from(this.entities.values());
    }

    states(): EntityState[] {
        return this.getAll().map(entity => entity.toState());
    }

    clear(): void {
        for (const entityId of Array.from(this.entities.keys())) {
            this.remove(entityId);
        }
    }
}
