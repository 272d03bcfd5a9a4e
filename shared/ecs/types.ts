// ============================================
// ECS Core Types
// ============================================

/**
 * Entity ID - index into the entity manager's generation table.
 * IDs are recycled after an entity is destroyed.
 */
export type EntityId = number;

/**
 * Entity handle - an ID plus the generation it was issued at.
 *
 * Handles carry no data and are copied freely. A handle is valid only while
 * the manager's generation for `id` still equals `generation`; once the
 * entity is destroyed the handle stays invalid forever, even after the ID
 * is reused.
 */
export interface Entity {
  readonly id: EntityId;
  readonly generation: number;
}

/**
 * Component type - the component's class.
 * The constructor itself is the registry key, so component identity never
 * depends on names or strings.
 */
export type ComponentType<T> = new (...args: never[]) => T;

/**
 * Components that can be switched off without being removed.
 * Systems skip a disabled component; the ECS itself never reads the flag
 * except through World.isProcessable().
 */
export interface Toggleable {
  enabled: boolean;
}

/**
 * Two handles refer to the same entity only if both id and generation match.
 */
export function sameEntity(a: Entity, b: Entity): boolean {
  return a.id === b.id && a.generation === b.generation;
}

/**
 * A component counts as enabled unless it carries `enabled: false`.
 */
export function isComponentEnabled(component: object): boolean {
  return !('enabled' in component) || component.enabled !== false;
}

/**
 * Short display form for logs, e.g. "3v2".
 */
export function formatEntity(entity: Entity): string {
  return `${entity.id}v${entity.generation}`;
}
