// ============================================
// Collision Queries
// World-level "is this spot blocked?" checks used by movement and pathfinding
// ============================================

import { ENGINE_CONFIG, isComponentEnabled, vec3, type Entity, type Vec3, type World } from '@stationfall/shared';
import { Transform } from '../ecs/components/core';
import { Collider, ColliderShape } from './Collider';
import { overlapsWith } from './shapes';

/**
 * Would an upright occupant capsule at `position` hit any blocking collider?
 *
 * Scans every entity holding a Collider and a Transform (no spatial index)
 * and returns on the first hit. An entity blocks only when it is valid, its
 * Transform is enabled, and its Collider is enabled and not a trigger.
 */
export function checkPositionCollision(world: World, position: Vec3, radius: number): boolean {
  const colliders = world.storage(Collider);
  if (!colliders) return false;

  const probeShape = ColliderShape.capsule(ENGINE_CONFIG.QUERY_CAPSULE_HEIGHT, radius);
  const probe = { position };

  for (const [entity, collider] of colliders) {
    if (!collider.blocksMovement()) continue;

    const transform = world.get(entity, Transform);
    if (!transform || !isComponentEnabled(transform)) continue;

    if (overlapsWith(probeShape, probe, collider.shape, transform)) {
      return true;
    }
  }

  return false;
}

/**
 * Occupancy check for a floor position: a generic occupant standing at
 * (x, z).
 */
export function checkGridCollision(world: World, x: number, z: number): boolean {
  return checkPositionCollision(world, vec3(x, ENGINE_CONFIG.STANDING_HEIGHT, z), ENGINE_CONFIG.OCCUPANT_RADIUS);
}

/**
 * Resolve a floor-plane move with wall sliding.
 *
 * Both axis probes are evaluated first against the unchanged World; the
 * resolved position is returned for the caller to write back. Each axis is
 * applied only if its displaced position is free.
 */
export function tryMove(world: World, from: Vec3, dx: number, dz: number, radius: number): Vec3 {
  const blockedX = checkPositionCollision(world, vec3(from.x + dx, from.y, from.z), radius);
  const blockedZ = checkPositionCollision(world, vec3(from.x, from.y, from.z + dz), radius);

  return vec3(blockedX ? from.x : from.x + dx, from.y, blockedZ ? from.z : from.z + dz);
}

/**
 * Switch the colliders of a group of entities on or off.
 * Returns how many colliders actually changed state.
 */
export function setCollidersEnabled(world: World, entities: readonly Entity[], enabled: boolean): number {
  let changed = 0;
  for (const entity of entities) {
    const collider = world.getMut(entity, Collider);
    if (!collider || collider.enabled === enabled) continue;
    collider.enabled = enabled;
    changed++;
  }
  return changed;
}
