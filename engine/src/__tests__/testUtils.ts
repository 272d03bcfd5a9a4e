// ============================================
// Test Utilities for Engine Tests
// ============================================

import { GridMap, World, vec3, type Entity, type Vec3 } from '@stationfall/shared';
import { Collider, ColliderShape } from '../collision/Collider';
import { Transform } from '../ecs/components';

// ============================================
// Maps
// ============================================

/**
 * Square room with a one-cell wall border and an empty interior.
 * World bounds match grid units, so cell (x, y) is centred on (x + 0.5, y + 0.5).
 */
export function createRoomMap(size = 10): GridMap {
  const wall = '1'.repeat(size);
  const interior = `1${'0'.repeat(size - 2)}1`;
  const rows = [wall, ...Array.from({ length: size - 2 }, () => interior), wall];
  return GridMap.fromRows(rows);
}

// ============================================
// World Setup
// ============================================

export function createTestWorld(): World {
  return new World();
}

/**
 * Place a box collider at a world position.
 */
export function addBox(
  world: World,
  position: Vec3,
  size: Vec3 = vec3(1, 2, 1),
  options: { trigger?: boolean; enabled?: boolean } = {}
): Entity {
  const { trigger = false, enabled = true } = options;
  const shape = ColliderShape.box(size);
  const collider = trigger ? Collider.staticTrigger(shape) : Collider.staticSolid(shape);

  return world
    .spawn()
    .with(Transform, new Transform(vec3(position.x, position.y, position.z)))
    .with(Collider, collider.withEnabled(enabled))
    .build();
}

/**
 * Place a full-cell wall box over grid cell (x, y), like populateWalls does.
 */
export function addCellBlocker(world: World, x: number, y: number): Entity {
  return addBox(world, vec3(x + 0.5, 1, y + 0.5));
}
