// ============================================
// Entity Factories
// Creates entities with their initial component sets
// ============================================

import {
  ENGINE_CONFIG,
  formatEntity,
  vec3,
  WallType,
  type ComponentType,
  type Entity,
  type GridMap,
  type Vec2,
  type Vec3,
  type World,
} from '@stationfall/shared';
import { Collider, ColliderShape } from '../collision/Collider';
import { Pathfinder, Patrol, Player, Transform, Velocity, Wall } from './components';

// ============================================
// Static Geometry
// ============================================

/**
 * Create a static wall collider for one map cell.
 * The box covers the full cell and stands WALL_COLLIDER_SIZE.y tall.
 */
export function createWall(world: World, map: GridMap, cell: readonly [number, number]): Entity {
  const [x, y] = cell;
  const [worldX, worldZ] = map.gridToWorld(x, y);

  return world
    .spawn()
    .with(Transform, new Transform(vec3(worldX, ENGINE_CONFIG.WALL_COLLIDER_HEIGHT, worldZ)))
    .with(Collider, Collider.staticSolid(ColliderShape.box(ENGINE_CONFIG.WALL_COLLIDER_SIZE)))
    .with(Wall, new Wall([x, y], map.wallType(x, y)))
    .build();
}

/**
 * Create one wall entity per wall cell of the map, row by row.
 */
export function populateWalls(world: World, map: GridMap): Entity[] {
  return map.wallCells().map((cell) => createWall(world, map, cell));
}

/**
 * Create a free-standing pillar whose collider can be toggled at run time.
 * Unlike map walls it leaves the map tiles untouched, so only the
 * ECS-aware queries see it.
 */
export function createPillar(world: World, map: GridMap, cell: readonly [number, number]): Entity {
  const [x, y] = cell;
  const [worldX, worldZ] = map.gridToWorld(x, y);

  return world
    .spawn()
    .with(Transform, new Transform(vec3(worldX, ENGINE_CONFIG.WALL_COLLIDER_HEIGHT, worldZ)))
    .with(Collider, Collider.staticSolid(ColliderShape.box(ENGINE_CONFIG.WALL_COLLIDER_SIZE)))
    .with(Wall, new Wall([x, y], WallType.TechPanel, true))
    .build();
}

// ============================================
// Actors
// ============================================

/**
 * Create the player body. The collider is a trigger so the player's own
 * volume never blocks occupancy queries.
 */
export function createPlayer(world: World, position: Vec3): Entity {
  return world
    .spawn()
    .with(Transform, new Transform(vec3(position.x, position.y, position.z)))
    .with(Velocity, new Velocity())
    .with(Player, new Player())
    .with(
      Collider,
      Collider.dynamicTrigger(ColliderShape.capsule(ENGINE_CONFIG.QUERY_CAPSULE_HEIGHT, ENGINE_CONFIG.OCCUPANT_RADIUS))
    )
    .build();
}

export interface NavigatorOptions {
  movementSpeed?: number;
  rotationSpeed?: number;
  arrivalThreshold?: number;
  /** Waypoints to cycle through; adds a Patrol component when given */
  patrol?: readonly Vec2[];
}

/**
 * Create an entity that walks A* routes. Position is on the floor plane;
 * the body stands at STANDING_HEIGHT.
 */
export function createNavigator(world: World, position: Vec2, options: NavigatorOptions = {}): Entity {
  const builder = world
    .spawn()
    .with(Transform, new Transform(vec3(position.x, ENGINE_CONFIG.STANDING_HEIGHT, position.y)))
    .with(Pathfinder, new Pathfinder(options.movementSpeed, options.rotationSpeed, options.arrivalThreshold));

  if (options.patrol) {
    builder.with(Patrol, new Patrol(options.patrol));
  }

  return builder.build();
}

/**
 * Launch a grounded player upward. Returns false if airborne or not a player.
 */
export function startJump(world: World, entity: Entity): boolean {
  const player = world.getMut(entity, Player);
  const velocity = world.getMut(entity, Velocity);
  if (!player || !velocity || !player.enabled || !player.isGrounded) return false;

  velocity.linear.y = player.jumpForce;
  player.isGrounded = false;
  return true;
}

// ============================================
// Required Component Accessors
// For callers that have already established the entity's shape
// ============================================

/**
 * Get a component that must exist. Throws if missing.
 */
export function requireComponent<T>(world: World, entity: Entity, type: ComponentType<T>): T {
  const comp = world.getMut(entity, type);
  if (comp === undefined) {
    throw new Error(`EntityMissingComponent: ${type.name} missing on entity ${formatEntity(entity)}`);
  }
  return comp;
}

export function requireTransform(world: World, entity: Entity): Transform {
  return requireComponent(world, entity, Transform);
}

export function requirePathfinder(world: World, entity: Entity): Pathfinder {
  return requireComponent(world, entity, Pathfinder);
}

/**
 * All wall entities whose collider can be toggled (pillars).
 */
export function toggleableWalls(world: World): Entity[] {
  return world.query1(Wall).filter(([, wall]) => wall.toggleable).map(([entity]) => entity);
}
