// ============================================
// Engine Public API
// ============================================

export { Simulation, FrameClock } from './simulation';

// Components
export {
  ToggleableComponent,
  Transform,
  Velocity,
  Player,
  Wall,
  Pathfinder,
  Patrol,
} from './ecs/components';

// Collision
export {
  Collider,
  ColliderMaterial,
  ColliderShape,
  containsPoint,
  overlapsWith,
  getBounds,
  checkPositionCollision,
  checkGridCollision,
  tryMove,
  setCollidersEnabled,
} from './collision';
export type { Placement, Bounds } from './collision';

// Pathfinding
export { PathfindingAlgorithms, MinHeap } from './pathfinding';
export type { PathfindingResult, GridCell, AStarNode } from './pathfinding';

// Systems
export { SystemRunner, SystemPriority, PatrolSystem, PathfindingSystem, PhysicsSystem } from './ecs/systems';
export type { System, SystemTiming, TickReport } from './ecs/systems';

// Factories
export {
  createWall,
  populateWalls,
  createPillar,
  createPlayer,
  createNavigator,
  startJump,
  requireComponent,
  requireTransform,
  requirePathfinder,
  toggleableWalls,
} from './ecs/factories';
export type { NavigatorOptions } from './ecs/factories';

export { logger, perfLogger } from './logger';
