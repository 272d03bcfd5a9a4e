// ============================================
// ECS Systems - Public Exports
// ============================================

export type { System, SystemTiming, TickReport } from './types';
export { SystemPriority } from './types';
export { SystemRunner } from './SystemRunner';

// Individual systems
export { PatrolSystem } from './PatrolSystem';
export { PathfindingSystem } from './PathfindingSystem';
export { PhysicsSystem } from './PhysicsSystem';
