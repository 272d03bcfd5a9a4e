// ============================================
// Component Exports
// All component classes for the ECS
// ============================================

// Core components (shared by multiple entity types)
export { ToggleableComponent, Transform, Velocity } from './core';

// Player components
export { Player } from './player';

// Entity type components
export { Wall } from './entities';

// Navigation components
export { Pathfinder, Patrol } from './navigation';

// Colliders live with the shape algorithms that read them
export { Collider, ColliderMaterial } from '../../collision/Collider';
