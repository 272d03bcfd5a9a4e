// ============================================
// Collision Module Exports
// ============================================

export { Collider, ColliderMaterial, ColliderShape } from './Collider';
export { containsPoint, overlapsWith, getBounds } from './shapes';
export type { Placement, Bounds } from './shapes';
export { checkPositionCollision, checkGridCollision, tryMove, setCollidersEnabled } from './queries';
