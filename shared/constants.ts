// ============================================
// Engine Constants & Configuration
// Static tuning values for collision, physics and navigation
// ============================================

export const ENGINE_CONFIG = {
  // Occupancy queries model a generic occupant as a vertical capsule
  QUERY_CAPSULE_HEIGHT: 1.8,
  OCCUPANT_RADIUS: 0.25,

  // Standing height of an occupant's centre above the floor
  STANDING_HEIGHT: 0.6,

  // Physics (units per second / per second squared)
  GRAVITY: 12,
  JUMP_FORCE: 4.5,
  PLAYER_MOVE_SPEED: 3,
  PLAYER_TURN_SPEED: 3,

  // Navigation defaults
  PATHFINDER_MOVEMENT_SPEED: 2,
  PATHFINDER_ROTATION_SPEED: 5,
  PATHFINDER_ARRIVAL_THRESHOLD: 0.4,
  PATHFINDER_FACING_THRESHOLD_DEG: 30,
  PATHFINDER_STUCK_TIME: 0.5, // seconds without progress before unsticking
  PATHFINDER_STUCK_EPSILON: 0.01, // movement below this counts as no progress
  PATHFINDER_UNSTICK_DISTANCE: 0.1,
  PATHFINDER_UNSTICK_ANGLE_DEG: 45,

  // Static wall colliders: one box per wall cell
  WALL_COLLIDER_SIZE: { x: 1, y: 2, z: 1 },
  WALL_COLLIDER_HEIGHT: 1,

  // Log a per-system breakdown when a tick takes longer than this
  TICK_BUDGET_MS: 10,
} as const;
