// ============================================
// Navigation Components
// A* path following and patrol routes
// ============================================

import { distance2D, ENGINE_CONFIG, vec2, type Vec2 } from '@stationfall/shared';
import type { GridCell, PathfindingResult } from '../../pathfinding/types';
import { ToggleableComponent } from './core';

/**
 * Pathfinder - lets an entity walk an A* route toward a target.
 *
 * The component only holds route state. PathfindingSystem runs the search
 * when `needsRecalculation` is set and steers the entity's Transform along
 * `currentPath`. Callers that need to bound search cost per frame decide
 * when to set targets; the flag is the only throttle.
 *
 * A disabled Pathfinder ignores new targets, reports no next position and
 * never reports arrival.
 */
export class Pathfinder extends ToggleableComponent {
  target: Vec2 | undefined = undefined;
  currentPath: Vec2[] = [];
  pathIndex = 0;
  stuckTime = 0;
  lastPosition: Vec2 = vec2();
  needsRecalculation = false;
  exploredNodes: GridCell[] = [];

  constructor(
    public movementSpeed: number = ENGINE_CONFIG.PATHFINDER_MOVEMENT_SPEED,
    public rotationSpeed: number = ENGINE_CONFIG.PATHFINDER_ROTATION_SPEED,
    public arrivalThreshold: number = ENGINE_CONFIG.PATHFINDER_ARRIVAL_THRESHOLD
  ) {
    super();
  }

  /**
   * Set a new target and request a fresh search.
   */
  setTarget(target: Vec2): void {
    if (!this.enabled) return;

    this.target = { x: target.x, y: target.y };
    this.needsRecalculation = true;
    this.pathIndex = 0;
    this.stuckTime = 0;
  }

  hasReachedTarget(currentPosition: Vec2): boolean {
    if (!this.enabled || !this.target) return false;
    return distance2D(currentPosition, this.target) < this.arrivalThreshold;
  }

  /**
   * Next waypoint to steer toward; falls back to the target once the path
   * is exhausted.
   */
  nextPosition(): Vec2 | undefined {
    if (!this.enabled) return undefined;
    if (this.pathIndex < this.currentPath.length) {
      return this.currentPath[this.pathIndex];
    }
    return this.target;
  }

  advancePathStep(): void {
    if (!this.enabled) return;
    if (this.pathIndex < this.currentPath.length) {
      this.pathIndex += 1;
    }
  }

  /**
   * Store a search result. A failed search drops the target entirely.
   */
  applyResult(result: PathfindingResult): void {
    if (!result.found) {
      this.clearPath();
      return;
    }
    this.currentPath = result.path;
    this.exploredNodes = result.exploredNodes;
    this.pathIndex = 0;
    this.needsRecalculation = false;
  }

  clearPath(): void {
    this.currentPath = [];
    this.pathIndex = 0;
    this.target = undefined;
    this.needsRecalculation = false;
    this.exploredNodes = [];
  }
}

/**
 * Patrol - cycles a Pathfinder through a fixed list of waypoints.
 * PatrolSystem hands out the next waypoint once the current one is reached
 * or its route has run out.
 */
export class Patrol extends ToggleableComponent {
  currentWaypoint = 0;
  started = false;

  constructor(public readonly waypoints: readonly Vec2[]) {
    super();
  }

  currentTarget(): Vec2 | undefined {
    return this.waypoints[this.currentWaypoint];
  }

  /**
   * The waypoint advance() would move to, without moving.
   */
  peekNext(): Vec2 | undefined {
    if (this.waypoints.length === 0) return undefined;
    return this.waypoints[(this.currentWaypoint + 1) % this.waypoints.length];
  }

  /**
   * Move to the next waypoint, wrapping at the end. Returns the new target.
   */
  advance(): Vec2 | undefined {
    if (this.waypoints.length === 0) return undefined;
    this.currentWaypoint = (this.currentWaypoint + 1) % this.waypoints.length;
    return this.waypoints[this.currentWaypoint];
  }
}
