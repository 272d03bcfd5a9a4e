// ============================================
// Pathfinding System
// Runs A* for navigators that need a route and steers them along it
// ============================================

import {
  degToRad,
  distance2D,
  ENGINE_CONFIG,
  isComponentEnabled,
  normalizeAngle,
  type Entity,
  type Vec2,
  type World,
} from '@stationfall/shared';
import type { System } from './types';
import { Pathfinder, Transform } from '../components';
import { checkGridCollision } from '../../collision/queries';
import type { PathfindingAlgorithms } from '../../pathfinding/PathfindingAlgorithms';
import type { PathfindingResult } from '../../pathfinding/types';
import { logNavigatorStuck, logPathFailed, logPathFound } from '../../logger';

/**
 * Everything one navigator should change this tick, computed without
 * touching the World.
 */
interface NavigationPlan {
  entity: Entity;
  from: Vec2;
  search: { result: PathfindingResult; target: Vec2 } | undefined;
  advanceStep: boolean;
  rotationY: number | undefined;
  position: Vec2 | undefined;
  stuckTime: number | undefined;
  lastPosition: Vec2 | undefined;
  unstuck: boolean;
}

/**
 * PathfindingSystem - A* search plus waypoint steering
 *
 * Pass 1 reads every enabled Pathfinder + Transform pair, runs any pending
 * searches and plans turning, movement and stuck recovery against the
 * unchanged World. Pass 2 writes the plans back. Navigators therefore see
 * each other's positions from the start of the tick.
 */
export class PathfindingSystem implements System {
  readonly name = 'PathfindingSystem';

  constructor(private readonly pathfinding: PathfindingAlgorithms) {}

  update(world: World, deltaTime: number): void {
    const plans: NavigationPlan[] = [];

    for (const [entity, pathfinder, transform] of world.query2(Pathfinder, Transform)) {
      if (!isComponentEnabled(pathfinder) || !isComponentEnabled(transform)) continue;
      plans.push(this.plan(world, entity, pathfinder, transform, deltaTime));
    }

    for (const plan of plans) {
      this.apply(world, plan);
    }
  }

  private plan(
    world: World,
    entity: Entity,
    pathfinder: Readonly<Pathfinder>,
    transform: Readonly<Transform>,
    deltaTime: number
  ): NavigationPlan {
    const from: Vec2 = { x: transform.position.x, y: transform.position.z };
    const plan: NavigationPlan = {
      entity,
      from,
      search: undefined,
      advanceStep: false,
      rotationY: undefined,
      position: undefined,
      stuckTime: undefined,
      lastPosition: undefined,
      unstuck: false,
    };

    let path: readonly Vec2[] = pathfinder.currentPath;
    let pathIndex = pathfinder.pathIndex;
    const target = pathfinder.target;

    if (pathfinder.needsRecalculation && target) {
      const result = this.pathfinding.findPathWithEcs(from, target, world);
      plan.search = { result, target };
      if (!result.found) return plan;
      path = result.path;
      pathIndex = 0;
    }

    const next = pathIndex < path.length ? path[pathIndex] : target;
    if (!next) return plan;

    const dx = next.x - from.x;
    const dz = next.y - from.y;
    if (Math.sqrt(dx * dx + dz * dz) < pathfinder.arrivalThreshold) {
      plan.advanceStep = true;
      return plan;
    }

    // Turn toward the waypoint, capped by rotation speed
    const targetAngle = Math.atan2(dz, dx);
    const currentRotation = transform.rotation.y;
    const angleDiff = normalizeAngle(targetAngle - currentRotation);
    const maxTurn = pathfinder.rotationSpeed * deltaTime;

    let rotationY: number;
    if (Math.abs(angleDiff) < maxTurn) {
      rotationY = targetAngle;
    } else if (angleDiff > 0) {
      rotationY = currentRotation + maxTurn;
    } else {
      rotationY = currentRotation - maxTurn;
    }
    plan.rotationY = rotationY;

    // Only walk forward once roughly facing the waypoint
    let position = from;
    if (Math.abs(angleDiff) < degToRad(ENGINE_CONFIG.PATHFINDER_FACING_THRESHOLD_DEG)) {
      const step = pathfinder.movementSpeed * deltaTime;
      const candidate = { x: from.x + Math.cos(rotationY) * step, y: from.y + Math.sin(rotationY) * step };
      if (!checkGridCollision(world, candidate.x, candidate.y)) {
        position = candidate;
        plan.position = candidate;
      }
    }

    // Stuck detection compares tick-start positions
    const moved = distance2D(from, pathfinder.lastPosition);
    const stuckTime = pathfinder.stuckTime + deltaTime;
    const noProgress = moved < ENGINE_CONFIG.PATHFINDER_STUCK_EPSILON;

    if (noProgress && stuckTime > ENGINE_CONFIG.PATHFINDER_STUCK_TIME) {
      const sidestepAngle = rotationY + degToRad(ENGINE_CONFIG.PATHFINDER_UNSTICK_ANGLE_DEG);
      const sidestep = {
        x: position.x + Math.cos(sidestepAngle) * ENGINE_CONFIG.PATHFINDER_UNSTICK_DISTANCE,
        y: position.y + Math.sin(sidestepAngle) * ENGINE_CONFIG.PATHFINDER_UNSTICK_DISTANCE,
      };
      if (!checkGridCollision(world, sidestep.x, sidestep.y)) {
        plan.position = sidestep;
      }
      plan.unstuck = true;
      plan.stuckTime = 0;
    } else {
      plan.stuckTime = noProgress ? stuckTime : 0;
    }
    plan.lastPosition = from;

    return plan;
  }

  private apply(world: World, plan: NavigationPlan): void {
    const pathfinder = world.getMut(plan.entity, Pathfinder);
    const transform = world.getMut(plan.entity, Transform);
    if (!pathfinder || !transform) return;

    if (plan.search) {
      const { result, target } = plan.search;
      pathfinder.applyResult(result);
      if (result.found) {
        logPathFound(plan.entity, result.path.length, result.exploredNodes.length);
      } else {
        logPathFailed(plan.entity, plan.from, target);
      }
    }

    if (plan.advanceStep) {
      pathfinder.advancePathStep();
    }

    if (plan.rotationY !== undefined) {
      transform.rotation.y = plan.rotationY;
    }

    if (plan.position) {
      transform.position.x = plan.position.x;
      transform.position.z = plan.position.y;
    }

    if (plan.stuckTime !== undefined) {
      pathfinder.stuckTime = plan.stuckTime;
    }

    if (plan.lastPosition) {
      pathfinder.lastPosition = plan.lastPosition;
    }

    if (plan.unstuck) {
      pathfinder.needsRecalculation = true;
      logNavigatorStuck(plan.entity, plan.from);
    }
  }
}
