// ============================================
// Patrol System
// Feeds patrol waypoints to navigators
// ============================================

import { isComponentEnabled, type Entity, type Vec2, type World } from '@stationfall/shared';
import type { System } from './types';
import { Patrol, Pathfinder, Transform } from '../components';

function samePoint(a: Vec2, b: Vec2): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * PatrolSystem - Hands each patrolling navigator its next waypoint
 *
 * A patrol starts at its first waypoint. It moves on when the navigator
 * arrives, or when its target was dropped because no route existed. Arriving
 * at a point the route would only hand out again leaves the target alone.
 */
export class PatrolSystem implements System {
  readonly name = 'PatrolSystem';

  update(world: World, _deltaTime: number): void {
    const assignments: Array<{ entity: Entity; advance: boolean }> = [];

    for (const [entity, patrol, pathfinder, transform] of world.query3(Patrol, Pathfinder, Transform)) {
      if (!isComponentEnabled(patrol) || !isComponentEnabled(pathfinder)) continue;
      if (patrol.waypoints.length === 0) continue;

      if (!patrol.started) {
        assignments.push({ entity, advance: false });
      } else if (!pathfinder.target) {
        assignments.push({ entity, advance: true });
      } else if (pathfinder.hasReachedTarget(transform.floorPosition())) {
        // A route that loops back onto the same point has nothing new to search
        const next = patrol.peekNext();
        if (next && !samePoint(next, pathfinder.target)) {
          assignments.push({ entity, advance: true });
        }
      }
    }

    for (const { entity, advance } of assignments) {
      const patrol = world.getMut(entity, Patrol);
      const pathfinder = world.getMut(entity, Pathfinder);
      if (!patrol || !pathfinder) continue;

      const next: Vec2 | undefined = advance ? patrol.advance() : patrol.currentTarget();
      if (!next) continue;

      patrol.started = true;
      pathfinder.setTarget(next);
    }
  }
}
