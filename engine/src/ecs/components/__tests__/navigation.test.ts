import { describe, it, expect } from 'vitest';
import { ENGINE_CONFIG, vec2 } from '@stationfall/shared';
import { Pathfinder, Patrol } from '../navigation';

describe('Pathfinder', () => {
  it('uses engine defaults', () => {
    const pathfinder = new Pathfinder();
    expect(pathfinder.movementSpeed).toBe(ENGINE_CONFIG.PATHFINDER_MOVEMENT_SPEED);
    expect(pathfinder.rotationSpeed).toBe(ENGINE_CONFIG.PATHFINDER_ROTATION_SPEED);
    expect(pathfinder.arrivalThreshold).toBe(ENGINE_CONFIG.PATHFINDER_ARRIVAL_THRESHOLD);
    expect(pathfinder.target).toBeUndefined();
    expect(pathfinder.needsRecalculation).toBe(false);
  });

  it('copies the target and resets progress', () => {
    const pathfinder = new Pathfinder();
    pathfinder.pathIndex = 2;
    pathfinder.stuckTime = 0.3;
    const target = vec2(4.5, 2.5);

    pathfinder.setTarget(target);
    target.x = 0;

    expect(pathfinder.target).toEqual({ x: 4.5, y: 2.5 });
    expect(pathfinder.needsRecalculation).toBe(true);
    expect(pathfinder.pathIndex).toBe(0);
    expect(pathfinder.stuckTime).toBe(0);
  });

  it('ignores new targets while disabled', () => {
    const pathfinder = new Pathfinder().withEnabled(false);
    pathfinder.setTarget(vec2(4.5, 2.5));

    expect(pathfinder.target).toBeUndefined();
    expect(pathfinder.needsRecalculation).toBe(false);
    expect(pathfinder.nextPosition()).toBeUndefined();
  });

  it('reports arrival strictly inside the threshold', () => {
    const pathfinder = new Pathfinder(2, 5, 0.5);
    expect(pathfinder.hasReachedTarget(vec2())).toBe(false);

    pathfinder.setTarget(vec2(1, 0));
    expect(pathfinder.hasReachedTarget(vec2(0.6, 0))).toBe(true);
    expect(pathfinder.hasReachedTarget(vec2(0.5, 0))).toBe(false);

    pathfinder.disable();
    expect(pathfinder.hasReachedTarget(vec2(1, 0))).toBe(false);
  });

  it('walks the path then falls back to the target', () => {
    const pathfinder = new Pathfinder();
    pathfinder.setTarget(vec2(3.7, 1.1));
    pathfinder.applyResult({
      path: [vec2(2.5, 1.5), vec2(3.7, 1.1)],
      exploredNodes: [[1, 1], [2, 1], [3, 1]],
      found: true,
    });

    expect(pathfinder.needsRecalculation).toBe(false);
    expect(pathfinder.exploredNodes).toHaveLength(3);
    expect(pathfinder.nextPosition()).toEqual({ x: 2.5, y: 1.5 });

    pathfinder.advancePathStep();
    pathfinder.advancePathStep();
    pathfinder.advancePathStep();

    expect(pathfinder.pathIndex).toBe(2);
    expect(pathfinder.nextPosition()).toEqual({ x: 3.7, y: 1.1 });
  });

  it('drops the target on a failed search', () => {
    const pathfinder = new Pathfinder();
    pathfinder.setTarget(vec2(3.5, 1.5));
    pathfinder.applyResult({ path: [], exploredNodes: [[1, 1]], found: false });

    expect(pathfinder.target).toBeUndefined();
    expect(pathfinder.currentPath).toEqual([]);
    expect(pathfinder.exploredNodes).toEqual([]);
    expect(pathfinder.needsRecalculation).toBe(false);
    expect(pathfinder.nextPosition()).toBeUndefined();
  });
});

describe('Patrol', () => {
  it('cycles through its waypoints', () => {
    const patrol = new Patrol([vec2(1, 1), vec2(2, 2), vec2(3, 3)]);

    expect(patrol.currentTarget()).toEqual({ x: 1, y: 1 });
    expect(patrol.advance()).toEqual({ x: 2, y: 2 });
    expect(patrol.advance()).toEqual({ x: 3, y: 3 });
    expect(patrol.advance()).toEqual({ x: 1, y: 1 });
    expect(patrol.currentWaypoint).toBe(0);
  });

  it('peeks at the next waypoint without moving', () => {
    const patrol = new Patrol([vec2(1, 1), vec2(2, 2)]);

    expect(patrol.peekNext()).toEqual({ x: 2, y: 2 });
    expect(patrol.currentWaypoint).toBe(0);

    patrol.advance();
    expect(patrol.peekNext()).toEqual({ x: 1, y: 1 });
    expect(new Patrol([vec2(3, 3)]).peekNext()).toEqual({ x: 3, y: 3 });
  });

  it('has nothing to offer without waypoints', () => {
    const patrol = new Patrol([]);
    expect(patrol.currentTarget()).toBeUndefined();
    expect(patrol.advance()).toBeUndefined();
    expect(patrol.peekNext()).toBeUndefined();
  });
});
