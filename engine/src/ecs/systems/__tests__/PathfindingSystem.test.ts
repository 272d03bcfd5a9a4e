// ============================================
// PathfindingSystem Unit Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { vec2, vec3, type Entity, type World } from '@stationfall/shared';
import { PathfindingSystem } from '../PathfindingSystem';
import { PathfindingAlgorithms } from '../../../pathfinding/PathfindingAlgorithms';
import { createNavigator, requirePathfinder, requireTransform } from '../../factories';
import { addBox, createRoomMap, createTestWorld } from '../../../__tests__/testUtils';
import { logNavigatorStuck, logPathFailed, logPathFound } from '../../../logger';

describe('PathfindingSystem', () => {
  let world: World;
  let system: PathfindingSystem;
  let navigator: Entity;

  beforeEach(() => {
    vi.clearAllMocks();
    world = createTestWorld();
    system = new PathfindingSystem(new PathfindingAlgorithms(createRoomMap(10)));
    navigator = createNavigator(world, vec2(1.5, 1.5));
  });

  describe('route planning', () => {
    it('searches when a target is set and starts walking', () => {
      requirePathfinder(world, navigator).setTarget(vec2(3.5, 1.5));

      system.update(world, 0.1);

      const pathfinder = requirePathfinder(world, navigator);
      expect(pathfinder.needsRecalculation).toBe(false);
      expect(pathfinder.currentPath).toEqual([
        { x: 2.5, y: 1.5 },
        { x: 3.5, y: 1.5 },
        { x: 3.5, y: 1.5 },
      ]);
      expect(logPathFound).toHaveBeenCalledWith(navigator, 3, expect.any(Number));

      // Already facing +X, so it moves movementSpeed * dt straight ahead
      const transform = requireTransform(world, navigator);
      expect(transform.position.x).toBeCloseTo(1.7, 10);
      expect(transform.position.z).toBe(1.5);
      expect(transform.rotation.y).toBe(0);
    });

    it('drops the target when no route exists', () => {
      requirePathfinder(world, navigator).setTarget(vec2(0.5, 0.5));

      system.update(world, 0.1);

      const pathfinder = requirePathfinder(world, navigator);
      expect(pathfinder.target).toBeUndefined();
      expect(pathfinder.currentPath).toEqual([]);
      expect(pathfinder.needsRecalculation).toBe(false);
      expect(logPathFailed).toHaveBeenCalledWith(navigator, { x: 1.5, y: 1.5 }, { x: 0.5, y: 0.5 });
      expect(requireTransform(world, navigator).position.x).toBe(1.5);
    });

    it('walks the route until it reaches the target', () => {
      requirePathfinder(world, navigator).setTarget(vec2(3.5, 1.5));

      for (let i = 0; i < 40; i++) {
        system.update(world, 0.1);
      }

      const transform = requireTransform(world, navigator);
      const pathfinder = requirePathfinder(world, navigator);
      expect(pathfinder.hasReachedTarget(transform.floorPosition())).toBe(true);
      expect(pathfinder.pathIndex).toBe(3);
      expect(transform.position.x).toBeGreaterThan(3.05);
      expect(transform.position.x).toBeLessThanOrEqual(3.5);
      expect(transform.position.z).toBe(1.5);
    });
  });

  describe('steering', () => {
    it('turns in place when facing away from the waypoint', () => {
      requirePathfinder(world, navigator).setTarget(vec2(1.5, 5.5));

      system.update(world, 0.1);

      // Waypoint is at +90 degrees; max turn is rotationSpeed * dt = 0.5
      const transform = requireTransform(world, navigator);
      expect(transform.rotation.y).toBeCloseTo(0.5, 10);
      expect(transform.position).toEqual({ x: 1.5, y: 0.6, z: 1.5 });
    });

    it('does nothing for a disabled pathfinder', () => {
      const pathfinder = requirePathfinder(world, navigator);
      pathfinder.setTarget(vec2(3.5, 1.5));
      pathfinder.disable();

      system.update(world, 0.1);

      expect(pathfinder.needsRecalculation).toBe(true);
      expect(requireTransform(world, navigator).position.x).toBe(1.5);
    });
  });

  describe('stuck recovery', () => {
    beforeEach(() => {
      // Thin blocker between the navigator and its waypoint
      addBox(world, vec3(2, 1, 1.5), vec3(0.2, 2, 1));

      const pathfinder = requirePathfinder(world, navigator);
      pathfinder.target = vec2(2.5, 1.5);
      pathfinder.currentPath = [vec2(2.5, 1.5)];
      pathfinder.needsRecalculation = false;
    });

    it('accumulates time while blocked', () => {
      for (let i = 0; i < 3; i++) {
        system.update(world, 0.25);
      }

      const pathfinder = requirePathfinder(world, navigator);
      expect(pathfinder.stuckTime).toBe(0.5);
      expect(pathfinder.lastPosition).toEqual({ x: 1.5, y: 1.5 });
      expect(logNavigatorStuck).not.toHaveBeenCalled();
      expect(requireTransform(world, navigator).position.x).toBe(1.5);
    });

    it('side-steps and asks for a new route after the stuck timeout', () => {
      for (let i = 0; i < 4; i++) {
        system.update(world, 0.25);
      }

      const pathfinder = requirePathfinder(world, navigator);
      const transform = requireTransform(world, navigator);
      const offset = 0.1 * Math.cos(Math.PI / 4);

      expect(transform.position.x).toBeCloseTo(1.5 + offset, 10);
      expect(transform.position.z).toBeCloseTo(1.5 + offset, 10);
      expect(pathfinder.needsRecalculation).toBe(true);
      expect(pathfinder.stuckTime).toBe(0);
      expect(logNavigatorStuck).toHaveBeenCalledTimes(1);
    });
  });
});
