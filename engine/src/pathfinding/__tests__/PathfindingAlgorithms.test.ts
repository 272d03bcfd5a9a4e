// ============================================
// A* Pathfinding Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { GridMap, vec2, vec3, type Vec2, type World } from '@stationfall/shared';
import { PathfindingAlgorithms } from '../PathfindingAlgorithms';
import { setCollidersEnabled } from '../../collision/queries';
import { addBox, addCellBlocker, createRoomMap, createTestWorld } from '../../__tests__/testUtils';

function manhattanStep(a: Vec2, b: Vec2): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

describe('PathfindingAlgorithms', () => {
  let world: World;

  beforeEach(() => {
    world = createTestWorld();
  });

  describe('open 10x10 room', () => {
    const pathfinding = new PathfindingAlgorithms(createRoomMap(10));

    it('finds an optimal 4-directional route corner to corner', () => {
      const result = pathfinding.findPathWithEcs(vec2(1.5, 1.5), vec2(8.5, 8.5), world);

      expect(result.found).toBe(true);
      // 14 cell centres after the start cell, then the exact goal
      expect(result.path).toHaveLength(15);
      expect(result.path[13]).toEqual({ x: 8.5, y: 8.5 });
      expect(result.path[14]).toEqual({ x: 8.5, y: 8.5 });

      // Start is not part of the route; first step is a neighbour of it
      expect(manhattanStep(vec2(1.5, 1.5), result.path[0])).toBe(1);
      for (let i = 1; i < 14; i++) {
        expect(manhattanStep(result.path[i - 1], result.path[i])).toBe(1);
      }
    });

    it('explores from the start cell and includes the goal cell', () => {
      const result = pathfinding.findPathWithEcs(vec2(1.5, 1.5), vec2(8.5, 8.5), world);

      expect(result.exploredNodes[0]).toEqual([1, 1]);
      expect(result.exploredNodes).toContainEqual([8, 8]);
      // Each cell is expanded at most once
      const keys = new Set(result.exploredNodes.map(([x, y]) => `${x},${y}`));
      expect(keys.size).toBe(result.exploredNodes.length);
    });

    it('keeps the exact goal and drops the exact start', () => {
      const result = pathfinding.findPath(vec2(1.2, 1.9), vec2(3.7, 1.1));

      expect(result.found).toBe(true);
      expect(result.path).toEqual([
        { x: 2.5, y: 1.5 },
        { x: 3.5, y: 1.5 },
        { x: 3.7, y: 1.1 },
      ]);
    });

    it('returns just the goal when start and goal share a cell', () => {
      const result = pathfinding.findPath(vec2(1.5, 1.5), vec2(1.7, 1.2));

      expect(result.found).toBe(true);
      expect(result.path).toEqual([{ x: 1.7, y: 1.2 }]);
      expect(result.exploredNodes).toEqual([[1, 1]]);
    });
  });

  describe('blocked endpoints', () => {
    const pathfinding = new PathfindingAlgorithms(createRoomMap(10));

    it('fails without searching when the start is in a wall', () => {
      const result = pathfinding.findPathWithEcs(vec2(0.5, 0.5), vec2(8.5, 8.5), world);
      expect(result).toEqual({ path: [], exploredNodes: [], found: false });
    });

    it('fails without searching when the goal is outside the map', () => {
      const result = pathfinding.findPath(vec2(1.5, 1.5), vec2(20, 20));
      expect(result).toEqual({ path: [], exploredNodes: [], found: false });
    });

    it('treats an ECS collider on the goal cell as blocked', () => {
      addCellBlocker(world, 5, 5);

      expect(pathfinding.findPathWithEcs(vec2(1.5, 1.5), vec2(5.5, 5.5), world)).toEqual({
        path: [],
        exploredNodes: [],
        found: false,
      });
      // The static-only search ignores colliders
      expect(pathfinding.findPath(vec2(1.5, 1.5), vec2(5.5, 5.5)).found).toBe(true);
    });
  });

  describe('dynamic obstacles', () => {
    // 3x2 open interior
    const map = GridMap.fromRows(['11111', '10001', '10001', '11111']);
    const pathfinding = new PathfindingAlgorithms(map);

    it('goes straight when nothing is in the way', () => {
      const result = pathfinding.findPathWithEcs(vec2(1.5, 1.5), vec2(3.5, 1.5), world);
      expect(result.path).toEqual([
        { x: 2.5, y: 1.5 },
        { x: 3.5, y: 1.5 },
        { x: 3.5, y: 1.5 },
      ]);
    });

    it('detours around a blocking collider', () => {
      addCellBlocker(world, 2, 1);

      const result = pathfinding.findPathWithEcs(vec2(1.5, 1.5), vec2(3.5, 1.5), world);

      expect(result.found).toBe(true);
      expect(result.path).toEqual([
        { x: 1.5, y: 2.5 },
        { x: 2.5, y: 2.5 },
        { x: 3.5, y: 2.5 },
        { x: 3.5, y: 1.5 },
        { x: 3.5, y: 1.5 },
      ]);
    });

    it('ignores disabled colliders and triggers', () => {
      const pillar = addCellBlocker(world, 2, 1);
      addBox(world, vec3(2.5, 1, 2.5), vec3(1, 2, 1), { trigger: true });
      setCollidersEnabled(world, [pillar], false);

      const result = pathfinding.findPathWithEcs(vec2(1.5, 1.5), vec2(3.5, 1.5), world);
      expect(result.path).toHaveLength(3);
    });

    it('reports explored cells when no route exists', () => {
      addCellBlocker(world, 2, 1);
      addCellBlocker(world, 2, 2);

      const result = pathfinding.findPathWithEcs(vec2(1.5, 1.5), vec2(3.5, 1.5), world);

      expect(result.found).toBe(false);
      expect(result.path).toEqual([]);
      expect(result.exploredNodes).toHaveLength(2);
      expect(result.exploredNodes).toContainEqual([1, 1]);
      expect(result.exploredNodes).toContainEqual([1, 2]);
    });
  });

  describe('isCellBlocked', () => {
    it('combines map walls and colliders', () => {
      const pathfinding = new PathfindingAlgorithms(createRoomMap(5));
      addCellBlocker(world, 2, 2);

      expect(pathfinding.isCellBlocked(0, 0, world)).toBe(true);
      expect(pathfinding.isCellBlocked(2, 2, world)).toBe(true);
      expect(pathfinding.isCellBlocked(1, 1, world)).toBe(false);
    });
  });

  describe('updateMap', () => {
    it('searches the new layout afterwards', () => {
      const pathfinding = new PathfindingAlgorithms(createRoomMap(10));
      const closed = GridMap.fromRows(['11111', '10101', '11111']);

      expect(pathfinding.findPath(vec2(1.5, 1.5), vec2(3.5, 1.5)).found).toBe(true);

      pathfinding.updateMap(closed);

      expect(pathfinding.map).toBe(closed);
      expect(pathfinding.findPath(vec2(1.5, 1.5), vec2(3.5, 1.5)).found).toBe(false);
    });
  });
});
