// ============================================
// A* Pathfinding
// Grid search over the static map plus live ECS colliders
// ============================================

import type { GridMapView, Vec2, World } from '@stationfall/shared';
import { checkGridCollision } from '../collision/queries';
import { logger } from '../logger';
import { MinHeap } from './MinHeap';
import type { AStarNode, GridCell, PathfindingResult } from './types';

// 4-directional movement, unit cost per step
const NEIGHBOR_OFFSETS: ReadonlyArray<GridCell> = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];

function manhattan(a: GridCell, b: GridCell): number {
  return Math.abs(a[0] - b[0]) + Math.abs(a[1] - b[1]);
}

/**
 * A* search service shared by the navigation systems.
 *
 * Every call runs a complete search synchronously. Searches never throw:
 * no route and blocked endpoints both come back as found=false.
 */
export class PathfindingAlgorithms {
  constructor(private currentMap: GridMapView) {}

  get map(): GridMapView {
    return this.currentMap;
  }

  updateMap(map: GridMapView): void {
    this.currentMap = map;
  }

  /**
   * Search against static walls only.
   */
  findPath(start: Vec2, goal: Vec2): PathfindingResult {
    return this.search(start, goal, (x, y) => this.currentMap.isWall(x, y));
  }

  /**
   * Search against static walls and every blocking collider in the World.
   */
  findPathWithEcs(start: Vec2, goal: Vec2, world: World): PathfindingResult {
    return this.search(start, goal, (x, y) => this.isCellBlocked(x, y, world));
  }

  /**
   * A cell is blocked if the map has a wall there or a collider occupies
   * its world-space centre.
   */
  isCellBlocked(x: number, y: number, world: World): boolean {
    if (this.currentMap.isWall(x, y)) return true;
    const [worldX, worldZ] = this.currentMap.gridToWorld(x, y);
    return checkGridCollision(world, worldX, worldZ);
  }

  private search(start: Vec2, goal: Vec2, isBlocked: (x: number, y: number) => boolean): PathfindingResult {
    const map = this.currentMap;
    const startCell: GridCell = map.worldToGrid(start.x, start.y);
    const goalCell: GridCell = map.worldToGrid(goal.x, goal.y);

    if (isBlocked(startCell[0], startCell[1]) || isBlocked(goalCell[0], goalCell[1])) {
      logger.debug(
        { start: startCell, goal: goalCell, explored: 0, found: false, event: 'pathfinding_complete' },
        'A* skipped: start or goal cell is blocked'
      );
      return { path: [], exploredNodes: [], found: false };
    }

    const key = (cell: GridCell): number => cell[1] * map.width + cell[0];

    const openSet = new MinHeap<AStarNode>((node) => node.fCost);
    const closedSet = new Set<number>();
    const cameFrom = new Map<number, GridCell>();
    const gScore = new Map<number, number>();
    const exploredNodes: GridCell[] = [];

    const startH = manhattan(startCell, goalCell);
    openSet.push({ cell: startCell, gCost: 0, hCost: startH, fCost: startH, parent: undefined });
    gScore.set(key(startCell), 0);

    for (let current = openSet.pop(); current !== undefined; current = openSet.pop()) {
      const currentKey = key(current.cell);
      // Superseded entry for a cell already expanded at lower cost
      if (closedSet.has(currentKey)) continue;

      exploredNodes.push(current.cell);

      if (current.cell[0] === goalCell[0] && current.cell[1] === goalCell[1]) {
        const path = this.reconstructPath(cameFrom, current.cell, start, goal, key);
        logger.debug(
          { steps: path.length, explored: exploredNodes.length, found: true, event: 'pathfinding_complete' },
          `A* found path with ${path.length} waypoints`
        );
        return { path, exploredNodes, found: true };
      }

      closedSet.add(currentKey);

      for (const [dx, dy] of NEIGHBOR_OFFSETS) {
        const neighbor: GridCell = [current.cell[0] + dx, current.cell[1] + dy];
        if (neighbor[0] < 0 || neighbor[1] < 0 || neighbor[0] >= map.width || neighbor[1] >= map.height) {
          continue;
        }

        const neighborKey = key(neighbor);
        if (closedSet.has(neighborKey)) continue;
        if (isBlocked(neighbor[0], neighbor[1])) continue;

        const tentativeG = current.gCost + 1;
        const knownG = gScore.get(neighborKey);
        if (knownG !== undefined && tentativeG >= knownG) continue;

        cameFrom.set(neighborKey, current.cell);
        gScore.set(neighborKey, tentativeG);

        const h = manhattan(neighbor, goalCell);
        openSet.push({ cell: neighbor, gCost: tentativeG, hCost: h, fCost: tentativeG + h, parent: current.cell });
      }
    }

    logger.debug(
      { start: startCell, goal: goalCell, explored: exploredNodes.length, found: false, event: 'pathfinding_complete' },
      `A* exhausted open set after ${exploredNodes.length} nodes`
    );
    return { path: [], exploredNodes, found: false };
  }

  /**
   * Walk came-from back to the start cell. The list is built goal-first:
   * the exact goal, then the centre of every cell that has a predecessor,
   * then the exact start. Reversed, with the start dropped.
   */
  private reconstructPath(
    cameFrom: ReadonlyMap<number, GridCell>,
    goalCell: GridCell,
    start: Vec2,
    goal: Vec2,
    key: (cell: GridCell) => number
  ): Vec2[] {
    const path: Vec2[] = [{ x: goal.x, y: goal.y }];

    let current = goalCell;
    for (let parent = cameFrom.get(key(current)); parent !== undefined; parent = cameFrom.get(key(current))) {
      const [worldX, worldZ] = this.currentMap.gridToWorld(current[0], current[1]);
      path.push({ x: worldX, y: worldZ });
      current = parent;
    }

    path.push({ x: start.x, y: start.y });
    path.reverse();
    path.shift();
    return path;
  }
}
