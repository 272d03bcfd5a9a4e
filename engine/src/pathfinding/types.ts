// ============================================
// Pathfinding Types
// ============================================

import type { Vec2 } from '@stationfall/shared';

/**
 * Grid cell as (x, y) column/row indices.
 */
export type GridCell = readonly [number, number];

/**
 * Outcome of one A* search.
 *
 * `path` excludes the start position: it lists the cell centres of every
 * step after the start cell and ends with the exact goal coordinate.
 * `exploredNodes` lists cells in the order they were expanded, including
 * on failure. Blocked endpoints yield found=false with both lists empty.
 */
export interface PathfindingResult {
  path: Vec2[];
  exploredNodes: GridCell[];
  found: boolean;
}

/**
 * Open-set entry, ordered by fCost.
 */
export interface AStarNode {
  cell: GridCell;
  gCost: number;
  hCost: number;
  fCost: number;
  parent: GridCell | undefined;
}
