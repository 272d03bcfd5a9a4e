export { PathfindingAlgorithms } from './PathfindingAlgorithms';
export { MinHeap } from './MinHeap';
export type { PathfindingResult, GridCell, AStarNode } from './types';
