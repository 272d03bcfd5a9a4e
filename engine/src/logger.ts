import pino from 'pino';
import type { Entity, Vec2 } from '@stationfall/shared';
import { formatEntity } from '@stationfall/shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR;
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console output and optional rotating file output.
 * File output (pino-roll) is only enabled when LOG_DIR is set; the engine
 * itself never writes anything else to disk.
 * @param filename - Log file name (e.g., 'engine.log')
 * @param component - Component name for filtering (e.g., 'engine', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  } else {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino/file',
      options: { destination: 1 }, // stdout, JSON lines
    });
  }

  if (LOG_DIR) {
    targets.push({
      level: 'info',
      target: 'pino-roll',
      options: {
        file: `${LOG_DIR}/${filename}`,
        size: '10m',         // Rotate at 10MB
        limit: { count: 5 }, // Keep last 5 rotated files
        mkdir: true,
      },
    });
  }

  return pino(
    {
      level: LOG_LEVEL,
      base: { component }, // Add component field to all log entries
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Simulation events (spawns, map changes, navigation)
export const logger = createLogger('engine.log', 'engine');

// Performance metrics (slow ticks, search sizes)
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Simulation Events
// ============================================

/**
 * Log static geometry population
 */
export function logEntitiesPopulated(walls: number, total: number) {
  logger.info(
    { walls, total, event: 'entities_populated' },
    `Populated world with ${walls} wall colliders (${total} entities)`
  );
}

/**
 * Log a map swap
 */
export function logMapUpdated(width: number, height: number) {
  logger.info({ width, height, event: 'map_updated' }, `Map updated to ${width}x${height}`);
}

/**
 * Log a successful path search for a navigator
 */
export function logPathFound(entity: Entity, steps: number, explored: number) {
  logger.debug(
    { entity: formatEntity(entity), steps, explored, event: 'path_found' },
    `A* found path with ${steps} steps, explored ${explored} nodes`
  );
}

/**
 * Log a failed path search for a navigator
 */
export function logPathFailed(entity: Entity, from: Vec2, to: Vec2) {
  logger.info(
    { entity: formatEntity(entity), from, to, event: 'path_failed' },
    `A* found no path from (${from.x.toFixed(1)}, ${from.y.toFixed(1)}) to (${to.x.toFixed(1)}, ${to.y.toFixed(1)})`
  );
}

/**
 * Log a navigator that stopped making progress
 */
export function logNavigatorStuck(entity: Entity, position: Vec2) {
  logger.warn(
    { entity: formatEntity(entity), position, event: 'navigator_stuck' },
    `Navigator stuck at (${position.x.toFixed(2)}, ${position.y.toFixed(2)}), trying side-step`
  );
}
