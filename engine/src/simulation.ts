// ============================================
// Simulation
// Owns the World and everything that steps it once per tick
// ============================================

import { GridMap, World, type Entity, type Vec2, type Vec3 } from '@stationfall/shared';
import { PathfindingAlgorithms } from './pathfinding/PathfindingAlgorithms';
import {
  PathfindingSystem,
  PatrolSystem,
  PhysicsSystem,
  SystemPriority,
  SystemRunner,
  type TickReport,
} from './ecs/systems';
import { createNavigator, createPlayer, populateWalls, type NavigatorOptions } from './ecs/factories';
import { logEntitiesPopulated, logMapUpdated } from './logger';

/**
 * Frame counter and timing, stored as a World resource.
 * Each Simulation owns its own clock.
 */
export class FrameClock {
  frame = 0;
  delta = 0;
  elapsed = 0;
  /** Wall time the last tick's systems took */
  lastTickMs = 0;
  /** Ticks that ran over ENGINE_CONFIG.TICK_BUDGET_MS */
  slowTicks = 0;
}

/**
 * Simulation - the per-frame state-transition engine.
 *
 * The caller owns the game loop and calls tick() once per frame; nothing
 * here runs on its own.
 */
export class Simulation {
  readonly world = new World();
  readonly pathfinding: PathfindingAlgorithms;
  private readonly runner = new SystemRunner();
  private currentMap: GridMap;

  constructor(map: GridMap = GridMap.createDefault()) {
    this.currentMap = map;
    this.pathfinding = new PathfindingAlgorithms(map);
    this.world.setResource(FrameClock, new FrameClock());

    this.runner.register(new PatrolSystem(), SystemPriority.PATROL);
    this.runner.register(new PathfindingSystem(this.pathfinding), SystemPriority.PATHFINDING);
    this.runner.register(new PhysicsSystem(), SystemPriority.PHYSICS);
  }

  get map(): GridMap {
    return this.currentMap;
  }

  get clock(): FrameClock {
    const clock = this.world.getResource(FrameClock);
    if (clock) return clock;

    // Restored after World.clear()
    const fresh = new FrameClock();
    this.world.setResource(FrameClock, fresh);
    return fresh;
  }

  /**
   * Advance one frame.
   * @param deltaTime Seconds since the previous tick
   * @returns Timings and failures of the systems that ran
   */
  tick(deltaTime: number): TickReport {
    const clock = this.clock;
    clock.frame += 1;
    clock.delta = deltaTime;
    clock.elapsed += deltaTime;

    const report = this.runner.update(this.world, deltaTime);

    // Systems may have cleared the world; record on whichever clock is live
    const after = this.clock;
    after.lastTickMs = report.totalMs;
    if (report.slow) after.slowTicks += 1;
    return report;
  }

  /**
   * Swap the station layout. Pathfinding uses the new map from the next
   * search on; existing wall entities are left as they are.
   */
  setMap(map: GridMap): void {
    this.currentMap = map;
    this.pathfinding.updateMap(map);
    logMapUpdated(map.width, map.height);
  }

  /**
   * Spawn one static box collider per wall cell of the current map.
   */
  populateWallColliders(): Entity[] {
    const walls = populateWalls(this.world, this.currentMap);
    logEntitiesPopulated(walls.length, this.world.entityCount);
    return walls;
  }

  spawnPlayer(position: Vec3): Entity {
    return createPlayer(this.world, position);
  }

  spawnNavigator(position: Vec2, options: NavigatorOptions = {}): Entity {
    return createNavigator(this.world, position, options);
  }

  /**
   * Registered systems in run order (for debugging)
   */
  systemNames(): string[] {
    return this.runner.getSystemNames();
  }
}
