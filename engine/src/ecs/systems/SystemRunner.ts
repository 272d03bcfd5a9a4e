// ============================================
// ECS System Runner
// Runs simulation systems in priority order and times each tick
// ============================================

import { ENGINE_CONFIG, type World } from '@stationfall/shared';
import type { System, SystemTiming, TickReport } from './types';
import { logger, perfLogger } from '../../logger';

// Systems faster than this are left out of the slow-tick breakdown
const BREAKDOWN_MIN_MS = 0.5;

interface RegisteredSystem {
  system: System;
  priority: number;
}

/**
 * SystemRunner - ordered, fault-isolated system execution
 *
 * Lower priorities run first; equal priorities keep registration order.
 * A system that throws is logged and reported in the TickReport, and the
 * remaining systems still run.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  /**
   * @param priority Lower numbers run first
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    // Array.prototype.sort is stable, which keeps registration order on ties
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  update(world: World, deltaTime: number): TickReport {
    const tickStart = performance.now();
    const timings: SystemTiming[] = [];
    const failed: string[] = [];

    for (const { system } of this.systems) {
      const systemStart = performance.now();
      if (!this.runSystem(system, world, deltaTime)) {
        failed.push(system.name);
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const report: TickReport = {
      totalMs: performance.now() - tickStart,
      timings,
      failed,
      slow: false,
    };
    report.slow = report.totalMs > ENGINE_CONFIG.TICK_BUDGET_MS;

    if (report.slow) {
      this.logSlowTick(report);
    }
    return report;
  }

  /**
   * Registered systems in run order, as "Name (priority: N)"
   */
  getSystemNames(): string[] {
    return this.systems.map(({ system, priority }) => `${system.name} (priority: ${priority})`);
  }

  private runSystem(system: System, world: World, deltaTime: number): boolean {
    try {
      system.update(world, deltaTime);
      return true;
    } catch (error) {
      logger.error(
        {
          event: 'system_error',
          system: system.name,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        },
        `System ${system.name} threw an error`
      );
      return false;
    }
  }

  private logSlowTick(report: TickReport): void {
    const slowest = report.timings
      .filter((t) => t.ms > BREAKDOWN_MIN_MS)
      .sort((a, b) => b.ms - a.ms);
    const summary = slowest.map((t) => `${t.name}:${t.ms.toFixed(1)}`).join(' ');

    perfLogger.info(
      {
        event: 'slow_tick_breakdown',
        totalMs: report.totalMs.toFixed(1),
        breakdown: slowest.map((t) => ({ name: t.name, ms: Number(t.ms.toFixed(2)) })),
      },
      `Slow tick ${report.totalMs.toFixed(1)}ms: ${summary}`
    );
  }
}
