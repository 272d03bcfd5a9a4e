// ============================================
// SystemRunner Unit Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { World } from '@stationfall/shared';
import { SystemRunner } from '../SystemRunner';
import type { System } from '../types';
import { logger, perfLogger } from '../../../logger';

function recordingSystem(name: string, calls: string[]): System {
  return {
    name,
    update: () => {
      calls.push(name);
    },
  };
}

describe('SystemRunner', () => {
  let world: World;
  let runner: SystemRunner;

  beforeEach(() => {
    vi.clearAllMocks();
    world = new World();
    runner = new SystemRunner();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs systems in priority order', () => {
    const calls: string[] = [];
    runner.register(recordingSystem('Late', calls), 500);
    runner.register(recordingSystem('Early', calls), 100);
    runner.register(recordingSystem('Middle', calls), 300);

    runner.update(world, 0.016);

    expect(calls).toEqual(['Early', 'Middle', 'Late']);
    expect(runner.getSystemNames()).toEqual([
      'Early (priority: 100)',
      'Middle (priority: 300)',
      'Late (priority: 500)',
    ]);
  });

  it('passes the world and delta time through', () => {
    const update = vi.fn();
    runner.register({ name: 'Probe', update }, 1);

    runner.update(world, 0.25);

    expect(update).toHaveBeenCalledWith(world, 0.25);
  });

  it('logs a throwing system and keeps running the rest', () => {
    const calls: string[] = [];
    runner.register(
      {
        name: 'Broken',
        update: () => {
          throw new Error('boom');
        },
      },
      100
    );
    runner.register(recordingSystem('After', calls), 200);

    const report = runner.update(world, 0.016);

    expect(calls).toEqual(['After']);
    expect(report.failed).toEqual(['Broken']);
    expect(report.timings.map((t) => t.name)).toEqual(['Broken', 'After']);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'system_error', system: 'Broken', error: 'boom' }),
      'System Broken threw an error'
    );
  });

  it('keeps registration order for equal priorities', () => {
    const calls: string[] = [];
    runner.register(recordingSystem('First', calls), 200);
    runner.register(recordingSystem('Second', calls), 200);
    runner.register(recordingSystem('Earliest', calls), 100);

    runner.update(world, 0.016);

    expect(calls).toEqual(['Earliest', 'First', 'Second']);
  });

  it('reports a per-system breakdown for slow ticks', () => {
    runner.register(recordingSystem('Slow', []), 100);
    // tick start, system start, system end, tick end
    vi.spyOn(performance, 'now')
      .mockReturnValueOnce(0)
      .mockReturnValueOnce(0)
      .mockReturnValueOnce(20)
      .mockReturnValueOnce(20);

    const report = runner.update(world, 0.016);

    expect(report).toEqual({ totalMs: 20, timings: [{ name: 'Slow', ms: 20 }], failed: [], slow: true });
    expect(perfLogger.info).toHaveBeenCalledWith(
      {
        event: 'slow_tick_breakdown',
        totalMs: '20.0',
        breakdown: [{ name: 'Slow', ms: 20 }],
      },
      'Slow tick 20.0ms: Slow:20.0'
    );
  });

  it('stays quiet for fast ticks', () => {
    runner.register(recordingSystem('Fast', []), 100);
    vi.spyOn(performance, 'now').mockReturnValue(5);

    const report = runner.update(world, 0.016);

    expect(report.slow).toBe(false);
    expect(report.totalMs).toBe(0);
    expect(perfLogger.info).not.toHaveBeenCalled();
  });
});
