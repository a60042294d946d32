/**
 * Batch Runner Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { runBatch, type UnitReport } from './BatchRunner.js';

describe('runBatch', () => {
  it('reports every unit and keeps going past failures', async () => {
    const report = await runBatch(['a', 'b', 'c', 'd'], (unit) => {
      if (unit === 'b') throw new Error('bad payload');
      if (unit === 'c') return { status: 'skipped', detail: 'duplicate' };
      return { status: 'succeeded', value: unit.toUpperCase() };
    }, { concurrency: 2 });

    expect(report.total).toBe(4);
    expect(report.succeeded).toBe(2);
    expect(report.skipped).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.units.map((unit) => `${unit.unit}:${unit.status}`)).toEqual(['a:succeeded', 'b:failed', 'c:skipped', 'd:succeeded']);
    expect(report.units[1].error?.message).toBe('bad payload');
    expect(report.units[3].value).toBe('D');
  });

  it('never runs more units at once than the concurrency', async () => {
    let running = 0;
    let peak = 0;
    await runBatch(['1', '2', '3', '4', '5'], async (unit) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return { status: 'succeeded', value: unit };
    }, { concurrency: 2 });

    expect(peak).toBe(2);
  });

  it('cancels units not yet started once aborted', async () => {
    const controller = new AbortController();
    const seen: string[] = [];
    const report = await runBatch(['a', 'b', 'c'], (unit) => {
      seen.push(unit);
      controller.abort();
      return { status: 'succeeded', value: unit };
    }, { concurrency: 1, signal: controller.signal });

    expect(seen).toEqual(['a']);
    expect(report.succeeded).toBe(1);
    expect(report.cancelled).toBe(2);
  });

  it('calls onUnit as each unit settles', async () => {
    const onUnit = vi.fn<(report: UnitReport<unknown>) => void>();
    await runBatch(['x', 'y'], (unit) => ({ status: 'succeeded', value: unit }), { onUnit });
    expect(onUnit).toHaveBeenCalledTimes(2);
    expect(onUnit.mock.calls[0][0].unit).toBe('x');
  });
});
