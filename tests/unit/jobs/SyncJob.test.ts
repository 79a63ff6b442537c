/**
 * SyncJob Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { SyncJob, type SyncRunner } from '../../../src/jobs/SyncJob.js';
import type { SyncCycleReport } from '../../../src/services/sync/SyncEngine.js';
import { silentLogger } from '../../helpers/fakes.js';

function report(): SyncCycleReport {
  return { skipped: false, startedAt: new Date('2026-03-10T12:00:00Z'), durationMs: 0, phases: [] };
}

describe('SyncJob', () => {
  let runSyncCycle: Mock<SyncRunner['runSyncCycle']>;
  let job: SyncJob;

  beforeEach(() => {
    vi.useFakeTimers();
    runSyncCycle = vi.fn<SyncRunner['runSyncCycle']>().mockResolvedValue(report());
    job = new SyncJob({ runSyncCycle }, { intervalMs: 60_000 }, silentLogger);
  });

  afterEach(async () => {
    await job.stop();
    vi.useRealTimers();
  });

  it('runs immediately and then on every interval', async () => {
    job.start();
    expect(runSyncCycle).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(runSyncCycle).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(120_000);
    expect(runSyncCycle).toHaveBeenCalledTimes(4);
  });

  it('stops scheduling after stop()', async () => {
    job.start();
    await job.stop();

    await vi.advanceTimersByTimeAsync(180_000);
    expect(runSyncCycle).toHaveBeenCalledTimes(1);
    expect(job.isStarted).toBe(false);
  });

  it('ignores a second start()', () => {
    job.start();
    job.start();

    expect(runSyncCycle).toHaveBeenCalledTimes(1);
  });

  it('waits for the cycle in flight when stopping', async () => {
    let release: () => void = () => undefined;
    runSyncCycle.mockImplementationOnce(
      () =>
        new Promise<SyncCycleReport>((resolve) => {
          release = () => resolve(report());
        })
    );
    let stopped = false;

    job.start();
    const stopping = job.stop().then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);

    release();
    await stopping;
    expect(stopped).toBe(true);
  });

  it('keeps waiting for a long cycle after an overlapping tick was skipped', async () => {
    let release: () => void = () => undefined;
    runSyncCycle
      .mockImplementationOnce(
        () =>
          new Promise<SyncCycleReport>((resolve) => {
            release = () => resolve(report());
          })
      )
      .mockResolvedValueOnce({ ...report(), skipped: true });
    let stopped = false;

    job.start();
    await vi.advanceTimersByTimeAsync(60_000);
    expect(runSyncCycle).toHaveBeenCalledTimes(2);

    const stopping = job.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    release();
    await stopping;
    expect(stopped).toBe(true);
  });

  it('logs a failed cycle and keeps its schedule', async () => {
    runSyncCycle.mockRejectedValueOnce(new Error('boom'));

    await expect(job.run()).resolves.toBeNull();

    job.start();
    await vi.advanceTimersByTimeAsync(60_000);
    expect(runSyncCycle).toHaveBeenCalledTimes(3);
  });
});
