/**
 * Unit Tests — CollectionScheduler
 */
import { CollectionScheduler } from '@application/services/CollectionScheduler';
import type { RunOverrides } from '@domain/entities/RunConfig';
import type { RunResult } from '@domain/entities/RunResult';
import { ConflictError } from '@shared/errors/AppError';

import { sampleRunResult, silentLogger } from '../helpers/fixtures';

function createService() {
  return {
    isRunning: false,
    startRun: jest.fn<Promise<RunResult>, [RunOverrides?]>().mockResolvedValue(sampleRunResult),
  };
}

describe('CollectionScheduler', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  describe('tick', () => {
    it('should start a run with the configured overrides', async () => {
      const service = createService();
      const scheduler = new CollectionScheduler(service, 60_000, { mode: 'Incremental' }, silentLogger);

      await scheduler.tick();

      expect(service.startRun).toHaveBeenCalledWith({ mode: 'Incremental' });
    });

    it('should skip the tick while a run is in progress', async () => {
      const service = { ...createService(), isRunning: true };
      const scheduler = new CollectionScheduler(service, 60_000, {}, silentLogger);

      await scheduler.tick();

      expect(service.startRun).not.toHaveBeenCalled();
    });

    it('should swallow a conflict from a run started elsewhere', async () => {
      const service = createService();
      service.startRun.mockRejectedValueOnce(new ConflictError('A collection run is already in progress'));
      const scheduler = new CollectionScheduler(service, 60_000, {}, silentLogger);

      await expect(scheduler.tick()).resolves.toBeUndefined();
    });

    it('should log and survive a failed run', async () => {
      const service = createService();
      service.startRun.mockRejectedValueOnce(new Error('discovery failed'));
      const scheduler = new CollectionScheduler(service, 60_000, {}, silentLogger);

      await expect(scheduler.tick()).resolves.toBeUndefined();
      await scheduler.tick();

      expect(service.startRun).toHaveBeenCalledTimes(2);
    });
  });

  describe('start / stop', () => {
    it('should tick every interval until stopped', async () => {
      jest.useFakeTimers();
      const service = createService();
      const scheduler = new CollectionScheduler(service, 60_000, {}, silentLogger);

      scheduler.start();
      jest.advanceTimersByTime(60_000);
      jest.advanceTimersByTime(60_000);
      await scheduler.stop();
      jest.advanceTimersByTime(180_000);

      expect(service.startRun).toHaveBeenCalledTimes(2);
    });

    it('should not start a second timer', () => {
      jest.useFakeTimers();
      const service = createService();
      const scheduler = new CollectionScheduler(service, 60_000, {}, silentLogger);

      scheduler.start();
      scheduler.start();
      jest.advanceTimersByTime(60_000);

      expect(service.startRun).toHaveBeenCalledTimes(1);
      return scheduler.stop();
    });
  });
});
