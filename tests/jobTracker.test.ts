import { ChunkResult, JobSnapshot } from '../src/core/entities/Job.js';
import { JobTracker } from '../src/infrastructure/queue/JobTracker.js';
import { silentLogger } from './helpers/fakes.js';

const ok = (index: number, content: string = '[]'): ChunkResult => ({
  index,
  status: 'succeeded',
  content,
  server: 'A',
  attempts: 1,
  latencyMs: 10,
});

const bad = (index: number): ChunkResult => ({
  index,
  status: 'failed',
  reason: 'exhausted',
  error: 'Failed after 2 attempts. Last error: boom',
  attempts: 2,
});

describe('JobTracker', () => {
  let tracker: JobTracker;

  beforeEach(() => {
    tracker = new JobTracker(undefined, silentLogger);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('Lifecycle', () => {
    test('should create jobs in the queued state', () => {
      const jobId = tracker.create(3, { label: 'report.txt' });
      const job = tracker.snapshot(jobId);

      expect(job).toMatchObject({
        id: jobId,
        label: 'report.txt',
        status: 'queued',
        total: 3,
        completed: 0,
        progress: 0,
      });
      expect(job?.estimatedRemainingMs).toBeUndefined();
    });

    test('should return null for an unknown job', () => {
      expect(tracker.snapshot('non-existent-id')).toBeNull();
    });

    test('should admit a job only once', () => {
      const jobId = tracker.create(1);

      expect(tracker.markProcessing(jobId)).toBe(true);
      expect(tracker.markProcessing(jobId)).toBe(false);
      expect(tracker.snapshot(jobId)?.startedAt).toBeInstanceOf(Date);
    });

    test('should ignore chunk results before admission', () => {
      const jobId = tracker.create(1);
      expect(tracker.recordChunk(jobId, ok(0))).toBe(false);
      expect(tracker.snapshot(jobId)?.completed).toBe(0);
    });

    test('should reject an invalid tolerance', () => {
      expect(() => new JobTracker({ chunkFailureTolerance: 1.5 }, silentLogger)).toThrow(
        'chunkFailureTolerance must be within [0, 1], got 1.5'
      );
    });
  });

  describe('Progress', () => {
    let jobId: string;

    beforeEach(() => {
      jobId = tracker.create(3);
      tracker.markProcessing(jobId);
    });

    test('should count each chunk once', () => {
      expect(tracker.recordChunk(jobId, ok(1))).toBe(true);
      expect(tracker.recordChunk(jobId, ok(1))).toBe(false);
      expect(tracker.recordChunk(jobId, bad(1))).toBe(false);
      expect(tracker.recordChunk(jobId, ok(7))).toBe(false);

      const job = tracker.snapshot(jobId);
      expect(job?.completed).toBe(1);
      expect(job?.succeeded).toBe(1);
      expect(job?.progress).toBe(33);
    });

    test('should estimate remaining time from the pace so far', () => {
      jest.useFakeTimers({ now: new Date('2026-03-01T10:00:00Z') });
      const timed = tracker.create(3);
      tracker.markProcessing(timed);
      tracker.recordChunk(timed, ok(0));

      jest.setSystemTime(new Date('2026-03-01T10:00:01Z'));
      expect(tracker.snapshot(timed)?.estimatedRemainingMs).toBe(2000);
    });

    test('should return results in chunk order', () => {
      tracker.recordChunk(jobId, ok(2, 'c'));
      tracker.recordChunk(jobId, ok(0, 'a'));
      tracker.recordChunk(jobId, bad(1));

      expect(tracker.getResults(jobId)?.map((r) => r.index)).toEqual([0, 1, 2]);
    });
  });

  describe('Finalization', () => {
    test('should complete a job with no failures and summarize its observations', () => {
      const jobId = tracker.create(2);
      tracker.markProcessing(jobId);
      tracker.recordChunk(
        jobId,
        ok(
          0,
          JSON.stringify([
            {
              observation: 'Ada wrote the program',
              relationship: 'wrote',
              entities: [
                { label: 'Ada', category: 'Person' },
                { label: 'program', category: 'Concept' },
              ],
            },
          ])
        )
      );
      tracker.recordChunk(
        jobId,
        ok(
          1,
          JSON.stringify([
            {
              observation: 'Ada worked with Babbage',
              relationship: 'collaborated',
              entities: [
                { label: 'Ada', category: 'Person' },
                { label: 'Babbage', category: 'Person' },
              ],
            },
          ])
        )
      );

      expect(tracker.finalize(jobId)).toBe('completed');
      const job = tracker.snapshot(jobId);
      expect(job?.progress).toBe(100);
      expect(job?.estimatedRemainingMs).toBe(0);
      expect(job?.summary?.observationsCount).toBe(2);
      expect(job?.summary?.entitiesCount).toBe(3);
    });

    test('should fail a job with any failed chunk under the strict policy', () => {
      const jobId = tracker.create(3);
      tracker.markProcessing(jobId);

      expect(tracker.finalize(jobId, [ok(0), bad(1), ok(2)])).toBe('failed');
      const job = tracker.snapshot(jobId);
      expect(job?.error).toBe('1/3 chunks failed permanently');
      expect(job?.failed).toBe(1);
      expect(job?.summary).toBeUndefined();
    });

    test('should complete a job whose failures stay within the tolerance', () => {
      const tolerant = new JobTracker({ chunkFailureTolerance: 0.5 }, silentLogger);
      const jobId = tolerant.create(3);
      tolerant.markProcessing(jobId);

      expect(tolerant.finalize(jobId, [ok(0), bad(1), ok(2)])).toBe('completed');
      expect(tolerant.snapshot(jobId)?.failed).toBe(1);
    });

    test('should fail a job whose failures exceed the tolerance', () => {
      const tolerant = new JobTracker({ chunkFailureTolerance: 0.5 }, silentLogger);
      const jobId = tolerant.create(3);
      tolerant.markProcessing(jobId);

      expect(tolerant.finalize(jobId, [bad(0), bad(1), ok(2)])).toBe('failed');
      expect(tolerant.snapshot(jobId)?.error).toBe('2/3 chunks failed permanently');
    });

    test('should fail a job with unresolved chunks', () => {
      const jobId = tracker.create(3);
      tracker.markProcessing(jobId);

      expect(tracker.finalize(jobId, [ok(0), ok(1)])).toBe('failed');
      expect(tracker.snapshot(jobId)?.error).toBe('1 of 3 chunks never resolved');
    });

    test('should fail a job on an unrecoverable condition, keeping partial results', () => {
      const jobId = tracker.create(2);
      tracker.markProcessing(jobId);

      expect(tracker.fail(jobId, 'No active inference servers available', [ok(0)])).toBe(true);
      const job = tracker.snapshot(jobId);
      expect(job?.status).toBe('failed');
      expect(job?.error).toBe('No active inference servers available');
      expect(job?.succeeded).toBe(1);
    });

    test('should cancel a queued job', () => {
      const jobId = tracker.create(2);

      expect(tracker.cancel(jobId)).toBe(true);
      expect(tracker.snapshot(jobId)?.status).toBe('cancelled');
      expect(tracker.snapshot(jobId)?.error).toBe('Cancelled by caller');
      expect(tracker.markProcessing(jobId)).toBe(false);
      expect(tracker.getResults(jobId)?.map((r) => (r.status === 'failed' ? r.reason : r.status))).toEqual([
        'cancelled',
        'cancelled',
      ]);
    });

    test('should fold drained results into a cancelled job and mark the rest', () => {
      const jobId = tracker.create(3);
      tracker.markProcessing(jobId);
      tracker.recordChunk(jobId, ok(0));

      expect(tracker.cancel(jobId, [ok(0), ok(1)])).toBe(true);
      expect(tracker.snapshot(jobId)).toMatchObject({ status: 'cancelled', completed: 3, succeeded: 2, failed: 1 });
      expect(tracker.getResults(jobId)?.[2]).toEqual({
        index: 2,
        status: 'failed',
        reason: 'cancelled',
        error: 'Job cancelled before this chunk was dispatched',
        attempts: 0,
      });
    });
  });

  describe('Terminal jobs', () => {
    let jobId: string;

    beforeEach(() => {
      jobId = tracker.create(1);
      tracker.markProcessing(jobId);
      tracker.recordChunk(jobId, ok(0));
      tracker.finalize(jobId);
    });

    test('should return the same frozen snapshot', () => {
      const first = tracker.snapshot(jobId);
      expect(tracker.snapshot(jobId)).toBe(first);
      expect(Object.isFrozen(first)).toBe(true);
    });

    test('should ignore further changes', () => {
      expect(tracker.recordChunk(jobId, bad(0))).toBe(false);
      expect(tracker.cancel(jobId)).toBe(false);
      expect(tracker.fail(jobId, 'late')).toBe(false);
      expect(tracker.finalize(jobId)).toBe('completed');
      expect(tracker.snapshot(jobId)?.status).toBe('completed');
    });

    test('should be discarded on request', () => {
      const running = tracker.create(1);
      tracker.markProcessing(running);

      expect(tracker.discard(running)).toBe(false);
      expect(tracker.discard(jobId)).toBe(true);
      expect(tracker.snapshot(jobId)).toBeNull();
    });
  });

  describe('Housekeeping', () => {
    test('should list jobs by status and count them', () => {
      const done = tracker.create(1);
      tracker.markProcessing(done);
      tracker.finalize(done, [ok(0)]);
      tracker.create(2);

      expect(tracker.list('queued')).toHaveLength(1);
      expect(tracker.list().map((j) => j.id)).toContain(done);
      expect(tracker.getStatistics()).toEqual({
        total: 2,
        queued: 1,
        processing: 0,
        completed: 1,
        failed: 0,
        cancelled: 0,
      });
    });

    test('should clear finished jobs older than the retention window', () => {
      jest.useFakeTimers({ now: new Date('2026-01-01T00:00:00Z') });
      const old = tracker.create(1);
      tracker.cancel(old);
      const waiting = tracker.create(1);

      jest.setSystemTime(new Date('2026-01-02T01:00:00Z'));
      expect(tracker.clearOldJobs(24)).toBe(1);
      expect(tracker.snapshot(old)).toBeNull();
      expect(tracker.snapshot(waiting)?.status).toBe('queued');
    });

    test('should notify listeners of every change', () => {
      const seen: JobSnapshot[] = [];
      tracker.onUpdate((snapshot) => seen.push(snapshot));

      const jobId = tracker.create(1);
      tracker.markProcessing(jobId);
      tracker.recordChunk(jobId, ok(0));
      tracker.finalize(jobId);

      expect(seen.map((s) => s.status)).toEqual(['queued', 'processing', 'processing', 'completed']);
      expect(seen[2].completed).toBe(1);
    });
  });
});
