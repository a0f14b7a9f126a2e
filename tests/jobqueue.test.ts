import { JobQueue } from "../src/infrastructure/queue/JobQueue.js";
import { silentLogger } from "./helpers/fakes.js";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("JobQueue", () => {
  let started: string[];
  let finishers: Map<string, { resolve: () => void; reject: (error: Error) => void }>;
  let queue: JobQueue;

  const runner = (jobId: string) => {
    started.push(jobId);
    return new Promise<void>((resolve, reject) => finishers.set(jobId, { resolve, reject }));
  };

  const finish = async (jobId: string) => {
    finishers.get(jobId)?.resolve();
    await flush();
  };

  beforeEach(() => {
    started = [];
    finishers = new Map();
    queue = new JobQueue(2, runner, silentLogger); // 2 concurrent jobs for testing
  });

  describe("Admission", () => {
    test("should start jobs immediately while under the limit", () => {
      queue.submit("j1");
      queue.submit("j2");

      expect(started).toEqual(["j1", "j2"]);
      expect(queue.isRunning("j1")).toBe(true);
    });

    test("should hold jobs beyond the limit", () => {
      queue.submit("j1");
      queue.submit("j2");
      queue.submit("j3");

      expect(started).toEqual(["j1", "j2"]);
      expect(queue.isPending("j3")).toBe(true);
      expect(queue.position("j3")).toBe(1);
      expect(queue.getStatistics()).toEqual({ pending: 1, running: 2, maxConcurrent: 2 });
    });

    test("should admit the next job when one finishes", async () => {
      queue.submit("j1");
      queue.submit("j2");
      queue.submit("j3");

      await finish("j2");

      expect(started).toEqual(["j1", "j2", "j3"]);
      expect(queue.getStatistics()).toEqual({ pending: 0, running: 2, maxConcurrent: 2 });
    });

    test("should admit waiting jobs in arrival order", async () => {
      queue = new JobQueue(1, runner, silentLogger);
      ["a", "b", "c", "d"].forEach((id) => queue.submit(id));

      await finish("a");
      await finish("b");
      await finish("c");

      expect(started).toEqual(["a", "b", "c", "d"]);
    });

    test("should reject a job that is already queued", () => {
      queue.submit("j1");
      expect(() => queue.submit("j1")).toThrow("Job j1 is already queued");
    });

    test("should reject a non-positive limit", () => {
      expect(() => new JobQueue(0, runner, silentLogger)).toThrow(
        "maxConcurrent must be a positive integer, got 0"
      );
    });
  });

  describe("Cancellation", () => {
    test("should remove a waiting job so it never starts", async () => {
      queue.submit("j1");
      queue.submit("j2");
      queue.submit("j3");

      expect(queue.cancel("j3")).toBe(true);
      await finish("j1");

      expect(started).toEqual(["j1", "j2"]);
      expect(queue.position("j3")).toBe(0);
    });

    test("should not remove a running job", () => {
      queue.submit("j1");
      expect(queue.cancel("j1")).toBe(false);
    });
  });

  describe("Failures", () => {
    test("should keep admitting after a runner rejects", async () => {
      queue = new JobQueue(1, runner, silentLogger);
      queue.submit("j1");
      queue.submit("j2");

      finishers.get("j1")?.reject(new Error("runner crashed"));
      await flush();

      expect(started).toEqual(["j1", "j2"]);
      expect(queue.isRunning("j1")).toBe(false);
    });
  });

  describe("Idle", () => {
    test("should resolve immediately when nothing is queued", async () => {
      await expect(queue.waitForIdle()).resolves.toBeUndefined();
    });

    test("should resolve once every job has finished", async () => {
      queue.submit("j1");
      queue.submit("j2");
      queue.submit("j3");

      let idle = false;
      const waiting = queue.waitForIdle().then(() => {
        idle = true;
      });

      await finish("j1");
      await finish("j2");
      expect(idle).toBe(false);

      await finish("j3");
      await waiting;
      expect(idle).toBe(true);
    });
  });
});
