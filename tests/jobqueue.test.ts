import { JobQueue } from "../src/infrastructure/queue/JobQueue.js";
import { silentLogger, deferred } from "./helpers/fakes.js";

describe("JobQueue", () => {
  let queue: JobQueue;

  beforeEach(() => {
    queue = new JobQueue(2, silentLogger); // 2 concurrent jobs for testing
  });

  describe("Dispatch", () => {
    test("should keep a job pending until the current turn finishes", () => {
      const started: string[] = [];
      queue.enqueue("job-a", async (id) => {
        started.push(id);
      });

      expect(started).toEqual([]);
      expect(queue.isPending("job-a")).toBe(true);
      expect(queue.getStatistics()).toEqual({ pending: 1, running: 0, maxConcurrent: 2 });
    });

    test("should run jobs in submission order", async () => {
      const started: string[] = [];
      for (const id of ["a", "b", "c"]) {
        queue.enqueue(id, async (jobId) => {
          started.push(jobId);
        });
      }

      await queue.whenIdle();
      expect(started).toEqual(["a", "b", "c"]);
    });
  });

  describe("Concurrency Control", () => {
    test("should handle concurrent jobs up to max limit", async () => {
      const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
      const started: string[] = [];
      gates.forEach((gate, i) => {
        queue.enqueue(`job-${i}`, async (id) => {
          started.push(id);
          await gate.promise;
        });
      });

      await new Promise((resolve) => setImmediate(resolve));
      expect(started).toEqual(["job-0", "job-1"]);
      expect(queue.isRunning("job-0")).toBe(true);
      expect(queue.isPending("job-2")).toBe(true);
      expect(queue.getStatistics()).toEqual({ pending: 1, running: 2, maxConcurrent: 2 });

      gates[0].resolve();
      await new Promise((resolve) => setImmediate(resolve));
      expect(started).toEqual(["job-0", "job-1", "job-2"]);

      gates[1].resolve();
      gates[2].resolve();
      await queue.whenIdle();
      expect(queue.getStatistics()).toEqual({ pending: 0, running: 0, maxConcurrent: 2 });
    });

    test("should free the slot when a task rejects", async () => {
      const started: string[] = [];
      const single = new JobQueue(1, silentLogger);
      single.enqueue("bad", async () => {
        throw new Error("boom");
      });
      single.enqueue("good", async (id) => {
        started.push(id);
      });

      await single.whenIdle();
      expect(started).toEqual(["good"]);
    });
  });

  describe("Removal", () => {
    test("should remove a pending job", async () => {
      const started: string[] = [];
      queue.enqueue("job-a", async (id) => {
        started.push(id);
      });

      expect(queue.remove("job-a")).toBe(true);
      await queue.whenIdle();
      await new Promise((resolve) => setImmediate(resolve));
      expect(started).toEqual([]);
    });

    test("should return false for a job that is not pending", async () => {
      const gate = deferred<void>();
      queue.enqueue("job-a", () => gate.promise);
      await new Promise((resolve) => setImmediate(resolve));

      expect(queue.remove("job-a")).toBe(false);
      expect(queue.remove("non-existent-id")).toBe(false);

      gate.resolve();
      await queue.whenIdle();
    });
  });

  test("whenIdle should resolve at once on an empty queue", async () => {
    await expect(queue.whenIdle()).resolves.toBeUndefined();
  });
});
