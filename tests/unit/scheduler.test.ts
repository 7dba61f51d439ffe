import { JobScheduler } from "../../src/core/scheduler";
import {
  AlreadyTerminalError,
  AtCapacityError,
  InvalidSpecError,
  OrchestratorError,
  SchedulerNotRunningError,
  TargetBusyError,
} from "../../src/core/errors";
import { InMemoryJobStore } from "../../src/store/in-memory-job-store";
import { JobNotFoundError } from "../../src/store/store-errors";
import { Job } from "../../src/types/job";
import { JobState } from "../../src/types/lifecycle";
import { Gate, FakeRuntime, FakeProbe, waitFor } from "../helpers/fake-runtime";
import { createHarness, newJob, nginxRequest } from "../helpers/harness";

async function stateOf(scheduler: JobScheduler, id: string): Promise<JobState | undefined> {
  return (await scheduler.getJob(id))?.state;
}

describe("JobScheduler admission", () => {
  test("rejects submissions before start", async () => {
    const { scheduler } = createHarness();

    await expect(scheduler.submit(nginxRequest())).rejects.toBeInstanceOf(
      SchedulerNotRunningError
    );
  });

  test("runs a job to succeeded and records every state", async () => {
    const { scheduler } = createHarness();
    await scheduler.start();

    const jobId = await scheduler.submit(nginxRequest());
    const job = await scheduler.waitForJob(jobId);

    expect(job.state).toBe("succeeded");
    expect(job.attempt).toBe(0);

    const events = await scheduler.getJobEvents(jobId);
    expect(events.map((e) => e.state)).toEqual([
      "queued",
      "building",
      "starting",
      "health_checking",
      "succeeded",
    ]);
    expect(events.map((e) => e.sequence)).toEqual([1, 2, 3, 4, 5]);
    expect(events[0].detail).toBe("Queued deployment of nginx:latest to web");

    await scheduler.stop();
  });

  test("uses the injected id generator", async () => {
    const { scheduler } = createHarness({ generateId: () => "job-fixed" });
    await scheduler.start();

    await expect(scheduler.submit(nginxRequest())).resolves.toBe("job-fixed");
    await scheduler.waitForJob("job-fixed");
  });

  test("invalid requests are rejected without touching the store", async () => {
    const { scheduler } = createHarness();
    const rejected: string[] = [];
    scheduler.on("job:rejected", ({ target, error }) => rejected.push(`${target}:${error.name}`));
    await scheduler.start();

    await expect(scheduler.submit({ target: "web", image: "" })).rejects.toBeInstanceOf(
      InvalidSpecError
    );
    expect(await scheduler.listJobs()).toEqual([]);
    expect(rejected).toEqual(["web:InvalidSpecError"]);
    expect(scheduler.stats().lockedTargets).toBe(0);
  });

  test("concurrent submits for one target: exactly one is admitted", async () => {
    const { scheduler, runtime } = createHarness();
    runtime.buildGate = new Gate();
    await scheduler.start();

    const results = await Promise.allSettled(
      Array.from({ length: 10 }, () => scheduler.submit(nginxRequest()))
    );

    const admitted = results.filter((r) => r.status === "fulfilled");
    const busy = results.filter(
      (r) => r.status === "rejected" && r.reason instanceof TargetBusyError
    );
    expect(admitted).toHaveLength(1);
    expect(busy).toHaveLength(9);
    expect(await scheduler.listByTarget("web")).toHaveLength(1);

    runtime.buildGate.release();
    await scheduler.stop({ graceful: true, timeoutMs: 2000 });
  });

  test("targets differing only in case share one lock", async () => {
    const { scheduler, runtime } = createHarness();
    runtime.buildGate = new Gate();
    await scheduler.start();

    const jobId = await scheduler.submit(nginxRequest("web"));

    await expect(scheduler.submit(nginxRequest("Web"))).rejects.toMatchObject({
      code: "TargetBusy",
      message: `Target web is busy with job ${jobId}`,
    });
    expect(scheduler.stats().lockedTargets).toBe(1);
    expect(await scheduler.listByTarget("WEB")).toHaveLength(1);

    runtime.buildGate.release();
    await scheduler.waitForJob(jobId);
    expect(runtime.containerFor("web")?.name).toBe("deploy-web");
  });

  test("the target is free again once the job is terminal", async () => {
    const { scheduler } = createHarness();
    await scheduler.start();

    const first = await scheduler.submit(nginxRequest());
    await scheduler.waitForJob(first);

    const second = await scheduler.submit(nginxRequest());
    expect(second).not.toBe(first);
    await expect(scheduler.waitForJob(second)).resolves.toMatchObject({ state: "succeeded" });
  });

  test("different targets run concurrently up to the cap", async () => {
    const { scheduler, runtime } = createHarness({ maxConcurrentJobs: 2 });
    runtime.buildGate = new Gate();
    await scheduler.start();

    const a = await scheduler.submit(nginxRequest("web-a"));
    const b = await scheduler.submit(nginxRequest("web-b"));
    await waitFor(async () =>
      (await stateOf(scheduler, a)) === "building" && (await stateOf(scheduler, b)) === "building"
    );

    await expect(scheduler.submit(nginxRequest("web-c"))).rejects.toBeInstanceOf(AtCapacityError);
    expect(scheduler.stats()).toEqual({
      running: true,
      activeJobs: 2,
      maxConcurrentJobs: 2,
      lockedTargets: 2,
    });

    runtime.buildGate.release();
    await scheduler.waitForJob(a);
    await scheduler.waitForJob(b);

    const c = await scheduler.submit(nginxRequest("web-c"));
    await expect(scheduler.waitForJob(c)).resolves.toMatchObject({ state: "succeeded" });
  });

  test("a failed store write releases the claim", async () => {
    class FlakyStore extends InMemoryJobStore {
      failNext = true;

      async create(job: Parameters<InMemoryJobStore["create"]>[0]): Promise<Job> {
        if (this.failNext) {
          this.failNext = false;
          throw new Error("connection reset");
        }
        return super.create(job);
      }
    }

    const { scheduler } = createHarness({ store: new FlakyStore() });
    await scheduler.start();

    await expect(scheduler.submit(nginxRequest())).rejects.toThrow("connection reset");
    expect(scheduler.stats().lockedTargets).toBe(0);
    expect(scheduler.stats().activeJobs).toBe(0);

    const jobId = await scheduler.submit(nginxRequest());
    await expect(scheduler.waitForJob(jobId)).resolves.toMatchObject({ state: "succeeded" });
  });

  test("a failed queued event fails the job and frees the target", async () => {
    class NoEventsStore extends InMemoryJobStore {
      failNext = true;

      async appendEvent(event: Parameters<InMemoryJobStore["appendEvent"]>[0]) {
        if (this.failNext) {
          this.failNext = false;
          throw new Error("write concern timeout");
        }
        return super.appendEvent(event);
      }
    }

    const store = new NoEventsStore();
    const { scheduler } = createHarness({ store, generateId: () => "job-1" });
    await scheduler.start();

    await expect(scheduler.submit(nginxRequest())).rejects.toThrow("write concern timeout");

    const job = await store.findById("job-1");
    expect(job?.state).toBe("failed");
    expect(job?.terminalReason).toEqual({
      code: "InternalError",
      message: "Internal error: write concern timeout",
    });
    expect(scheduler.stats().lockedTargets).toBe(0);
  });

  test("emits submitted and settled events", async () => {
    const { scheduler } = createHarness();
    const seen: string[] = [];
    scheduler.on("job:submitted", (job) => seen.push(`submitted:${job.state}`));
    scheduler.on("job:settled", (job) => seen.push(`settled:${job.state}`));
    await scheduler.start();

    const jobId = await scheduler.submit(nginxRequest());
    await scheduler.waitForJob(jobId);

    expect(seen).toEqual(["submitted:queued", "settled:succeeded"]);
  });

  test("a throwing listener does not break submission", async () => {
    const { scheduler } = createHarness();
    const errors: string[] = [];
    scheduler.on("job:submitted", () => {
      throw new Error("listener exploded");
    });
    scheduler.on("scheduler:error", (err) => errors.push(err.message));
    await scheduler.start();

    const jobId = await scheduler.submit(nginxRequest());
    await expect(scheduler.waitForJob(jobId)).resolves.toMatchObject({ state: "succeeded" });
    expect(errors).toEqual(["listener exploded"]);
  });
});

describe("JobScheduler cancellation", () => {
  test("cancel while building: Ok, repeat Ok, then AlreadyTerminal", async () => {
    const { scheduler, runtime } = createHarness();
    runtime.buildGate = new Gate();
    await scheduler.start();

    const jobId = await scheduler.submit(nginxRequest());
    await waitFor(async () => (await stateOf(scheduler, jobId)) === "building");

    await expect(scheduler.cancel(jobId)).resolves.toBeUndefined();
    await expect(scheduler.cancel(jobId)).resolves.toBeUndefined();

    runtime.buildGate.release();
    const job = await scheduler.waitForJob(jobId);

    expect(job.state).toBe("cancelled");
    expect(job.terminalReason).toEqual({
      code: "CancelRequested",
      message: "Cancelled while building",
    });
    expect(runtime.calls).toEqual(["build nginx:latest"]);

    const events = await scheduler.getJobEvents(jobId);
    expect(events.filter((e) => e.state === "cancelled")).toHaveLength(1);

    await expect(scheduler.cancel(jobId)).rejects.toBeInstanceOf(AlreadyTerminalError);
  });

  test("cancel right after submit stops before any container starts", async () => {
    const { scheduler, runtime } = createHarness();
    await scheduler.start();

    const jobId = await scheduler.submit(nginxRequest());
    await scheduler.cancel(jobId);
    const job = await scheduler.waitForJob(jobId);

    expect(job.state).toBe("cancelled");
    expect(runtime.calls).not.toContain("run web");
  });

  test("cancel of an unknown job is NotFound", async () => {
    const { scheduler } = createHarness();
    await scheduler.start();

    await expect(scheduler.cancel("missing")).rejects.toBeInstanceOf(JobNotFoundError);
  });

  test("a live job with no executor is cancelled in the store", async () => {
    const { scheduler, store } = createHarness();
    await scheduler.start();
    await store.create(newJob("orphan"));

    await scheduler.cancel("orphan");

    const job = await store.findById("orphan");
    expect(job?.state).toBe("cancelled");
    expect(job?.terminalReason?.message).toBe("Cancelled while queued with no live executor");
  });
});

describe("JobScheduler reruns", () => {
  test("rerun submits the same spec with the next attempt", async () => {
    const { scheduler, runtime } = createHarness();
    runtime.buildError = new Error("registry unavailable");
    await scheduler.start();

    const first = await scheduler.submit(nginxRequest());
    const failed = await scheduler.waitForJob(first);
    expect(failed.terminalReason?.code).toBe("BuildFailed");

    runtime.buildError = undefined;
    const second = await scheduler.rerun(first);
    const job = await scheduler.waitForJob(second);

    expect(job.state).toBe("succeeded");
    expect(job.attempt).toBe(1);
    expect(job.previousJobId).toBe(first);
    expect(job.spec).toEqual(failed.spec);

    const [queued] = await scheduler.getJobEvents(second);
    expect(queued.detail).toBe("Queued deployment of nginx:latest to web (attempt 1)");
  });

  test("rerun while the target is held is TargetBusy", async () => {
    const { scheduler, runtime } = createHarness();
    runtime.buildGate = new Gate();
    await scheduler.start();

    const jobId = await scheduler.submit(nginxRequest());
    await expect(scheduler.rerun(jobId)).rejects.toBeInstanceOf(TargetBusyError);

    runtime.buildGate.release();
    await scheduler.waitForJob(jobId);
  });

  test("rerun of an unknown job is NotFound", async () => {
    const { scheduler } = createHarness();
    await scheduler.start();

    await expect(scheduler.rerun("missing")).rejects.toBeInstanceOf(JobNotFoundError);
  });
});

describe("JobScheduler lifecycle", () => {
  test("emits start and stop once", async () => {
    const { scheduler } = createHarness();
    const events: string[] = [];
    scheduler.on("scheduler:start", () => events.push("start"));
    scheduler.on("scheduler:stop", () => events.push("stop"));

    await scheduler.start();
    await scheduler.start();
    await scheduler.stop();
    await scheduler.stop();

    expect(events).toEqual(["start", "stop"]);
    expect(scheduler.isRunning()).toBe(false);
  });

  test("stop cancels in-flight jobs and closes admission", async () => {
    const { scheduler, runtime } = createHarness();
    runtime.buildGate = new Gate();
    await scheduler.start();

    const jobId = await scheduler.submit(nginxRequest());
    await waitFor(async () => (await stateOf(scheduler, jobId)) === "building");

    await scheduler.stop();
    await expect(scheduler.submit(nginxRequest("api"))).rejects.toBeInstanceOf(
      SchedulerNotRunningError
    );

    runtime.buildGate.release();
    await expect(scheduler.waitForJob(jobId)).resolves.toMatchObject({ state: "cancelled" });
  });

  test("graceful stop waits for in-flight jobs", async () => {
    const { scheduler, runtime } = createHarness();
    const gate = new Gate();
    runtime.buildGate = gate;
    await scheduler.start();

    const jobId = await scheduler.submit(nginxRequest());
    setTimeout(() => gate.release(), 30);

    await scheduler.stop({ graceful: true, timeoutMs: 2000 });

    expect(await stateOf(scheduler, jobId)).toBe("succeeded");
  });

  test("graceful stop gives up at its timeout", async () => {
    const { scheduler, runtime } = createHarness();
    runtime.buildGate = new Gate();
    await scheduler.start();

    const jobId = await scheduler.submit(nginxRequest());
    await scheduler.stop({ graceful: true, timeoutMs: 20 });

    expect(await stateOf(scheduler, jobId)).toBe("building");
    runtime.buildGate.release();
    await scheduler.waitForJob(jobId);
  });
});

describe("JobScheduler crash recovery", () => {
  async function interruptedJob(store: InMemoryJobStore, id: string, target: string, state: JobState) {
    await store.create(newJob(id, target));
    const path: JobState[] = ["building", "starting", "health_checking"];
    let current: JobState = "queued";
    for (const next of path) {
      if (current === state) break;
      await store.updateState(id, current, next, {
        ...(next === "health_checking" ? { container: { id: `c-${id}`, name: `deploy-${target}` } } : {}),
      });
      current = next;
    }
  }

  test("fails jobs left non-terminal and stops their containers", async () => {
    const store = new InMemoryJobStore();
    await interruptedJob(store, "job-1", "web", "health_checking");
    await interruptedJob(store, "job-2", "api", "queued");

    const { scheduler, runtime } = createHarness({ store });
    const recovered: number[] = [];
    scheduler.on("recovery:complete", ({ recovered: count }) => recovered.push(count));

    await scheduler.start();

    expect(recovered).toEqual([2]);
    expect(runtime.calls).toEqual(["stop deploy-web"]);

    const web = await store.findById("job-1");
    expect(web?.state).toBe("failed");
    expect(web?.terminalReason).toEqual({
      code: "InternalError",
      message: "Interrupted by scheduler restart while health_checking",
    });
    expect((await store.findById("job-2"))?.terminalReason?.message).toBe(
      "Interrupted by scheduler restart while queued"
    );

    const events = await store.listEvents("job-1");
    expect(events.map((e) => e.state)).toEqual(["failed"]);

    const jobId = await scheduler.submit(nginxRequest());
    await expect(scheduler.waitForJob(jobId)).resolves.toMatchObject({ state: "succeeded" });
  });

  test("a job that cannot be recovered keeps its target locked", async () => {
    class StuckStore extends InMemoryJobStore {
      async updateState(
        ...args: Parameters<InMemoryJobStore["updateState"]>
      ): Promise<Job> {
        if (args[0] === "stuck") throw new Error("primary stepped down");
        return super.updateState(...args);
      }
    }

    const store = new StuckStore();
    await store.create(newJob("stuck"));

    const { scheduler } = createHarness({ store });
    const errors: string[] = [];
    scheduler.on("scheduler:error", (err) => errors.push(err.message));

    await scheduler.start();

    expect(errors).toEqual(["primary stepped down"]);
    await expect(scheduler.submit(nginxRequest())).rejects.toBeInstanceOf(TargetBusyError);
    const other = await scheduler.submit(nginxRequest("api"));
    await expect(scheduler.waitForJob(other)).resolves.toMatchObject({ state: "succeeded" });
  });

  test("cancelling an unrecovered job frees its target", async () => {
    class UnavailableStore extends InMemoryJobStore {
      unavailable = true;

      async updateState(
        ...args: Parameters<InMemoryJobStore["updateState"]>
      ): Promise<Job> {
        if (this.unavailable) throw new Error("primary stepped down");
        return super.updateState(...args);
      }
    }

    const store = new UnavailableStore();
    await store.create(newJob("stuck"));

    const { scheduler } = createHarness({ store });
    await scheduler.start();
    expect(scheduler.stats().lockedTargets).toBe(1);

    store.unavailable = false;
    await scheduler.cancel("stuck");

    const stuck = await store.findById("stuck");
    expect(stuck?.state).toBe("cancelled");
    expect(stuck?.terminalReason?.message).toBe("Cancelled while queued with no live executor");
    expect(scheduler.stats().lockedTargets).toBe(0);

    const jobId = await scheduler.submit(nginxRequest());
    await expect(scheduler.waitForJob(jobId)).resolves.toMatchObject({ state: "succeeded" });
  });

  test("concurrent start calls recover each job once", async () => {
    const store = new InMemoryJobStore();
    await store.create(newJob("job-1"));

    const { scheduler } = createHarness({ store });
    const errors: string[] = [];
    const recovered: number[] = [];
    scheduler.on("scheduler:error", (err) => errors.push(err.message));
    scheduler.on("recovery:complete", ({ recovered: count }) => recovered.push(count));

    await Promise.all([scheduler.start(), scheduler.start()]);

    expect(errors).toEqual([]);
    expect(recovered).toEqual([1]);
    expect((await store.findById("job-1"))?.state).toBe("failed");
    expect(await store.listEvents("job-1")).toHaveLength(1);
    expect(scheduler.stats().lockedTargets).toBe(0);

    const jobId = await scheduler.submit(nginxRequest());
    await expect(scheduler.waitForJob(jobId)).resolves.toMatchObject({ state: "succeeded" });
  });

  test("a recovery write that landed despite an error leaves the target free", async () => {
    class LateAckStore extends InMemoryJobStore {
      async updateState(
        ...args: Parameters<InMemoryJobStore["updateState"]>
      ): Promise<Job> {
        const updated = await super.updateState(...args);
        if (args[0] === "job-1") throw new Error("write concern timed out");
        return updated;
      }
    }

    const store = new LateAckStore();
    await store.create(newJob("job-1"));

    const { scheduler } = createHarness({ store });
    const errors: string[] = [];
    scheduler.on("scheduler:error", (err) => errors.push(err.message));

    await scheduler.start();

    expect(errors).toEqual(["write concern timed out"]);
    expect((await store.findById("job-1"))?.state).toBe("failed");
    expect(scheduler.stats().lockedTargets).toBe(0);

    const jobId = await scheduler.submit(nginxRequest());
    await expect(scheduler.waitForJob(jobId)).resolves.toMatchObject({ state: "succeeded" });
  });
});

describe("JobScheduler queries and streams", () => {
  test("deploymentMetrics counts jobs by outcome", async () => {
    const { scheduler, runtime } = createHarness();
    await scheduler.start();

    const empty = await scheduler.deploymentMetrics();
    expect(empty).toMatchObject({ total: 0, successRate: 0 });

    await scheduler.waitForJob(await scheduler.submit(nginxRequest("web")));
    await scheduler.waitForJob(await scheduler.submit(nginxRequest("admin")));
    runtime.buildError = new Error("no space left on device");
    await scheduler.waitForJob(await scheduler.submit(nginxRequest("api")));

    runtime.buildError = undefined;
    runtime.buildGate = new Gate();
    const pending = await scheduler.submit(nginxRequest("db"));
    await waitFor(async () => (await stateOf(scheduler, pending)) === "building");

    expect(await scheduler.deploymentMetrics()).toEqual({
      total: 4,
      succeeded: 2,
      failed: 1,
      cancelled: 0,
      inProgress: 1,
      successRate: 66.67,
      byState: {
        queued: 0,
        building: 1,
        starting: 0,
        health_checking: 0,
        succeeded: 2,
        failed: 1,
        cancelled: 0,
      },
    });

    runtime.buildGate.release();
    await scheduler.waitForJob(pending);
  });

  test("getJob returns null for unknown ids", async () => {
    const { scheduler } = createHarness();
    expect(await scheduler.getJob("missing")).toBeNull();
  });

  test("listJobs filters by target and state", async () => {
    const { scheduler, runtime } = createHarness();
    await scheduler.start();

    const web = await scheduler.submit(nginxRequest("web"));
    await scheduler.waitForJob(web);
    runtime.buildError = new Error("no space left on device");
    const api = await scheduler.submit(nginxRequest("api"));
    await scheduler.waitForJob(api);

    const failed = await scheduler.listJobs({ state: "failed" });
    expect(failed.map((j) => j.id)).toEqual([api]);

    const forWeb = await scheduler.listJobs({ target: "web" });
    expect(forWeb.map((j) => j.id)).toEqual([web]);
  });

  test("subscribers see the live event stream of a target", async () => {
    const { scheduler } = createHarness();
    await scheduler.start();
    const subscription = scheduler.subscribe({ target: "web" });

    const jobId = await scheduler.submit(nginxRequest());
    await scheduler.submit(nginxRequest("api"));
    await scheduler.waitForJob(jobId);

    const events = subscription.take();
    expect(events.every((e) => e.jobId === jobId)).toBe(true);
    expect(events.map((e) => e.state)).toEqual([
      "queued",
      "building",
      "starting",
      "health_checking",
      "succeeded",
    ]);

    scheduler.unsubscribe(subscription);
    expect(scheduler.getBus().stats().subscribers).toBe(0);
  });

  test("streamLogs reads from the job's container", async () => {
    const { scheduler, runtime } = createHarness();
    runtime.logLines = ["nginx: ready", "GET / 200"];
    await scheduler.start();

    const jobId = await scheduler.submit(nginxRequest());
    await scheduler.waitForJob(jobId);

    const lines: string[] = [];
    for await (const line of await scheduler.streamLogs(jobId)) {
      lines.push(line);
    }
    expect(lines).toEqual(["nginx: ready", "GET / 200"]);
  });

  test("streamLogs needs a started container", async () => {
    const { scheduler, runtime } = createHarness();
    runtime.buildError = new Error("no such image");
    await scheduler.start();

    const jobId = await scheduler.submit(nginxRequest());
    await scheduler.waitForJob(jobId);

    await expect(scheduler.streamLogs(jobId)).rejects.toMatchObject({ code: "NotFound" });
    await expect(scheduler.streamLogs("missing")).rejects.toBeInstanceOf(OrchestratorError);
  });
});

test("constructor rejects an invalid capacity", () => {
  expect(
    () =>
      new JobScheduler({
        store: new InMemoryJobStore(),
        runtime: new FakeRuntime(),
        probe: new FakeProbe(),
        maxConcurrentJobs: 0,
      })
  ).toThrow("Invalid maxConcurrentJobs: 0");
});
