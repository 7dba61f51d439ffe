import { Job } from "../types/job";
import { JobEvent, NewJobEvent } from "../types/events";
import { JobState, canTransition, emptyStateCounts, isTerminal } from "../types/lifecycle";
import { JobQuery } from "../types/query";
import { JobStore, NewJob, StateUpdate } from "./job-store";
import {
  InvalidTransitionError,
  JobNotFoundError,
  StateConflictError,
} from "./store-errors";
import { Mutex } from "./mutex";

export class InMemoryJobStore implements JobStore {
  private jobs = new Map<string, Job>();
  private events = new Map<string, JobEvent[]>();
  private mutex = new Mutex();

  async create(job: NewJob): Promise<Job> {
    return this.mutex.runExclusive(() => {
      if (this.jobs.has(job.id)) {
        throw new Error(`Job ${job.id} already exists`);
      }

      const now = new Date();
      const stored: Job = { ...structuredClone(job), createdAt: now, updatedAt: now };

      this.jobs.set(stored.id, stored);
      this.events.set(stored.id, []);
      return structuredClone(stored);
    });
  }

  async findById(jobId: string): Promise<Job | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async updateState(
    jobId: string,
    expected: JobState,
    next: JobState,
    update: StateUpdate = {}
  ): Promise<Job> {
    return this.mutex.runExclusive(() => {
      const job = this.jobs.get(jobId);
      if (!job) throw new JobNotFoundError(jobId);

      if (job.state !== expected) {
        throw new StateConflictError(jobId, expected, job.state);
      }
      if (!canTransition(job.state, next)) {
        throw new InvalidTransitionError(jobId, job.state, next);
      }

      const updated: Job = {
        ...job,
        ...structuredClone(update),
        state: next,
        updatedAt: new Date(),
      };
      if (!isTerminal(next)) {
        delete updated.terminalReason;
      }

      this.jobs.set(jobId, updated);
      return structuredClone(updated);
    });
  }

  async listByTarget(target: string): Promise<Job[]> {
    return this.findAll({
      target,
      sort: { field: "createdAt", order: "desc" },
    });
  }

  async appendEvent(event: NewJobEvent): Promise<JobEvent> {
    return this.mutex.runExclusive(() => {
      const log = this.events.get(event.jobId);
      if (!log) throw new JobNotFoundError(event.jobId);

      const stored: JobEvent = { ...event, sequence: log.length + 1 };
      log.push(stored);
      return { ...stored };
    });
  }

  async listEvents(jobId: string): Promise<JobEvent[]> {
    const log = this.events.get(jobId);
    if (!log) throw new JobNotFoundError(jobId);

    return log.map((event) => ({ ...event }));
  }

  async findAll(query: JobQuery): Promise<Job[]> {
    let jobs = Array.from(this.jobs.values());

    // Filter
    if (query.target) {
      jobs = jobs.filter((j) => j.target === query.target);
    }
    if (query.state) {
      const states = Array.isArray(query.state) ? query.state : [query.state];
      jobs = jobs.filter((j) => states.includes(j.state));
    }

    // Sort
    if (query.sort) {
      const { field, order } = query.sort;
      jobs.sort((a, b) => {
        const valA = a[field].getTime();
        const valB = b[field].getTime();
        return order === "asc" ? valA - valB : valB - valA;
      });
    }

    // Skip/Limit
    const start = query.skip ?? 0;
    const end = query.limit ? start + query.limit : undefined;

    return jobs.slice(start, end).map((job) => structuredClone(job));
  }

  async countByState(): Promise<Record<JobState, number>> {
    const counts = emptyStateCounts();
    for (const job of this.jobs.values()) {
      counts[job.state]++;
    }
    return counts;
  }

  async findNonTerminal(): Promise<Job[]> {
    return Array.from(this.jobs.values())
      .filter((job) => !isTerminal(job.state))
      .map((job) => structuredClone(job));
  }
}
