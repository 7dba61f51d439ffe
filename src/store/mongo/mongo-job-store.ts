import { Collection, Db, Filter, ObjectId, WriteConcernSettings } from "mongodb";
import { JobStore, NewJob, StateUpdate } from "../job-store";
import { Job } from "../../types/job";
import { JobEvent, NewJobEvent } from "../../types/events";
import {
  JobState,
  NON_TERMINAL_STATES,
  canTransition,
  emptyStateCounts,
  isTerminal,
} from "../../types/lifecycle";
import { JobQuery } from "../../types/query";
import {
  InvalidTransitionError,
  JobNotFoundError,
  StateConflictError,
} from "../store-errors";
import { Logger, silentLogger } from "../../logging/logger";

type MongoJob = Omit<Job, "id"> & {
  _id: string;

  // last event sequence handed out
  eventCount: number;
};

type MongoJobEvent = JobEvent & { _id?: ObjectId };

export interface MongoJobStoreOptions {
  collectionName?: string;
  eventsCollectionName?: string;
  logger?: Logger;
}

// acknowledged only once journaled on a majority
const DURABLE: WriteConcernSettings = { w: "majority", journal: true };

function toJob(doc: MongoJob): Job {
  const { _id, eventCount: _eventCount, ...rest } = doc;
  return { ...rest, id: _id };
}

function toEvent(doc: MongoJobEvent): JobEvent {
  return {
    jobId: doc.jobId,
    target: doc.target,
    state: doc.state,
    timestamp: doc.timestamp,
    detail: doc.detail,
    sequence: doc.sequence,
  };
}

export class MongoJobStore implements JobStore {
  private readonly jobs: Collection<MongoJob>;
  private readonly events: Collection<MongoJobEvent>;
  private readonly logger: Logger;
  private readonly indexesReady: Promise<void>;

  constructor(db: Db, options: MongoJobStoreOptions = {}) {
    this.jobs = db.collection<MongoJob>(
      options.collectionName ?? "deployment_jobs",
      { writeConcern: DURABLE }
    );
    this.events = db.collection<MongoJobEvent>(
      options.eventsCollectionName ?? "deployment_job_events",
      { writeConcern: DURABLE }
    );
    this.logger = options.logger ?? silentLogger;

    this.indexesReady = this.ensureIndexes().catch((err: unknown) => {
      this.logger.error("Failed to create indexes", err);
    });
  }

  private async ensureIndexes(): Promise<void> {
    await Promise.all([
      this.jobs.createIndex({ target: 1, createdAt: -1 }),
      this.jobs.createIndex({ state: 1 }),
      this.events.createIndex({ jobId: 1, sequence: 1 }, { unique: true }),
    ]);
  }

  /**
   * Resolves once index creation has settled
   */
  ready(): Promise<void> {
    return this.indexesReady;
  }

  async create(job: NewJob): Promise<Job> {
    const now = new Date();
    const { id, ...rest } = job;

    const doc: MongoJob = {
      ...rest,
      _id: id,
      eventCount: 0,
      createdAt: now,
      updatedAt: now,
    };

    await this.jobs.insertOne(doc);
    return toJob(doc);
  }

  async findById(jobId: string): Promise<Job | null> {
    const doc = await this.jobs.findOne({ _id: jobId });
    return doc ? toJob(doc) : null;
  }

  async updateState(
    jobId: string,
    expected: JobState,
    next: JobState,
    update: StateUpdate = {}
  ): Promise<Job> {
    if (!canTransition(expected, next)) {
      throw new InvalidTransitionError(jobId, expected, next);
    }

    const $set: Partial<MongoJob> = {
      ...update,
      state: next,
      updatedAt: new Date(),
    };

    const result = await this.jobs.findOneAndUpdate(
      { _id: jobId, state: expected },
      isTerminal(next)
        ? { $set }
        : { $set, $unset: { terminalReason: "" } },
      { returnDocument: "after" }
    );

    if (result) {
      return toJob(result);
    }

    // CAS missed: tell apart a missing job from a stale expectation
    const current = await this.jobs.findOne({ _id: jobId });
    if (!current) throw new JobNotFoundError(jobId);
    throw new StateConflictError(jobId, expected, current.state);
  }

  async listByTarget(target: string): Promise<Job[]> {
    return this.findAll({
      target,
      sort: { field: "createdAt", order: "desc" },
    });
  }

  async appendEvent(event: NewJobEvent): Promise<JobEvent> {
    const counter = await this.jobs.findOneAndUpdate(
      { _id: event.jobId },
      { $inc: { eventCount: 1 } },
      { returnDocument: "after", projection: { eventCount: 1 } }
    );

    if (!counter) throw new JobNotFoundError(event.jobId);

    const stored: MongoJobEvent = { ...event, sequence: counter.eventCount };
    await this.events.insertOne(stored);
    return toEvent(stored);
  }

  async listEvents(jobId: string): Promise<JobEvent[]> {
    const exists = await this.jobs.countDocuments({ _id: jobId }, { limit: 1 });
    if (exists === 0) throw new JobNotFoundError(jobId);

    const docs = await this.events
      .find({ jobId })
      .sort({ sequence: 1 })
      .toArray();
    return docs.map(toEvent);
  }

  async findAll(query: JobQuery): Promise<Job[]> {
    const filter: Filter<MongoJob> = {};

    if (query.target) {
      filter.target = query.target;
    }
    if (query.state) {
      filter.state = Array.isArray(query.state)
        ? { $in: query.state }
        : query.state;
    }

    let cursor = this.jobs.find(filter);

    if (query.sort) {
      cursor = cursor.sort({
        [query.sort.field]: query.sort.order === "asc" ? 1 : -1,
      });
    }

    if (query.skip) {
      cursor = cursor.skip(query.skip);
    }
    if (query.limit) {
      cursor = cursor.limit(query.limit);
    }

    const docs = await cursor.toArray();
    return docs.map(toJob);
  }

  async countByState(): Promise<Record<JobState, number>> {
    const rows = await this.jobs
      .aggregate<{ _id: JobState; count: number }>([
        { $group: { _id: "$state", count: { $sum: 1 } } },
      ])
      .toArray();

    const counts = emptyStateCounts();
    for (const row of rows) {
      counts[row._id] = row.count;
    }
    return counts;
  }

  async findNonTerminal(): Promise<Job[]> {
    return this.findAll({ state: [...NON_TERMINAL_STATES] });
  }
}
