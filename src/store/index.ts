export type { JobStore, NewJob, StateUpdate } from "./job-store";
export { InMemoryJobStore } from "./in-memory-job-store";
export { MongoJobStore } from "./mongo/mongo-job-store";
export type { MongoJobStoreOptions } from "./mongo/mongo-job-store";
export { connectMongo } from "./mongo/connect";
export { JobNotFoundError, StateConflictError, InvalidTransitionError } from "./store-errors";
