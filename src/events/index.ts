export { SchedulerEmitter, TypedEventEmitter } from "./emitter";
export type { EventMap } from "./emitter";
export { EventBus } from "./event-bus";
export type { EventBusOptions, EventBusStats } from "./event-bus";
export { Subscription } from "./subscription";
export type { SubscriptionFilter } from "./subscription";
