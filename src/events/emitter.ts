import { EventEmitter } from "events";
import { SchedulerEventMap } from "../types/events";
import { toError } from "../core/errors";
import { Logger, silentLogger } from "../logging/logger";

export type EventMap = Record<string, unknown>;

type Listener<T extends EventMap, K extends keyof T> = (payload: T[K]) => void;

/**
 * EventEmitter keyed by an event map, so payload types follow event names
 */
export class TypedEventEmitter<T extends EventMap> {
  private readonly emitter = new EventEmitter();

  on<K extends keyof T & string>(event: K, listener: Listener<T, K>): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof T & string>(event: K, listener: Listener<T, K>): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof T & string>(event: K, listener: Listener<T, K>): this {
    this.emitter.off(event, listener);
    return this;
  }

  listenerCount(event: keyof T & string): number {
    return this.emitter.listenerCount(event);
  }

  protected emitUnsafe<K extends keyof T & string>(event: K, payload: T[K]): void {
    this.emitter.emit(event, payload);
  }
}

/**
 * Scheduler events. Listener failures are rerouted to `scheduler:error`
 * and never reach the caller; an error nobody listens for is logged.
 */
export class SchedulerEmitter extends TypedEventEmitter<SchedulerEventMap> {
  constructor(private readonly logger: Logger = silentLogger) {
    super();
  }

  emitSafe<K extends keyof SchedulerEventMap & string>(
    event: K,
    payload: SchedulerEventMap[K]
  ): void {
    try {
      this.emitUnsafe(event, payload);
    } catch (err) {
      this.reportError(toError(err), event);
    }
  }

  private reportError(error: Error, source: string): void {
    if (this.listenerCount("scheduler:error") === 0) {
      this.logger.error(`Listener for ${source} failed`, error);
      return;
    }

    try {
      this.emitUnsafe("scheduler:error", error);
    } catch (nested) {
      this.logger.error(`Listener for ${source} failed`, toError(nested));
    }
  }
}
