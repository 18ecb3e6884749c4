import { EventEmitter } from "node:events";
import { nowISO } from "@toolgate/shared";
import type { ToolEvent, ToolEventData, ToolEventType } from "@toolgate/shared";
import type { OverflowPolicy } from "../config/types.js";
import { errorMessage } from "../errors/errors.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";

export type ToolEventInput = { [T in ToolEventType]: { type: T; data: ToolEventData[T] } }[ToolEventType];

type EventHandler = (event: ToolEvent) => void;

export type EventStreamOptions = {
  /** Events held for pull consumers before the overflow policy applies. */
  capacity?: number;
  overflow?: OverflowPolicy;
  logger?: Logger;
};

export const DEFAULT_EVENT_CAPACITY = 1024;

/**
 * Ordered lifecycle event stream shared by every call of a dispatcher.
 *
 * `publish` never blocks: push subscribers run synchronously and are isolated
 * from each other, while pull consumers (`for await`) read from a bounded
 * buffer. When the buffer is full, `drop-oldest` evicts the oldest unread
 * event and `drop-newest` discards the incoming one; either way the loss is
 * counted in `dropped`.
 */
export class EventStream implements AsyncIterable<ToolEvent> {
  private emitter = new EventEmitter();
  private buffer: ToolEvent[] = [];
  private waiters: Array<(result: IteratorResult<ToolEvent>) => void> = [];
  private counter = 0;
  private droppedCount = 0;
  private closed = false;
  private readonly capacity: number;
  private readonly overflow: OverflowPolicy;
  private readonly logger: Logger;

  constructor(opts: EventStreamOptions = {}) {
    this.capacity = Math.max(1, opts.capacity ?? DEFAULT_EVENT_CAPACITY);
    this.overflow = opts.overflow ?? "drop-oldest";
    this.logger = opts.logger ?? silentLogger();
    this.emitter.setMaxListeners(0);
  }

  publish(input: ToolEventInput): ToolEvent {
    Object.freeze(input.data);
    const event: ToolEvent = Object.freeze({ ...input, seq: ++this.counter, timestamp: nowISO() });

    if (this.closed) {
      this.droppedCount++;
      this.logger.debug("event published after close", { type: event.type, seq: event.seq });
      return event;
    }

    this.emitter.emit("event", event);
    this.emitter.emit(`call:${event.data.callId}`, event);
    this.enqueue(event);
    return event;
  }

  onAll(handler: EventHandler): () => void {
    const wrapped = this.isolate(handler);
    this.emitter.on("event", wrapped);
    return () => this.emitter.off("event", wrapped);
  }

  onCall(callId: string, handler: EventHandler): () => void {
    const wrapped = this.isolate(handler);
    this.emitter.on(`call:${callId}`, wrapped);
    return () => this.emitter.off(`call:${callId}`, wrapped);
  }

  /** Removes and returns everything buffered for pull consumers. */
  drain(): ToolEvent[] {
    const out = this.buffer;
    this.buffer = [];
    return out;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get buffered(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Ends iteration once the buffer is drained; later publishes are dropped. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<ToolEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  private next(): Promise<IteratorResult<ToolEvent>> {
    const event = this.buffer.shift();
    if (event) return Promise.resolve({ value: event, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private enqueue(event: ToolEvent): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
      return;
    }
    if (this.buffer.length >= this.capacity) {
      this.droppedCount++;
      if (this.overflow === "drop-newest") return;
      this.buffer.shift();
    }
    this.buffer.push(event);
  }

  private isolate(handler: EventHandler): EventHandler {
    return (event) => {
      try {
        handler(event);
      } catch (err) {
        this.logger.warn("event subscriber threw", {
          type: event.type,
          error: errorMessage(err),
        });
      }
    };
  }
}
