import type { ToolEvent, ToolEventType } from "@toolgate/shared";
import type { EventStream } from "./event-stream.js";

export type EventOfType<T extends ToolEventType> = Extract<ToolEvent, { type: T }>;

export function isEventOfType<T extends ToolEventType>(
  event: ToolEvent,
  types: readonly T[],
): event is EventOfType<T> {
  return types.some((type) => type === event.type);
}

/** Forwards only events whose type is listed; with no types everything passes. */
export function filterEvents(source: AsyncIterable<ToolEvent>): AsyncGenerator<ToolEvent>;
export function filterEvents<T extends ToolEventType>(
  source: AsyncIterable<ToolEvent>,
  ...types: [T, ...T[]]
): AsyncGenerator<EventOfType<T>>;
export async function* filterEvents(
  source: AsyncIterable<ToolEvent>,
  ...types: ToolEventType[]
): AsyncGenerator<ToolEvent> {
  for await (const event of source) {
    if (types.length === 0 || isEventOfType(event, types)) {
      yield event;
    }
  }
}

/** Captures every event a stream publishes, for inspection or replay. */
export class EventRecorder {
  private recorded: ToolEvent[] = [];
  private detachFn?: () => void;

  attach(stream: EventStream): this {
    this.detach();
    this.detachFn = stream.onAll((event) => {
      this.recorded.push(event);
    });
    return this;
  }

  detach(): void {
    this.detachFn?.();
    this.detachFn = undefined;
  }

  events(): ToolEvent[] {
    return [...this.recorded];
  }

  ofType<T extends ToolEventType>(...types: T[]): EventOfType<T>[] {
    return this.recorded.filter((event): event is EventOfType<T> => isEventOfType(event, types));
  }

  types(): ToolEventType[] {
    return this.recorded.map((event) => event.type);
  }

  clear(): void {
    this.recorded = [];
  }
}
