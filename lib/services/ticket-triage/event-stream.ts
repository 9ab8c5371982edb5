/**
 * Event Stream
 *
 * Turns a workflow run into a lazy, single-pass sequence of `StreamEvent`s.
 * The run starts when the caller begins iterating, pushes events through a
 * bounded channel, and waits whenever the caller falls behind.
 */

import { BoundedChannel, type ChannelControl } from "../../utils/bounded-channel";
import type { StreamEvent } from "./types";

export type EmitEvent = (event: StreamEvent) => Promise<boolean>;

/**
 * Produces the events of one run. `emit` resolves to false once the consumer
 * has gone away; the producer should stop at its next step boundary.
 */
export type EventProducer = (emit: EmitEvent, control: ChannelControl) => Promise<void>;

export class EventStream implements AsyncIterable<StreamEvent> {
  private consumed = false;

  constructor(
    private readonly producer: EventProducer,
    private readonly bufferSize: number,
  ) {}

  [Symbol.asyncIterator](): AsyncIterator<StreamEvent, undefined> {
    if (this.consumed) {
      throw new Error("Event stream already consumed; start a new request to replay");
    }
    this.consumed = true;

    const channel = new BoundedChannel<StreamEvent>(this.bufferSize);
    void this.producer((event) => channel.send(event), channel).then(
      () => channel.close(),
      (error: unknown) => channel.fail(error),
    );
    return channel[Symbol.asyncIterator]();
  }
}

/**
 * Drain a stream into an array (tests and the one-shot endpoint).
 */
export async function collectEvents(stream: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

/**
 * Encode a stream as newline-delimited JSON for HTTP transport.
 */
export function toNdjson(stream: AsyncIterable<StreamEvent>): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  let iterator: AsyncIterator<StreamEvent> | undefined;

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      iterator ??= stream[Symbol.asyncIterator]();
      const { value, done } = await iterator.next();
      if (done) {
        controller.close();
        return;
      }
      controller.enqueue(encoder.encode(`${JSON.stringify(value)}\n`));
    },
    async cancel() {
      await iterator?.return?.();
    },
  });
}

/**
 * Human-readable line for any event, including tags this version does not know.
 */
export function describeEvent(event: { type: string; [key: string]: unknown }): string {
  switch (event.type) {
    case "status":
    case "error":
      return `[${event.type}] ${String(event.message ?? "")}`;
    case "node_start":
      return `→ ${String(event.node)}`;
    case "node_complete":
      return `✓ ${String(event.node)}`;
    case "interrupt":
      return `? ${String(event.question)} (thread ${String(event.thread_id)})`;
    case "message":
      return String(event.content ?? "");
    default: {
      const { type, ...payload } = event;
      return `[${type}] ${JSON.stringify(payload)}`;
    }
  }
}
