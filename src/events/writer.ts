// src/events/writer.ts — Append side of the registry event log
//
// The registry event sink is the only producer. The writer owns everything
// but the fact itself: event id, checksum, timestamp and the per-stream
// sequence that GET /events pages by.

import type { EventEnvelope, EventStream } from "./types.js"

export interface EventWriter {
  /** Resolves once the fact is on disk, with the sequence it was given */
  append<T>(
    stream: EventStream,
    eventType: string,
    payload: T,
    correlationId: string,
  ): Promise<EventEnvelope<T>>

  close(): Promise<void>
}
