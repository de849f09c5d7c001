// src/events/reader.ts — Read side of the registry event log
//
// Read at boot, to fold the registry stream back into a fresh registry
// (registry/replay.ts), and by GET /events, which pages through it.

import type { EventCursor, EventEnvelope, EventStream } from "./types.js"

export interface EventReader {
  /**
   * Envelopes of one stream in sequence order, starting after
   * `cursor.last_sequence` when a cursor is given. Entries whose checksum
   * does not match are skipped with a warning.
   */
  replay<T = unknown>(stream: EventStream, cursor?: EventCursor): AsyncIterable<EventEnvelope<T>>

  close(): Promise<void>
}
