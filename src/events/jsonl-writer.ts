/**
 * JSONL EventWriter
 *
 * Append-only JSONL file backend for EventStore.
 *
 * Sequence authority: WAL-position. Sequence = previous max + 1,
 * assigned on successful append, so the stream is gap-free: a gap seen on
 * replay means an entry was lost or skipped as corrupt.
 *
 * Segment rotation: new file when current exceeds max size (default 64MB).
 * Torn-write recovery: unparseable lines are ignored when sequences are restored.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, statSync } from "node:fs"
import { join } from "node:path"
import { monotonicFactory } from "ulid"
import type { EventWriter } from "./writer.js"
import type { EventEnvelope, EventStream } from "./types.js"
import { assertRegisteredStream, computePayloadChecksum, EVENT_ENVELOPE_SCHEMA_VERSION } from "./types.js"
import { listSegments, parseEnvelopeLine, segmentName } from "./jsonl-segments.js"

const DEFAULT_MAX_SEGMENT_BYTES = 64 * 1024 * 1024

export interface JsonlEventWriterOptions {
  /** Directory for JSONL segments */
  dir: string
  /** Max segment size in bytes before rotation (default: 64MB) */
  maxSegmentBytes?: number
  /** Clock for envelope timestamps (default: Date.now) */
  now?: () => number
}

export class JsonlEventWriter implements EventWriter {
  private readonly dir: string
  private readonly maxSegmentBytes: number
  private readonly now: () => number
  private readonly nextId = monotonicFactory()
  /** Per-stream sequence counters, restored from disk on construction */
  private readonly sequences = new Map<string, number>()
  /** Per-stream active segment path */
  private readonly activeSegments = new Map<string, string>()
  private closed = false

  get dataDir(): string {
    return this.dir
  }

  constructor(options: JsonlEventWriterOptions) {
    this.dir = options.dir
    this.maxSegmentBytes = options.maxSegmentBytes ?? DEFAULT_MAX_SEGMENT_BYTES
    this.now = options.now ?? Date.now

    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true })
    }

    this.restoreSequences()
  }

  async append<T>(
    stream: EventStream,
    event_type: string,
    payload: T,
    correlation_id: string,
  ): Promise<EventEnvelope<T>> {
    if (this.closed) {
      throw new Error("JsonlEventWriter is closed")
    }
    assertRegisteredStream(stream)

    const timestamp = this.now()
    const envelope: EventEnvelope<T> = {
      event_id: this.nextId(timestamp),
      stream,
      event_type,
      timestamp,
      correlation_id,
      sequence: (this.sequences.get(stream) ?? 0) + 1,
      checksum: computePayloadChecksum(payload),
      schema_version: EVENT_ENVELOPE_SCHEMA_VERSION,
      payload,
    }

    appendFileSync(this.segmentFor(stream), JSON.stringify(envelope) + "\n", "utf-8")
    // Sequence advances only once the line is on disk
    this.sequences.set(stream, envelope.sequence)

    return envelope
  }

  /** Last sequence handed out for a stream (0 if none) */
  lastSequence(stream: EventStream): number {
    return this.sequences.get(stream) ?? 0
  }

  async close(): Promise<void> {
    this.closed = true
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private restoreSequences(): void {
    for (const seg of listSegments(this.dir)) {
      const content = readFileSync(join(this.dir, seg), "utf-8")
      for (const line of content.split("\n")) {
        if (line.trim().length === 0) continue
        const envelope = parseEnvelopeLine(line)
        if (!envelope) continue
        const current = this.sequences.get(envelope.stream) ?? 0
        if (envelope.sequence > current) {
          this.sequences.set(envelope.stream, envelope.sequence)
        }
      }
    }
  }

  private segmentFor(stream: string): string {
    const active = this.activeSegments.get(stream) ?? this.latestSegment(stream)
    if (active && existsSync(active) && statSync(active).size < this.maxSegmentBytes) {
      this.activeSegments.set(stream, active)
      return active
    }

    const fresh = join(this.dir, segmentName(stream, this.nextId(this.now())))
    appendFileSync(fresh, "", "utf-8") // touch
    this.activeSegments.set(stream, fresh)
    return fresh
  }

  private latestSegment(stream: string): string | undefined {
    const segments = listSegments(this.dir, stream)
    const latest = segments[segments.length - 1]
    return latest === undefined ? undefined : join(this.dir, latest)
  }
}
