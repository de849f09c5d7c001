/**
 * JSONL EventReader
 *
 * Reads events from JSONL segment files in order.
 * Validates CRC32 checksums — skips corrupt entries with warning.
 * Supports cursor-based replay (resume from last processed sequence).
 *
 * Segments read to the end are remembered by size and highest sequence, so a
 * cursor past a segment that has not grown skips it without reading it.
 */

import { existsSync, readFileSync, statSync } from "node:fs"
import { join } from "node:path"
import type { EventReader } from "./reader.js"
import type { EventCursor, EventEnvelope, EventStream } from "./types.js"
import { computePayloadChecksum } from "./types.js"
import { listSegments, parseEnvelopeLine } from "./jsonl-segments.js"

export interface JsonlEventReaderOptions {
  /** Directory containing JSONL segments */
  dir: string
  /** Sink for corruption warnings (default: console.warn) */
  warn?: (message: string) => void
  /** Segment loader (default: readFileSync as UTF-8) */
  readFile?: (path: string) => string
}

interface ScannedSegment {
  /** Byte size when last read to the end */
  size: number
  /** Highest sequence of the stream in the segment */
  maxSequence: number
}

export class JsonlEventReader implements EventReader {
  private readonly dir: string
  private readonly warn: (message: string) => void
  private readonly readFile: (path: string) => string
  private readonly scanned = new Map<string, ScannedSegment>()
  private closed = false

  get dataDir(): string {
    return this.dir
  }

  constructor(options: JsonlEventReaderOptions) {
    this.dir = options.dir
    this.warn = options.warn ?? ((message) => console.warn(message))
    this.readFile = options.readFile ?? ((path) => readFileSync(path, "utf-8"))
  }

  async *replay<T = unknown>(
    stream: EventStream,
    cursor?: EventCursor,
  ): AsyncIterable<EventEnvelope<T>> {
    for (const envelope of this.scan(stream, cursor?.last_sequence ?? 0)) {
      // Payload shape is owned by the stream's producer
      yield envelope as EventEnvelope<T>
    }
  }

  async close(): Promise<void> {
    this.closed = true
  }

  private *scan(stream: EventStream, afterSequence: number): Generator<EventEnvelope> {
    if (this.closed) {
      throw new Error("JsonlEventReader is closed")
    }

    for (const seg of listSegments(this.dir, stream)) {
      const fullPath = join(this.dir, seg)
      if (!existsSync(fullPath)) continue

      const size = statSync(fullPath).size
      const known = this.scanned.get(seg)
      if (known && known.size === size && known.maxSequence <= afterSequence) continue

      const lines = this.readFile(fullPath).split("\n")
      let maxSequence = 0
      for (let i = 0; i < lines.length; i++) {
        const line = lines[i].trim()
        if (line.length === 0) continue

        const envelope = parseEnvelopeLine(line)
        if (!envelope) {
          // A torn final line is expected after a crash; anything else is corruption
          if (i < lines.length - 1 && lines.slice(i + 1).some((l) => l.trim().length > 0)) {
            this.warn(`[JsonlEventReader] Corrupt entry in ${seg} line ${i + 1}, skipping`)
          }
          continue
        }

        if (envelope.stream !== stream) continue
        if (envelope.sequence > maxSequence) maxSequence = envelope.sequence
        if (envelope.sequence <= afterSequence) continue

        const expectedChecksum = computePayloadChecksum(envelope.payload)
        if (envelope.checksum !== expectedChecksum) {
          this.warn(
            `[JsonlEventReader] CRC32 mismatch in ${seg} line ${i + 1}: ` +
            `expected=${expectedChecksum}, got=${envelope.checksum}. Skipping.`,
          )
          continue
        }

        yield envelope
      }
      // Only reached when the consumer read the whole segment
      this.scanned.set(seg, { size, maxSequence })
    }
  }
}
