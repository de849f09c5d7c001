/**
 * JSONL segment helpers shared by the writer and reader.
 *
 * Segment files are named `events-<stream>-<ulid>.jsonl`; ULIDs sort
 * lexicographically by creation time, so a sorted listing is replay order.
 */

import { readdirSync } from "node:fs"
import { isRegisteredStream, type EventEnvelope } from "./types.js"

export const SEGMENT_PREFIX = "events-"
export const SEGMENT_SUFFIX = ".jsonl"

export function segmentName(stream: string, id: string): string {
  return `${SEGMENT_PREFIX}${stream}-${id}${SEGMENT_SUFFIX}`
}

/** All segment files in dir (optionally for one stream), oldest first */
export function listSegments(dir: string, stream?: string): string[] {
  const prefix = stream === undefined ? SEGMENT_PREFIX : `${SEGMENT_PREFIX}${stream}-`
  let entries: string[]
  try {
    entries = readdirSync(dir)
  } catch {
    return []
  }
  return entries.filter((f) => f.startsWith(prefix) && f.endsWith(SEGMENT_SUFFIX)).sort()
}

function isEnvelope(value: unknown): value is EventEnvelope {
  if (typeof value !== "object" || value === null) return false
  const v: Record<string, unknown> = { ...value }
  return (
    typeof v.event_id === "string" &&
    typeof v.stream === "string" &&
    isRegisteredStream(v.stream) &&
    typeof v.event_type === "string" &&
    typeof v.timestamp === "number" &&
    typeof v.correlation_id === "string" &&
    typeof v.sequence === "number" &&
    typeof v.checksum === "string" &&
    typeof v.schema_version === "number" &&
    "payload" in v
  )
}

/**
 * Parse one JSONL line into an envelope.
 * Returns null for malformed JSON or a line that is not an envelope.
 */
export function parseEnvelopeLine(line: string): EventEnvelope | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(line)
  } catch {
    return null
  }
  return isEnvelope(parsed) ? parsed : null
}
