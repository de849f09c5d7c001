/**
 * EventStore Type Definitions
 *
 * Unified event envelope for append-only streams. The registry's committed
 * facts are the first stream; others can be registered at boot.
 */

// ---------------------------------------------------------------------------
// Branded EventStream type — open registry
// ---------------------------------------------------------------------------

declare const _eventStreamBrand: unique symbol
export type EventStream = string & { readonly [_eventStreamBrand]: true }

const _registeredStreams = new Set<string>()

export function registerEventStream(name: string): EventStream {
  if (!name || typeof name !== "string" || name.length === 0) {
    throw new Error(`Invalid stream name: ${String(name)}`)
  }
  if (!/^[a-z][a-z0-9_]*$/.test(name)) {
    throw new Error(
      `Stream name must match /^[a-z][a-z0-9_]*$/: ${name}`,
    )
  }
  _registeredStreams.add(name)
  return name as EventStream
}

export function isRegisteredStream(name: string): name is EventStream {
  return _registeredStreams.has(name)
}

export function assertRegisteredStream(name: string): EventStream {
  if (!isRegisteredStream(name)) {
    throw new Error(`Unknown event stream: ${name}. Register it first via registerEventStream().`)
  }
  return name
}

export function getRegisteredStreams(): ReadonlySet<string> {
  return _registeredStreams
}

/** Committed registry facts (transfers, approvals, issuance, configuration) */
export const STREAM_REGISTRY = registerEventStream("registry")

// ---------------------------------------------------------------------------
// EventEnvelope<T> — the universal event container
// ---------------------------------------------------------------------------

export interface EventEnvelope<T = unknown> {
  /** ULID — globally unique event identifier */
  readonly event_id: string
  /** Branded stream name — determines backend routing */
  readonly stream: EventStream
  /** Application-level event type (e.g. "Transfer", "ArtifactIssued") */
  readonly event_type: string
  /** Unix milliseconds */
  readonly timestamp: number
  /** Trace correlation — links events produced by one call */
  readonly correlation_id: string
  /** Per-stream 1, 2, 3…, assigned by the writer on successful append */
  readonly sequence: number
  /** CRC32 hex of JSON.stringify(payload) */
  readonly checksum: string
  /** Envelope schema version for forward compat */
  readonly schema_version: number
  /** The event data */
  readonly payload: T
}

/** Current envelope schema version */
export const EVENT_ENVELOPE_SCHEMA_VERSION = 1

// ---------------------------------------------------------------------------
// EventCursor — replay position (sequence-based)
// ---------------------------------------------------------------------------

export interface EventCursor {
  /** Stream to resume from */
  readonly stream: EventStream
  /** Last processed sequence number — replay starts AFTER this */
  readonly last_sequence: number
}

// ---------------------------------------------------------------------------
// CRC32 — lightweight checksum for event payloads
// ---------------------------------------------------------------------------

const CRC32_TABLE = new Int32Array(256)
for (let i = 0; i < 256; i++) {
  let c = i
  for (let j = 0; j < 8; j++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
  }
  CRC32_TABLE[i] = c
}

export function crc32(data: string): string {
  let crc = ~0
  for (let i = 0; i < data.length; i++) {
    crc = CRC32_TABLE[(crc ^ data.charCodeAt(i)) & 0xff] ^ (crc >>> 8)
  }
  return ((crc ^ ~0) >>> 0).toString(16).padStart(8, "0")
}

/**
 * Compute CRC32 checksum for an event payload.
 */
export function computePayloadChecksum<T>(payload: T): string {
  return crc32(JSON.stringify(payload))
}
