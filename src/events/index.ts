/**
 * EventStore Module
 *
 * Append-only event infrastructure. Backend-agnostic interfaces with a JSONL
 * file backend.
 */

// Types and stream registry
export {
  type EventEnvelope,
  type EventCursor,
  type EventStream,
  EVENT_ENVELOPE_SCHEMA_VERSION,
  registerEventStream,
  isRegisteredStream,
  assertRegisteredStream,
  getRegisteredStreams,
  STREAM_REGISTRY,
  computePayloadChecksum,
  crc32,
} from "./types.js"

// Interfaces
export { type EventWriter } from "./writer.js"
export { type EventReader } from "./reader.js"

// JSONL backend
export { JsonlEventWriter, type JsonlEventWriterOptions } from "./jsonl-writer.js"
export { JsonlEventReader, type JsonlEventReaderOptions } from "./jsonl-reader.js"
