/**
 * EventStore Test Suite
 *
 * Covers: stream registry, CRC32 checksums, JSONL writer/reader roundtrip,
 * per-stream sequences, cursor-based resume, CRC32 validation, torn-write
 * recovery, sequence restore, segment rotation and skipping of segments a
 * cursor has already passed.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { appendFileSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { tmpdir } from "node:os"

// ---------------------------------------------------------------------------
// Module under test
// ---------------------------------------------------------------------------

import {
  registerEventStream,
  isRegisteredStream,
  assertRegisteredStream,
  getRegisteredStreams,
  STREAM_REGISTRY,
  EVENT_ENVELOPE_SCHEMA_VERSION,
  computePayloadChecksum,
  crc32,
  JsonlEventWriter,
  JsonlEventReader,
  type EventStream,
  type EventEnvelope,
} from "../../src/events/index.js"
import { listSegments, parseEnvelopeLine, segmentName } from "../../src/events/jsonl-segments.js"

const STREAM_AUDIT = registerEventStream("audit_test")

async function collect(reader: JsonlEventReader, stream: EventStream, lastSequence?: number) {
  const events: EventEnvelope[] = []
  const cursor = lastSequence === undefined ? undefined : { stream, last_sequence: lastSequence }
  for await (const evt of reader.replay(stream, cursor)) {
    events.push(evt)
  }
  return events
}

// =========================================================================
// 1. Stream Registry
// =========================================================================

describe("EventStream Registry", () => {
  it("pre-registers the registry stream", () => {
    expect(getRegisteredStreams().has("registry")).toBe(true)
    const stream: EventStream = STREAM_REGISTRY
    expect(stream).toBe("registry")
  })

  it("isRegisteredStream returns true for registered, false for unknown", () => {
    expect(isRegisteredStream("registry")).toBe(true)
    expect(isRegisteredStream("unknown_stream")).toBe(false)
  })

  it("assertRegisteredStream throws for unknown streams", () => {
    expect(() => assertRegisteredStream("nonexistent")).toThrow(/Unknown event stream/)
    expect(assertRegisteredStream("registry")).toBe("registry")
  })

  it("registerEventStream rejects invalid names", () => {
    expect(() => registerEventStream("")).toThrow(/Invalid stream name/)
    expect(() => registerEventStream("Invalid-Name")).toThrow(/must match/)
    expect(() => registerEventStream("123starts_with_number")).toThrow(/must match/)
  })
})

// =========================================================================
// 2. CRC32 & Checksum
// =========================================================================

describe("CRC32 / computePayloadChecksum", () => {
  it("matches the standard check value", () => {
    expect(crc32("123456789")).toBe("cbf43926")
    expect(crc32("")).toBe("00000000")
  })

  it("computePayloadChecksum serializes via JSON.stringify", () => {
    const payload = { tokenId: "1", to: "0x1111111111111111111111111111111111111111" }
    expect(computePayloadChecksum(payload)).toBe(crc32(JSON.stringify(payload)))
  })
})

// =========================================================================
// 3. Segment helpers
// =========================================================================

describe("JSONL segments", () => {
  it("segmentName embeds the stream", () => {
    expect(segmentName("registry", "01ABC")).toBe("events-registry-01ABC.jsonl")
  })

  it("listSegments returns [] for a missing directory", () => {
    expect(listSegments(join(tmpdir(), "does-not-exist-segments"))).toEqual([])
  })

  it("parseEnvelopeLine rejects malformed JSON and non-envelopes", () => {
    expect(parseEnvelopeLine("{not json")).toBeNull()
    expect(parseEnvelopeLine(JSON.stringify({ event_id: "x" }))).toBeNull()
  })
})

// =========================================================================
// 4. JSONL Writer / Reader roundtrip
// =========================================================================

describe("JsonlEventWriter + JsonlEventReader", () => {
  let testDir: string

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "eventstore-test-"))
  })

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true })
  })

  it("writes and reads back events on a single stream", async () => {
    const writer = new JsonlEventWriter({ dir: testDir, now: () => 1_700_000_000_000 })

    const e1 = await writer.append(STREAM_REGISTRY, "Transfer", { tokenId: "1" }, "commit-1")
    const e2 = await writer.append(STREAM_REGISTRY, "ArtifactIssued", { tokenId: "1" }, "commit-1")
    await writer.close()

    expect(e1.sequence).toBe(1)
    expect(e2.sequence).toBe(2)
    expect(e1.stream).toBe(STREAM_REGISTRY)
    expect(e1.timestamp).toBe(1_700_000_000_000)
    expect(e1.schema_version).toBe(EVENT_ENVELOPE_SCHEMA_VERSION)
    expect(e1.event_id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/)
    expect(e1.checksum).toBe(crc32(JSON.stringify({ tokenId: "1" })))

    const reader = new JsonlEventReader({ dir: testDir })
    const events = await collect(reader, STREAM_REGISTRY)
    await reader.close()

    expect(events.map((e) => [e.sequence, e.event_type, e.correlation_id])).toEqual([
      [1, "Transfer", "commit-1"],
      [2, "ArtifactIssued", "commit-1"],
    ])
    expect(events[0].payload).toEqual({ tokenId: "1" })
  })

  it("rejects appends after close", async () => {
    const writer = new JsonlEventWriter({ dir: testDir })
    await writer.close()
    await expect(writer.append(STREAM_REGISTRY, "x", {}, "c")).rejects.toThrow("JsonlEventWriter is closed")
  })

  it("maintains per-stream independent sequences and isolates replay", async () => {
    const writer = new JsonlEventWriter({ dir: testDir })

    const r1 = await writer.append(STREAM_REGISTRY, "Transfer", { r: 1 }, "c1")
    const a1 = await writer.append(STREAM_AUDIT, "note", { a: 1 }, "c2")
    const r2 = await writer.append(STREAM_REGISTRY, "Approval", { r: 2 }, "c3")
    await writer.close()

    expect([r1.sequence, r2.sequence, a1.sequence]).toEqual([1, 2, 1])
    expect(writer.lastSequence(STREAM_REGISTRY)).toBe(2)

    const reader = new JsonlEventReader({ dir: testDir })
    expect((await collect(reader, STREAM_REGISTRY)).map((e) => e.payload)).toEqual([{ r: 1 }, { r: 2 }])
    expect((await collect(reader, STREAM_AUDIT)).map((e) => e.payload)).toEqual([{ a: 1 }])
    await reader.close()
  })

  it("cursor-based replay resumes after last_sequence", async () => {
    const writer = new JsonlEventWriter({ dir: testDir })
    for (let n = 1; n <= 5; n++) {
      await writer.append(STREAM_REGISTRY, `e${n}`, { n }, `c${n}`)
    }
    await writer.close()

    const reader = new JsonlEventReader({ dir: testDir })
    const events = await collect(reader, STREAM_REGISTRY, 3)
    await reader.close()

    expect(events.map((e) => e.sequence)).toEqual([4, 5])
  })

  it("a cursor past unchanged segments skips reading them", async () => {
    const writer = new JsonlEventWriter({ dir: testDir, maxSegmentBytes: 1 })
    for (let n = 1; n <= 3; n++) {
      await writer.append(STREAM_REGISTRY, `e${n}`, { n }, `c${n}`)
    }

    const readFile = vi.fn((path: string) => readFileSync(path, "utf-8"))
    const reader = new JsonlEventReader({ dir: testDir, readFile })

    expect((await collect(reader, STREAM_REGISTRY)).map((e) => e.sequence)).toEqual([1, 2, 3])
    expect(readFile).toHaveBeenCalledTimes(3)

    expect((await collect(reader, STREAM_REGISTRY, 2)).map((e) => e.sequence)).toEqual([3])
    expect(readFile).toHaveBeenCalledTimes(4)

    await writer.append(STREAM_REGISTRY, "e4", { n: 4 }, "c4")
    await writer.close()

    expect((await collect(reader, STREAM_REGISTRY, 3)).map((e) => e.sequence)).toEqual([4])
    expect(readFile).toHaveBeenCalledTimes(5)
    await reader.close()
  })

  it("re-reads a segment once it has grown", async () => {
    const writer = new JsonlEventWriter({ dir: testDir })
    await writer.append(STREAM_REGISTRY, "e1", {}, "c1")
    await writer.append(STREAM_REGISTRY, "e2", {}, "c2")

    const readFile = vi.fn((path: string) => readFileSync(path, "utf-8"))
    const reader = new JsonlEventReader({ dir: testDir, readFile })

    expect(await collect(reader, STREAM_REGISTRY)).toHaveLength(2)
    expect(await collect(reader, STREAM_REGISTRY, 2)).toEqual([])
    expect(readFile).toHaveBeenCalledTimes(1)

    await writer.append(STREAM_REGISTRY, "e3", {}, "c3")
    await writer.close()

    expect((await collect(reader, STREAM_REGISTRY, 2)).map((e) => e.event_type)).toEqual(["e3"])
    expect(readFile).toHaveBeenCalledTimes(2)
    await reader.close()
  })

  it("CRC32 validation skips corrupt entries with a warning", async () => {
    const writer = new JsonlEventWriter({ dir: testDir })
    await writer.append(STREAM_REGISTRY, "good1", { ok: true }, "c1")
    await writer.append(STREAM_REGISTRY, "good2", { ok: true }, "c2")
    await writer.close()

    const segments = readdirSync(testDir).filter((f) => f.endsWith(".jsonl"))
    expect(segments).toHaveLength(1)
    const segPath = join(testDir, segments[0])
    const lines = readFileSync(segPath, "utf-8").split("\n").filter((l) => l.trim())
    const tampered = lines[1].replace(/"checksum":"[0-9a-f]{8}"/, '"checksum":"00000000"')
    writeFileSync(segPath, lines[0] + "\n" + tampered + "\n", "utf-8")

    const warn = vi.fn()
    const reader = new JsonlEventReader({ dir: testDir, warn })
    const events = await collect(reader, STREAM_REGISTRY)
    await reader.close()

    expect(events.map((e) => e.event_type)).toEqual(["good1"])
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("CRC32 mismatch"))
  })

  it("torn-write recovery: incomplete last line is skipped silently", async () => {
    const writer = new JsonlEventWriter({ dir: testDir })
    await writer.append(STREAM_REGISTRY, "complete", { ok: true }, "c1")
    await writer.close()

    const [segment] = readdirSync(testDir).filter((f) => f.endsWith(".jsonl"))
    appendFileSync(join(testDir, segment), '{"event_id":"torn","stream":"regi', "utf-8")

    const warn = vi.fn()
    const reader = new JsonlEventReader({ dir: testDir, warn })
    const events = await collect(reader, STREAM_REGISTRY)
    await reader.close()

    expect(events.map((e) => e.event_type)).toEqual(["complete"])
    expect(warn).not.toHaveBeenCalled()
  })

  it("a corrupt line in the middle is reported", async () => {
    const writer = new JsonlEventWriter({ dir: testDir })
    await writer.append(STREAM_REGISTRY, "first", {}, "c1")
    await writer.close()

    const [segment] = readdirSync(testDir).filter((f) => f.endsWith(".jsonl"))
    appendFileSync(join(testDir, segment), "garbage\n", "utf-8")

    const writer2 = new JsonlEventWriter({ dir: testDir })
    await writer2.append(STREAM_REGISTRY, "second", {}, "c2")
    await writer2.close()

    const warn = vi.fn()
    const reader = new JsonlEventReader({ dir: testDir, warn })
    const events = await collect(reader, STREAM_REGISTRY)
    await reader.close()

    expect(events.map((e) => [e.sequence, e.event_type])).toEqual([
      [1, "first"],
      [2, "second"],
    ])
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("line 2"))
  })

  it("sequence recovery: new writer resumes from previous max", async () => {
    const writer1 = new JsonlEventWriter({ dir: testDir })
    await writer1.append(STREAM_REGISTRY, "e1", {}, "c1")
    await writer1.append(STREAM_REGISTRY, "e2", {}, "c2")
    await writer1.append(STREAM_REGISTRY, "e3", {}, "c3")
    await writer1.close()

    const writer2 = new JsonlEventWriter({ dir: testDir })
    expect(writer2.lastSequence(STREAM_REGISTRY)).toBe(3)
    const e4 = await writer2.append(STREAM_REGISTRY, "e4", {}, "c4")
    await writer2.close()

    expect(e4.sequence).toBe(4)
  })

  it("rotates to a new segment once the active one is full", async () => {
    const writer = new JsonlEventWriter({ dir: testDir, maxSegmentBytes: 1 })
    await writer.append(STREAM_REGISTRY, "e1", { n: 1 }, "c1")
    await writer.append(STREAM_REGISTRY, "e2", { n: 2 }, "c2")
    await writer.append(STREAM_REGISTRY, "e3", { n: 3 }, "c3")
    await writer.close()

    expect(listSegments(testDir, "registry")).toHaveLength(3)

    const reader = new JsonlEventReader({ dir: testDir })
    expect((await collect(reader, STREAM_REGISTRY)).map((e) => e.sequence)).toEqual([1, 2, 3])
    await reader.close()
  })

  it("replay after close fails", async () => {
    const reader = new JsonlEventReader({ dir: testDir })
    await reader.close()
    await expect(collect(reader, STREAM_REGISTRY)).rejects.toThrow("JsonlEventReader is closed")
  })
})
