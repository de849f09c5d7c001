// src/registry/replay.ts — Rebuild registry state from the event log at boot
//
// The `registry` stream is the only durable copy of registry state. On boot
// every fact is read back in sequence order, checked against its wire schema,
// and re-applied through ArtifactRegistry.restore() under the commit number
// carried in its correlation id. Replay completes or throws: a registry
// rebuilt from part of its log would hand out ids that are already taken.

import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { getAddress, isHex } from "viem"
import type { EventReader } from "../events/reader.js"
import { STREAM_REGISTRY } from "../events/types.js"
import type { RegistryEvent } from "./events.js"
import type { ArtifactRegistry } from "./registry.js"
import type { Hash } from "./types.js"

// ---------------------------------------------------------------------------
// Wire Schema
// ---------------------------------------------------------------------------

const AddressString = Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" })
const UintString = Type.String({ pattern: "^[0-9]{1,78}$" })
const Bytes32String = Type.String({ pattern: "^0x[0-9a-fA-F]{64}$" })

/** A registry fact as the event sink writes it (bigints as decimal strings) */
export const WireFact = Type.Union([
  Type.Object({
    type: Type.Literal("Transfer"),
    from: Type.Union([AddressString, Type.Null()]),
    to: AddressString,
    tokenId: UintString,
  }),
  Type.Object({
    type: Type.Literal("Approval"),
    owner: AddressString,
    spender: AddressString,
    tokenId: UintString,
  }),
  Type.Object({
    type: Type.Literal("ApprovalForAll"),
    owner: AddressString,
    operator: AddressString,
    approved: Type.Boolean(),
  }),
  Type.Object({
    type: Type.Literal("ArtifactIssued"),
    to: AddressString,
    tokenId: UintString,
    traitCommitment: Bytes32String,
    layerCount: Type.Integer({ minimum: 0 }),
    payment: UintString,
    minter: AddressString,
    mintedAt: UintString,
  }),
  Type.Object({
    type: Type.Literal("RoyaltyConfigured"),
    payee: AddressString,
    basisPoints: Type.Integer({ minimum: 0 }),
  }),
  Type.Object({
    type: Type.Literal("BaseURIChanged"),
    previous: Type.String(),
    next: Type.String(),
  }),
  Type.Object({
    type: Type.Literal("Withdrawal"),
    to: AddressString,
    amount: UintString,
  }),
])
export type WireFact = Static<typeof WireFact>

/** Inverse of toWireEvent. Throws if the payload is not a registry fact. */
export function fromWireEvent(payload: unknown): RegistryEvent {
  if (!Value.Check(WireFact, payload)) {
    const first = Value.Errors(WireFact, payload).First()
    throw new Error(`Not a registry fact${first ? `: ${first.path || "/"} ${first.message}` : ""}`)
  }

  switch (payload.type) {
    case "Transfer":
      return {
        type: "Transfer",
        from: payload.from === null ? null : getAddress(payload.from),
        to: getAddress(payload.to),
        tokenId: BigInt(payload.tokenId),
      }
    case "Approval":
      return {
        type: "Approval",
        owner: getAddress(payload.owner),
        spender: getAddress(payload.spender),
        tokenId: BigInt(payload.tokenId),
      }
    case "ApprovalForAll":
      return {
        type: "ApprovalForAll",
        owner: getAddress(payload.owner),
        operator: getAddress(payload.operator),
        approved: payload.approved,
      }
    case "ArtifactIssued":
      return {
        type: "ArtifactIssued",
        to: getAddress(payload.to),
        tokenId: BigInt(payload.tokenId),
        traitCommitment: toHash(payload.traitCommitment),
        layerCount: payload.layerCount,
        payment: BigInt(payload.payment),
        minter: getAddress(payload.minter),
        mintedAt: BigInt(payload.mintedAt),
      }
    case "RoyaltyConfigured":
      return { type: "RoyaltyConfigured", payee: getAddress(payload.payee), basisPoints: payload.basisPoints }
    case "BaseURIChanged":
      return { type: "BaseURIChanged", previous: payload.previous, next: payload.next }
    case "Withdrawal":
      return { type: "Withdrawal", to: getAddress(payload.to), amount: BigInt(payload.amount) }
  }
}

function toHash(value: string): Hash {
  if (!isHex(value)) {
    throw new Error(`${value} is not hex`)
  }
  return value
}

// ---------------------------------------------------------------------------
// Replay
// ---------------------------------------------------------------------------

export class RegistryReplayError extends Error {
  constructor(
    /** Log sequence of the entry that could not be applied */
    public readonly sequence: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Registry log entry ${sequence}: ${message}`, options)
    this.name = "RegistryReplayError"
  }
}

export interface RegistryReplayOptions {
  /** Must match the event sink's correlation prefix (default: "commit") */
  correlationPrefix?: string
  now?: () => number
}

export interface RegistryReplayResult {
  factsApplied: number
  /** Commit of the last restored call; 0 for an empty log */
  lastCommit: number
  lastSequence: number
  /** Latest issuance block seen; 0 if nothing was minted */
  lastBlock: bigint
  durationMs: number
}

/**
 * Fold the whole `registry` stream into a freshly constructed registry.
 * Call before anything subscribes to it or serves requests.
 */
export async function replayRegistryLog(
  registry: ArtifactRegistry,
  reader: EventReader,
  options: RegistryReplayOptions = {},
): Promise<RegistryReplayResult> {
  const prefix = `${options.correlationPrefix ?? "commit"}-`
  const now = options.now ?? Date.now
  const start = now()

  let factsApplied = 0
  let lastSequence = 0
  let lastBlock = 0n

  for await (const envelope of reader.replay(STREAM_REGISTRY)) {
    const { sequence } = envelope
    if (sequence !== lastSequence + 1) {
      throw new RegistryReplayError(sequence, `expected sequence ${lastSequence + 1}; the log has a gap`)
    }

    const commit = parseCommit(envelope.correlation_id, prefix)
    if (commit === null) {
      throw new RegistryReplayError(sequence, `correlation id ${envelope.correlation_id} carries no commit number`)
    }

    let fact: RegistryEvent
    try {
      fact = fromWireEvent(envelope.payload)
    } catch (e) {
      throw new RegistryReplayError(sequence, errorMessage(e), { cause: e })
    }
    if (fact.type !== envelope.event_type) {
      throw new RegistryReplayError(sequence, `event type ${envelope.event_type} does not match payload ${fact.type}`)
    }

    try {
      registry.restore(fact, commit)
    } catch (e) {
      throw new RegistryReplayError(sequence, `${fact.type} does not apply: ${errorMessage(e)}`, { cause: e })
    }

    if (fact.type === "ArtifactIssued" && fact.mintedAt > lastBlock) lastBlock = fact.mintedAt
    factsApplied++
    lastSequence = sequence
  }

  return {
    factsApplied,
    lastCommit: registry.commitCount,
    lastSequence,
    lastBlock,
    durationMs: now() - start,
  }
}

function parseCommit(correlationId: string, prefix: string): number | null {
  if (!correlationId.startsWith(prefix)) return null
  const digits = correlationId.slice(prefix.length)
  if (!/^[1-9][0-9]*$/.test(digits)) return null
  const commit = Number(digits)
  return Number.isSafeInteger(commit) ? commit : null
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
