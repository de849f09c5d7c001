// src/registry/events.ts — Registry facts (the audit trail indexers consume)
//
// Components emit into a pending buffer while a call runs. The registry
// publishes the buffer only after the call commits; a failed call discards it,
// so every published fact belongs to exactly one successful call.

import type { Address, Hash } from "./types.js"

// ---------------------------------------------------------------------------
// Fact Types
// ---------------------------------------------------------------------------

export interface TransferEvent {
  type: "Transfer"
  /** null for issuance */
  from: Address | null
  to: Address
  tokenId: bigint
}

export interface ApprovalEvent {
  type: "Approval"
  owner: Address
  spender: Address
  tokenId: bigint
}

export interface ApprovalForAllEvent {
  type: "ApprovalForAll"
  owner: Address
  operator: Address
  approved: boolean
}

export interface ArtifactIssuedEvent {
  type: "ArtifactIssued"
  to: Address
  tokenId: bigint
  traitCommitment: Hash
  layerCount: number
  payment: bigint
  /** Caller whose cooldown the mint started */
  minter: Address
  /** Block the artifact was issued at */
  mintedAt: bigint
}

export interface RoyaltyConfiguredEvent {
  type: "RoyaltyConfigured"
  payee: Address
  basisPoints: number
}

export interface BaseURIChangedEvent {
  type: "BaseURIChanged"
  previous: string
  next: string
}

export interface WithdrawalEvent {
  type: "Withdrawal"
  to: Address
  amount: bigint
}

export type RegistryEvent =
  | TransferEvent
  | ApprovalEvent
  | ApprovalForAllEvent
  | ArtifactIssuedEvent
  | RoyaltyConfiguredEvent
  | BaseURIChangedEvent
  | WithdrawalEvent

export type RegistryEventType = RegistryEvent["type"]

/** Which committed call a delivered fact belongs to */
export interface CommitInfo {
  /** Increments once per successful mutating call, starting at 1 */
  commit: number
  /** Position of this fact within the call's facts */
  index: number
  /** Number of facts the call produced */
  count: number
}

export type RegistryEventListener = (event: RegistryEvent, info: CommitInfo) => void

// ---------------------------------------------------------------------------
// Pending Buffer
// ---------------------------------------------------------------------------

export class EventBuffer {
  private pending: RegistryEvent[] = []

  emit(event: RegistryEvent): void {
    this.pending.push(event)
  }

  /** Take everything emitted so far, leaving the buffer empty */
  drain(): RegistryEvent[] {
    const out = this.pending
    this.pending = []
    return out
  }

  discard(): void {
    this.pending = []
  }

  get size(): number {
    return this.pending.length
  }
}

// ---------------------------------------------------------------------------
// Wire Form
// ---------------------------------------------------------------------------

/** JSON-safe rendering: bigints become decimal strings */
export type WireRegistryEvent = {
  [E in RegistryEvent as E["type"]]: {
    [K in keyof E]: E[K] extends bigint ? string : E[K]
  }
}[RegistryEventType]

export function toWireEvent(event: RegistryEvent): WireRegistryEvent {
  switch (event.type) {
    case "Transfer":
    case "Approval":
      return { ...event, tokenId: event.tokenId.toString() }
    case "ArtifactIssued":
      return {
        ...event,
        tokenId: event.tokenId.toString(),
        payment: event.payment.toString(),
        mintedAt: event.mintedAt.toString(),
      }
    case "Withdrawal":
      return { ...event, amount: event.amount.toString() }
    case "ApprovalForAll":
    case "RoyaltyConfigured":
    case "BaseURIChanged":
      return event
  }
}
