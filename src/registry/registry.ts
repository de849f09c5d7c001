// src/registry/registry.ts — ArtifactRegistry: the owning aggregate
//
// Wires the ledger, delegation table, authorizer, mint gate, record store and
// royalty policy around one journal, one pending-event buffer and one
// single-flight guard. Every mutating entry point goes through execute():
//
//   guard.run → journal.begin → operation → journal.commit → publish facts
//                                  ↓ throw
//                  journal.rollback + buffer.discard → rethrow
//
// Facts are delivered to subscribers after the guard is released, so a
// listener may itself call back into the registry. Commits are delivered in
// commit order: a call made from a listener is queued behind the commit that
// is still being delivered.
//
// restore() re-applies facts read back from the event log at boot, through
// the same components, without publishing them.

import { getAddress, type Hex } from "viem"
import { ArtifactRecordStore } from "./artifact-store.js"
import type { BlockClock } from "./clock.js"
import { DelegationTable } from "./delegation-table.js"
import { RegistryError } from "./errors.js"
import {
  EventBuffer,
  type ArtifactIssuedEvent,
  type RegistryEvent,
  type RegistryEventListener,
} from "./events.js"
import { IdentityLedger } from "./identity-ledger.js"
import { supportsInterface } from "./interfaces.js"
import { Journal } from "./journal.js"
import { MintGate } from "./mint-gate.js"
import { ReceiverDirectory, type ArtifactReceiver } from "./receiver.js"
import { RoyaltyPolicy } from "./royalty-policy.js"
import { SingleFlightGuard } from "./single-flight.js"
import { TransferAuthorizer } from "./transfer-authorizer.js"
import {
  DEFAULT_ROYALTY_BPS,
  MAX_SUPPLY,
  MINT_PRICE_WEI,
  isNullAddress,
  sameAddress,
  type Address,
  type ArtifactRecord,
  type Hash,
  type RegistryOptions,
  type RoyaltyQuote,
} from "./types.js"

export interface RegistryDeps {
  clock: BlockClock
  /** Called when a subscriber throws while a committed fact is delivered */
  onListenerError?: (error: unknown, event: RegistryEvent) => void
}

export class ArtifactRegistry {
  readonly name: string
  readonly symbol: string
  readonly controller: Address

  private uri: string
  private treasury = 0n
  private commits = 0

  private readonly journal = new Journal()
  private readonly buffer = new EventBuffer()
  private readonly guard = new SingleFlightGuard()
  private readonly listeners = new Set<RegistryEventListener>()
  private readonly outbox: Array<{ commit: number; events: RegistryEvent[] }> = []
  private delivering = false
  private readonly receivers = new ReceiverDirectory()

  private readonly ledger: IdentityLedger
  private readonly delegations: DelegationTable
  private readonly authorizer: TransferAuthorizer
  private readonly records: ArtifactRecordStore
  private readonly gate: MintGate
  private readonly royalty: RoyaltyPolicy
  private readonly onListenerError: (error: unknown, event: RegistryEvent) => void

  constructor(options: RegistryOptions, deps: RegistryDeps) {
    this.name = options.name
    this.symbol = options.symbol
    this.uri = options.baseURI ?? ""
    this.controller = getAddress(options.controller)

    this.ledger = new IdentityLedger(this.journal)
    this.delegations = new DelegationTable(this.ledger, this.buffer, this.journal)
    this.authorizer = new TransferAuthorizer(this.ledger, this.delegations, this.buffer)
    this.records = new ArtifactRecordStore(this.journal)
    this.gate = new MintGate(this.authorizer, this.records, deps.clock, this.buffer, this.journal)
    this.royalty = new RoyaltyPolicy(
      this.controller,
      options.royaltyReceiver ?? this.controller,
      options.royaltyBps ?? DEFAULT_ROYALTY_BPS,
      this.buffer,
      this.journal,
    )
    this.onListenerError = deps.onListenerError ?? defaultListenerError
  }

  // ---------------------------------------------------------------------------
  // Read Surface
  // ---------------------------------------------------------------------------

  get baseURI(): string {
    return this.uri
  }

  get totalMinted(): bigint {
    return this.gate.totalMinted
  }

  get remainingSupply(): bigint {
    return this.gate.remainingSupply
  }

  get nextTokenId(): bigint {
    return this.gate.nextTokenId
  }

  get maxSupply(): bigint {
    return MAX_SUPPLY
  }

  get mintPrice(): bigint {
    return MINT_PRICE_WEI
  }

  get royaltyBps(): number {
    return this.royalty.basisPoints
  }

  get royaltyReceiver(): Address {
    return this.royalty.receiver
  }

  /** Retained mint payments not yet withdrawn */
  get treasuryBalance(): bigint {
    return this.treasury
  }

  royaltyInfo(salePrice: bigint): RoyaltyQuote {
    return this.royalty.royaltyInfo(salePrice)
  }

  artifactData(tokenId: bigint): ArtifactRecord {
    return this.records.get(tokenId)
  }

  cooldownRemaining(holder: Address): bigint {
    return this.gate.cooldownRemaining(holder)
  }

  balanceOf(holder: Address): bigint {
    return this.ledger.balanceOf(holder)
  }

  ownerOf(tokenId: bigint): Address {
    return this.ledger.ownerOf(tokenId)
  }

  getApproved(tokenId: bigint): Address {
    return this.delegations.getApproved(tokenId)
  }

  isApprovedForAll(holder: Address, operator: Address): boolean {
    return this.delegations.isApprovedForAll(holder, operator)
  }

  supportsInterface(interfaceId: Hex): boolean {
    return supportsInterface(interfaceId)
  }

  /** Whether a mutating call is currently executing */
  get busy(): boolean {
    return this.guard.isHeld
  }

  // ---------------------------------------------------------------------------
  // Mutating Surface
  // ---------------------------------------------------------------------------

  /** Issue a new artifact. Payment above the price is kept, not refunded. */
  mint(caller: Address, payment: bigint, to: Address, traitCommitment: Hash, layerCount: number): bigint {
    return this.execute(() => {
      const tokenId = this.gate.mint({ caller, payment, to, traitCommitment, layerCount })
      this.creditTreasury(payment)
      this.receivers.checkAccepts(getAddress(caller), null, to, tokenId, "0x")
      return tokenId
    })
  }

  approve(caller: Address, spender: Address, tokenId: bigint): void {
    this.execute(() => this.delegations.approve(caller, tokenId, spender))
  }

  setApprovalForAll(caller: Address, operator: Address, approved: boolean): void {
    this.execute(() => this.delegations.setApprovalForAll(caller, operator, approved))
  }

  transferFrom(caller: Address, from: Address, to: Address, tokenId: bigint): void {
    this.execute(() => this.authorizer.transfer(caller, from, to, tokenId))
  }

  /** transferFrom plus the recipient acceptance check */
  safeTransferFrom(caller: Address, from: Address, to: Address, tokenId: bigint, data: Hex = "0x"): void {
    this.execute(() => {
      this.authorizer.transfer(caller, from, to, tokenId)
      this.receivers.checkAccepts(getAddress(caller), getAddress(from), to, tokenId, data)
    })
  }

  configureRoyalty(caller: Address, payee: Address, basisPoints: number): void {
    this.execute(() => this.royalty.configure(caller, payee, basisPoints))
  }

  setBaseURI(caller: Address, next: string): void {
    this.execute(() => {
      this.assertController(caller)
      const previous = this.uri
      this.replaceURI(next)
      this.buffer.emit({ type: "BaseURIChanged", previous, next })
    })
  }

  /** Move the whole treasury balance to `to`. Returns the amount moved. */
  withdraw(caller: Address, to: Address): bigint {
    return this.execute(() => {
      this.assertController(caller)
      if (isNullAddress(to)) {
        throw new RegistryError("TransferToZero", "Withdrawal to the null address")
      }
      const amount = this.treasury
      this.creditTreasury(-amount)
      this.buffer.emit({ type: "Withdrawal", to: getAddress(to), amount })
      return amount
    })
  }

  // ---------------------------------------------------------------------------
  // Collaborators
  // ---------------------------------------------------------------------------

  /** Mark an address as a contract account with an acceptance hook */
  registerReceiver(address: Address, receiver: ArtifactReceiver): void {
    this.receivers.register(address, receiver)
  }

  unregisterReceiver(address: Address): void {
    this.receivers.unregister(address)
  }

  /** Receive committed facts in emission order. Returns an unsubscribe function. */
  subscribe(listener: RegistryEventListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /** Number of committed mutating calls, including restored ones */
  get commitCount(): number {
    return this.commits
  }

  // ---------------------------------------------------------------------------
  // Recovery
  // ---------------------------------------------------------------------------

  /**
   * Re-apply one fact read back from the event log under the commit it was
   * recorded in. Facts must arrive in log order. Goes through the same
   * components as the live call, so ownership, supply and id order are
   * checked again; a fact that does not fit leaves state untouched and throws.
   * Nothing is published. Later live calls are numbered after `commit`.
   */
  restore(event: RegistryEvent, commit: number): void {
    if (!Number.isInteger(commit) || commit < this.commits || commit < 1) {
      throw new Error(`Cannot restore commit ${commit} after commit ${this.commits}`)
    }
    this.guard.run(() => {
      this.journal.begin()
      try {
        this.apply(event)
        this.journal.commit()
      } catch (e) {
        this.journal.rollback()
        throw e
      } finally {
        this.buffer.discard()
      }
    })
    this.commits = commit
  }

  private apply(event: RegistryEvent): void {
    switch (event.type) {
      case "Transfer":
        if (event.from === null) this.authorizer.issue(event.to, event.tokenId)
        else this.authorizer.transfer(event.from, event.from, event.to, event.tokenId)
        return
      case "ArtifactIssued":
        this.restoreIssued(event)
        return
      case "Approval":
        this.delegations.approve(event.owner, event.tokenId, event.spender)
        return
      case "ApprovalForAll":
        this.delegations.setApprovalForAll(event.owner, event.operator, event.approved)
        return
      case "RoyaltyConfigured":
        this.royalty.configure(this.controller, event.payee, event.basisPoints)
        return
      case "BaseURIChanged":
        this.replaceURI(event.next)
        return
      case "Withdrawal":
        if (event.amount > this.treasury) {
          throw new Error(`Withdrawal of ${event.amount} exceeds treasury balance ${this.treasury}`)
        }
        this.creditTreasury(-event.amount)
        return
    }
  }

  private restoreIssued(event: ArtifactIssuedEvent): void {
    if (!this.ledger.exists(event.tokenId)) {
      throw new Error(`Issuance of ${event.tokenId} has no preceding Transfer`)
    }
    this.gate.restore(event)
    this.creditTreasury(event.payment)
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private execute<T>(operation: () => T): T {
    const { result, events } = this.guard.run(() => {
      this.journal.begin()
      try {
        const value = operation()
        this.journal.commit()
        return { result: value, events: this.buffer.drain() }
      } catch (e) {
        this.journal.rollback()
        this.buffer.discard()
        throw e
      }
    })
    this.publish(events)
    return result
  }

  private publish(events: RegistryEvent[]): void {
    this.outbox.push({ commit: ++this.commits, events })
    // Re-entered from a listener: the outer loop picks this commit up next
    if (this.delivering) return
    this.delivering = true
    try {
      for (let next = this.outbox.shift(); next; next = this.outbox.shift()) {
        this.deliver(next.commit, next.events)
      }
    } finally {
      this.delivering = false
    }
  }

  private deliver(commit: number, events: RegistryEvent[]): void {
    events.forEach((event, index) => {
      for (const listener of this.listeners) {
        try {
          listener(event, { commit, index, count: events.length })
        } catch (error) {
          this.onListenerError(error, event)
        }
      }
    })
  }

  private assertController(caller: Address): void {
    if (!sameAddress(caller, this.controller)) {
      throw new RegistryError("NotController", `${caller} is not the controller`)
    }
  }

  private replaceURI(next: string): void {
    const previous = this.uri
    this.uri = next
    this.journal.record(() => {
      this.uri = previous
    })
  }

  private creditTreasury(delta: bigint): void {
    const previous = this.treasury
    this.treasury = previous + delta
    this.journal.record(() => {
      this.treasury = previous
    })
  }
}

function defaultListenerError(error: unknown, event: RegistryEvent): void {
  console.error(
    `[registry] event listener failed on ${event.type}: ${error instanceof Error ? error.message : String(error)}`,
  )
}
