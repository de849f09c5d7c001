// src/registry/mint-gate.ts — Admission control and id allocation for new artifacts
//
// Checks run in a fixed order and the first failure wins:
//   recipient → supply cap → payment floor → layer bound → cooldown
// (the reentrancy check happens one level up, when the registry acquires its
// single-flight guard before calling in here).
//
// On admission: stamp the caller's cooldown, allocate the next id, write the
// immutable record, hand the id to the authorizer's issuance path, then emit
// the issuance fact.

import { getAddress } from "viem"
import type { ArtifactRecordStore } from "./artifact-store.js"
import type { BlockClock } from "./clock.js"
import { RegistryError } from "./errors.js"
import type { ArtifactIssuedEvent, EventBuffer } from "./events.js"
import { Journal } from "./journal.js"
import type { TransferAuthorizer } from "./transfer-authorizer.js"
import {
  FIRST_TOKEN_ID,
  MAX_LAYERS_PER_ARTIFACT,
  MAX_SUPPLY,
  MINT_COOLDOWN_BLOCKS,
  MINT_PRICE_WEI,
  isNullAddress,
  type Address,
  type Hash,
} from "./types.js"

export interface MintRequest {
  caller: Address
  /** Value attached to the call, in wei */
  payment: bigint
  to: Address
  traitCommitment: Hash
  layerCount: number
}

export class MintGate {
  private nextId = FIRST_TOKEN_ID
  private minted = 0n
  /** Lowercase caller → block of its last successful mint */
  private readonly lastMintBlock = new Map<string, bigint>()

  constructor(
    private readonly authorizer: TransferAuthorizer,
    private readonly records: ArtifactRecordStore,
    private readonly clock: BlockClock,
    private readonly events: EventBuffer,
    private readonly journal: Journal = new Journal(),
  ) {}

  get totalMinted(): bigint {
    return this.minted
  }

  get nextTokenId(): bigint {
    return this.nextId
  }

  get remainingSupply(): bigint {
    return this.minted >= MAX_SUPPLY ? 0n : MAX_SUPPLY - this.minted
  }

  /** Blocks until caller may mint again; 0 if never minted or expired */
  cooldownRemaining(caller: Address): bigint {
    const last = this.lastMintBlock.get(caller.toLowerCase()) ?? 0n
    if (last === 0n) return 0n
    const readyAt = last + MINT_COOLDOWN_BLOCKS
    const now = this.clock.now()
    return now >= readyAt ? 0n : readyAt - now
  }

  mint(request: MintRequest): bigint {
    const { caller, payment, to, traitCommitment, layerCount } = request

    if (isNullAddress(to)) {
      throw new RegistryError("MintToZero", "Mint to the null address")
    }
    if (this.minted >= MAX_SUPPLY) {
      throw new RegistryError("SupplyCapExceeded", `Supply cap of ${MAX_SUPPLY} reached`)
    }
    if (payment < MINT_PRICE_WEI) {
      throw new RegistryError(
        "PaymentTooLow",
        `Mint price is ${MINT_PRICE_WEI} wei, received ${payment}`,
      )
    }
    if (!Number.isInteger(layerCount) || layerCount < 0 || layerCount > MAX_LAYERS_PER_ARTIFACT) {
      throw new RegistryError(
        "LayerIndexOutOfRange",
        `Layer count must be an integer in [0, ${MAX_LAYERS_PER_ARTIFACT}] (got ${layerCount})`,
      )
    }
    const wait = this.cooldownRemaining(caller)
    if (wait > 0n) {
      throw new RegistryError("CooldownActive", `Mint cooldown active for ${wait} more block(s)`)
    }

    const now = this.clock.now()
    this.journal.setIn(this.lastMintBlock, caller.toLowerCase(), now)

    const tokenId = this.allocate()
    this.records.write(tokenId, { traitCommitment, layerCount, mintedAt: now })
    this.authorizer.issue(to, tokenId)

    this.events.emit({
      type: "ArtifactIssued",
      to: getAddress(to),
      tokenId,
      traitCommitment,
      layerCount,
      payment,
      minter: getAddress(caller),
      mintedAt: now,
    })
    return tokenId
  }

  /**
   * Re-apply an issuance read back from the event log: allocation, record and
   * the minter's cooldown stamp. Ownership comes from the Transfer fact that
   * precedes it. No admission checks beyond id order and the supply cap.
   */
  restore(issued: ArtifactIssuedEvent): void {
    if (issued.tokenId !== this.nextId) {
      throw new Error(`MintGate: issuance of ${issued.tokenId} out of order (expected ${this.nextId})`)
    }
    if (this.minted >= MAX_SUPPLY) {
      throw new RegistryError("SupplyCapExceeded", `Supply cap of ${MAX_SUPPLY} reached`)
    }
    const { traitCommitment, layerCount, mintedAt } = issued
    this.journal.setIn(this.lastMintBlock, issued.minter.toLowerCase(), mintedAt)
    this.allocate()
    this.records.write(issued.tokenId, { traitCommitment, layerCount, mintedAt })
  }

  private allocate(): bigint {
    const tokenId = this.nextId
    const previousMinted = this.minted
    this.nextId = tokenId + 1n
    this.minted = previousMinted + 1n
    this.journal.record(() => {
      this.nextId = tokenId
      this.minted = previousMinted
    })
    return tokenId
  }
}
