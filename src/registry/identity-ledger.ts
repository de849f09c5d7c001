// src/registry/identity-ledger.ts — Artifact id → holder map and per-holder counts
//
// Leaf component. setOwner() performs no eligibility checks; the transfer
// authorizer and mint gate validate before calling it.

import { getAddress } from "viem"
import { RegistryError } from "./errors.js"
import { Journal } from "./journal.js"
import { isNullAddress, type Address } from "./types.js"

export class IdentityLedger {
  private readonly owners = new Map<bigint, Address>()
  /** Keyed by lowercase address so checksum variants share one count */
  private readonly balances = new Map<string, bigint>()

  constructor(private readonly journal: Journal = new Journal()) {}

  exists(tokenId: bigint): boolean {
    return this.owners.has(tokenId)
  }

  /** Current holder, or null if the id was never issued */
  peekOwner(tokenId: bigint): Address | null {
    return this.owners.get(tokenId) ?? null
  }

  ownerOf(tokenId: bigint): Address {
    const owner = this.owners.get(tokenId)
    if (owner === undefined) {
      throw new RegistryError("InvalidToken", `Token ${tokenId} has not been minted`)
    }
    return owner
  }

  balanceOf(holder: Address): bigint {
    if (isNullAddress(holder)) {
      throw new RegistryError("ZeroAddress", "Balance query for the null address")
    }
    return this.balances.get(holder.toLowerCase()) ?? 0n
  }

  setOwner(tokenId: bigint, newOwner: Address): void {
    const previous = this.owners.get(tokenId)
    if (previous !== undefined) {
      this.adjust(previous, -1n)
    }
    this.journal.setIn(this.owners, tokenId, getAddress(newOwner))
    this.adjust(newOwner, 1n)
  }

  /** Sum of all holder counts; equals the number of issued ids */
  totalHeld(): bigint {
    let total = 0n
    for (const count of this.balances.values()) total += count
    return total
  }

  private adjust(holder: Address, delta: bigint): void {
    const key = holder.toLowerCase()
    const next = (this.balances.get(key) ?? 0n) + delta
    if (next === 0n) this.journal.deleteIn(this.balances, key)
    else this.journal.setIn(this.balances, key, next)
  }
}
