// src/registry/royalty-policy.ts — Royalty payee and rate (ERC-2981 quote)

import { getAddress } from "viem"
import { RegistryError } from "./errors.js"
import type { EventBuffer } from "./events.js"
import { Journal } from "./journal.js"
import {
  BPS_DENOMINATOR,
  MAX_ROYALTY_BPS,
  sameAddress,
  type Address,
  type RoyaltyQuote,
} from "./types.js"

export class RoyaltyPolicy {
  private payee: Address
  private bps: number

  constructor(
    private readonly controller: Address,
    payee: Address,
    basisPoints: number,
    private readonly events: EventBuffer,
    private readonly journal: Journal = new Journal(),
  ) {
    assertBps(basisPoints)
    this.payee = getAddress(payee)
    this.bps = basisPoints
  }

  get receiver(): Address {
    return this.payee
  }

  get basisPoints(): number {
    return this.bps
  }

  configure(caller: Address, payee: Address, basisPoints: number): void {
    if (!sameAddress(caller, this.controller)) {
      throw new RegistryError("NotController", `${caller} is not the controller`)
    }
    assertBps(basisPoints)

    const previous = { payee: this.payee, bps: this.bps }
    this.payee = getAddress(payee)
    this.bps = basisPoints
    this.journal.record(() => {
      this.payee = previous.payee
      this.bps = previous.bps
    })
    this.events.emit({ type: "RoyaltyConfigured", payee: this.payee, basisPoints })
  }

  /** Amount rounds down. Sale prices are unsigned; a negative one is a RangeError. */
  royaltyInfo(salePrice: bigint): RoyaltyQuote {
    if (salePrice < 0n) {
      throw new RangeError(`Sale price must not be negative (got ${salePrice})`)
    }
    return {
      receiver: this.payee,
      amount: (salePrice * BigInt(this.bps)) / BPS_DENOMINATOR,
    }
  }
}

function assertBps(basisPoints: number): void {
  if (!Number.isInteger(basisPoints) || basisPoints < 0 || basisPoints > MAX_ROYALTY_BPS) {
    throw new RegistryError(
      "RoyaltyBpsTooHigh",
      `Royalty must be an integer in [0, ${MAX_ROYALTY_BPS}] basis points (got ${basisPoints})`,
    )
  }
}
