// tests/registry/helpers.ts — Shared fixtures for registry tests
//
// All-digit addresses are their own EIP-55 checksum form, so values read back
// from the registry compare equal to these constants.

import { ArtifactRegistry } from "../../src/registry/registry.js"
import { ManualBlockClock } from "../../src/registry/clock.js"
import type { RegistryEvent } from "../../src/registry/events.js"
import { MINT_PRICE_WEI, type Address, type Hash } from "../../src/registry/types.js"

export const ALICE: Address = "0x1111111111111111111111111111111111111111"
export const BOB: Address = "0x2222222222222222222222222222222222222222"
export const CAROL: Address = "0x3333333333333333333333333333333333333333"
export const OPERATOR: Address = "0x4444444444444444444444444444444444444444"
export const RECEIVER_CONTRACT: Address = "0x5555555555555555555555555555555555555555"
export const CONTROLLER: Address = "0x9999999999999999999999999999999999999999"
export const NULL: Address = "0x0000000000000000000000000000000000000000"

export const TRAITS_A: Hash = `0x${"ab".repeat(32)}`
export const TRAITS_B: Hash = `0x${"cd".repeat(32)}`

export const PRICE = MINT_PRICE_WEI

export interface Fixture {
  registry: ArtifactRegistry
  clock: ManualBlockClock
  events: RegistryEvent[]
}

export function makeRegistry(startBlock: bigint = 100n): Fixture {
  const clock = new ManualBlockClock(startBlock)
  const registry = new ArtifactRegistry(
    { name: "Test Artifacts", symbol: "TART", baseURI: "ipfs://base/", controller: CONTROLLER },
    { clock },
  )
  const events: RegistryEvent[] = []
  registry.subscribe((event) => {
    events.push(event)
  })
  return { registry, clock, events }
}

/** Mint one artifact to `to` as `caller`, at the exact price */
export function mintOne(f: Fixture, caller: Address = ALICE, to: Address = caller): bigint {
  return f.registry.mint(caller, PRICE, to, TRAITS_A, 4)
}
