// tests/registry/receiver.test.ts — Safe transfers, receiver hooks and reentrancy

import { describe, it, expect, beforeEach } from "vitest"
import type { Hex } from "viem"
import { ARTIFACT_RECEIVED_SELECTOR, type ArtifactReceiver } from "../../src/registry/receiver.js"
import type { Address } from "../../src/registry/types.js"
import { ALICE, BOB, PRICE, RECEIVER_CONTRACT, makeRegistry, mintOne, type Fixture } from "./helpers.js"

interface HookCall {
  operator: Address
  from: Address | null
  tokenId: bigint
  data: Hex
}

/** Receiver that records each call and answers with `answer` */
function recordingReceiver(answer: Hex = ARTIFACT_RECEIVED_SELECTOR) {
  const calls: HookCall[] = []
  const receiver: ArtifactReceiver = {
    onArtifactReceived(operator, from, tokenId, data) {
      calls.push({ operator, from, tokenId, data })
      return answer
    },
  }
  return { receiver, calls }
}

let f: Fixture

beforeEach(() => {
  f = makeRegistry()
})

describe("selector", () => {
  it("is the standard acceptance selector", () => {
    expect(ARTIFACT_RECEIVED_SELECTOR).toBe("0x150b7a02")
  })
})

describe("safeTransferFrom", () => {
  beforeEach(() => {
    mintOne(f, ALICE)
    f.events.length = 0
  })

  it("to a plain account behaves like transferFrom", () => {
    f.registry.safeTransferFrom(ALICE, ALICE, BOB, 1n)
    expect(f.registry.ownerOf(1n)).toBe(BOB)
  })

  it("calls the hook with operator, previous owner, id and data", () => {
    const { receiver, calls } = recordingReceiver()
    f.registry.registerReceiver(RECEIVER_CONTRACT, receiver)

    f.registry.safeTransferFrom(ALICE, ALICE, RECEIVER_CONTRACT, 1n, "0xbeef")

    expect(calls).toEqual([{ operator: ALICE, from: ALICE, tokenId: 1n, data: "0xbeef" }])
    expect(f.registry.ownerOf(1n)).toBe(RECEIVER_CONTRACT)
  })

  it("accepts the selector in any letter case", () => {
    const { receiver } = recordingReceiver("0x150B7A02")
    f.registry.registerReceiver(RECEIVER_CONTRACT, receiver)
    f.registry.safeTransferFrom(ALICE, ALICE, RECEIVER_CONTRACT, 1n)
    expect(f.registry.ownerOf(1n)).toBe(RECEIVER_CONTRACT)
  })

  it("a wrong answer fails TransferToNonReceiver and undoes the whole transfer", () => {
    f.registry.approve(ALICE, BOB, 1n)
    f.events.length = 0
    const { receiver } = recordingReceiver("0xdeadbeef")
    f.registry.registerReceiver(RECEIVER_CONTRACT, receiver)

    expect(() => f.registry.safeTransferFrom(BOB, ALICE, RECEIVER_CONTRACT, 1n)).toThrow(
      expect.objectContaining({ code: "TransferToNonReceiver" }),
    )

    expect(f.registry.ownerOf(1n)).toBe(ALICE)
    expect(f.registry.getApproved(1n)).toBe(BOB)
    expect(f.registry.balanceOf(ALICE)).toBe(1n)
    expect(f.registry.balanceOf(RECEIVER_CONTRACT)).toBe(0n)
    expect(f.events).toEqual([])
  })

  it("plain transferFrom never consults the hook", () => {
    const { receiver, calls } = recordingReceiver("0xdeadbeef")
    f.registry.registerReceiver(RECEIVER_CONTRACT, receiver)

    f.registry.transferFrom(ALICE, ALICE, RECEIVER_CONTRACT, 1n)
    expect(calls).toEqual([])
    expect(f.registry.ownerOf(1n)).toBe(RECEIVER_CONTRACT)
  })

  it("unregistering turns the address back into a plain account", () => {
    const { receiver } = recordingReceiver("0xdeadbeef")
    f.registry.registerReceiver(RECEIVER_CONTRACT, receiver)
    f.registry.unregisterReceiver(RECEIVER_CONTRACT)

    f.registry.safeTransferFrom(ALICE, ALICE, RECEIVER_CONTRACT, 1n)
    expect(f.registry.ownerOf(1n)).toBe(RECEIVER_CONTRACT)
  })
})

describe("safe mint", () => {
  it("calls the hook with a null previous owner and empty data", () => {
    const { receiver, calls } = recordingReceiver()
    f.registry.registerReceiver(RECEIVER_CONTRACT, receiver)

    const id = mintOne(f, ALICE, RECEIVER_CONTRACT)
    expect(calls).toEqual([{ operator: ALICE, from: null, tokenId: id, data: "0x" }])
  })

  it("a refusing receiver rolls back supply, payment, cooldown and record", () => {
    const { receiver } = recordingReceiver("0x00000000")
    f.registry.registerReceiver(RECEIVER_CONTRACT, receiver)

    expect(() => mintOne(f, ALICE, RECEIVER_CONTRACT)).toThrow(
      expect.objectContaining({ code: "TransferToNonReceiver" }),
    )

    expect(f.registry.totalMinted).toBe(0n)
    expect(f.registry.nextTokenId).toBe(1n)
    expect(f.registry.treasuryBalance).toBe(0n)
    expect(f.registry.cooldownRemaining(ALICE)).toBe(0n)
    expect(() => f.registry.artifactData(1n)).toThrow(expect.objectContaining({ code: "InvalidToken" }))
    expect(f.events).toEqual([])

    // The same id is handed out once a mint succeeds
    expect(mintOne(f, ALICE)).toBe(1n)
  })
})

describe("reentrancy", () => {
  it("rejects a mutating call made from inside a hook", () => {
    mintOne(f, ALICE)
    const inner: unknown[] = []
    let busyInside = false
    f.registry.registerReceiver(RECEIVER_CONTRACT, {
      onArtifactReceived() {
        busyInside = f.registry.busy
        try {
          f.registry.transferFrom(RECEIVER_CONTRACT, RECEIVER_CONTRACT, BOB, 1n)
        } catch (e) {
          inner.push(e)
        }
        return ARTIFACT_RECEIVED_SELECTOR
      },
    })

    f.registry.safeTransferFrom(ALICE, ALICE, RECEIVER_CONTRACT, 1n)

    expect(busyInside).toBe(true)
    expect(inner).toEqual([expect.objectContaining({ code: "Reentrancy", httpStatus: 409 })])
    expect(f.registry.ownerOf(1n)).toBe(RECEIVER_CONTRACT)
    expect(f.registry.busy).toBe(false)
  })

  it("a hook that lets the Reentrancy error escape fails the outer mint atomically", () => {
    f.registry.registerReceiver(RECEIVER_CONTRACT, {
      onArtifactReceived() {
        f.registry.mint(RECEIVER_CONTRACT, PRICE, RECEIVER_CONTRACT, `0x${"00".repeat(32)}`, 1)
        return ARTIFACT_RECEIVED_SELECTOR
      },
    })

    expect(() => mintOne(f, ALICE, RECEIVER_CONTRACT)).toThrow(expect.objectContaining({ code: "Reentrancy" }))
    expect(f.registry.totalMinted).toBe(0n)
    expect(f.registry.balanceOf(RECEIVER_CONTRACT)).toBe(0n)
    expect(f.events).toEqual([])
    expect(f.registry.busy).toBe(false)
  })

  it("read calls from inside a hook see the new owner", () => {
    mintOne(f, ALICE)
    let seen: Address | null = null
    f.registry.registerReceiver(RECEIVER_CONTRACT, {
      onArtifactReceived(_operator, _from, tokenId) {
        seen = f.registry.ownerOf(tokenId)
        return ARTIFACT_RECEIVED_SELECTOR
      },
    })

    f.registry.safeTransferFrom(ALICE, ALICE, RECEIVER_CONTRACT, 1n)
    expect(seen).toBe(RECEIVER_CONTRACT)
  })
})
