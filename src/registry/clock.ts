// src/registry/clock.ts — Block clock abstraction
//
// Cooldowns and issuance times are measured in blocks. Block numbers start at
// 1 because a last-mint block of 0 means "never minted".
// The wall-clock implementation serves the HTTP gateway; the manual one
// drives tests deterministically.

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface BlockClock {
  /** Current block number (>= 1, never decreases) */
  now(): bigint
}

// ---------------------------------------------------------------------------
// Wall-Clock Implementation
// ---------------------------------------------------------------------------

export class WallClockBlockClock implements BlockClock {
  private readonly genesisMs: number
  private base = 0n
  private last = 1n

  constructor(
    private readonly blockTimeMs: number,
    private readonly wallClock: () => number = Date.now,
  ) {
    if (!Number.isInteger(blockTimeMs) || blockTimeMs <= 0) {
      throw new Error(`blockTimeMs must be a positive integer (got ${blockTimeMs})`)
    }
    this.genesisMs = wallClock()
  }

  now(): bigint {
    const elapsed = Math.max(0, this.wallClock() - this.genesisMs)
    const block = this.base + BigInt(Math.floor(elapsed / this.blockTimeMs)) + 1n
    // Wall clocks can step backwards (NTP); block numbers cannot
    if (block > this.last) this.last = block
    return this.last
  }

  /** Continue numbering after a restart: readings from here on are >= block */
  resumeFrom(block: bigint): void {
    const current = this.now()
    if (block <= current) return
    this.base += block - current
    this.last = block
  }
}

// ---------------------------------------------------------------------------
// Manual Implementation (deterministic testing)
// ---------------------------------------------------------------------------

export class ManualBlockClock implements BlockClock {
  private block: bigint

  constructor(initialBlock: bigint = 1n) {
    if (initialBlock < 1n) {
      throw new Error("Block numbers start at 1")
    }
    this.block = initialBlock
  }

  now(): bigint {
    return this.block
  }

  /** Advance by a number of blocks */
  advance(blocks: bigint = 1n): void {
    if (blocks < 0n) {
      throw new Error("Cannot move the block clock backwards")
    }
    this.block += blocks
  }

  /** Jump to a specific block (not earlier than the current one) */
  set(block: bigint): void {
    if (block < this.block) {
      throw new Error(`Cannot move the block clock backwards (${this.block} -> ${block})`)
    }
    this.block = block
  }
}
