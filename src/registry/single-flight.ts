// src/registry/single-flight.ts — Reentrancy guard
//
// Single-permit lock with scoped acquisition: run() holds the permit for the
// duration of fn and releases it on every exit path. A call that arrives
// while the permit is held (a receiver hook calling back in) is rejected
// instead of queued.

import { RegistryError } from "./errors.js"

export class SingleFlightGuard {
  private held = false
  /** Incremented on every acquisition; lets tests tell calls apart */
  private generation = 0

  get isHeld(): boolean {
    return this.held
  }

  get acquisitions(): number {
    return this.generation
  }

  run<T>(fn: () => T): T {
    if (this.held) {
      throw new RegistryError("Reentrancy", "Reentrant call rejected: a mutating call is already in flight")
    }
    this.held = true
    this.generation++
    try {
      return fn()
    } finally {
      this.held = false
    }
  }
}
