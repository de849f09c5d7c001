// src/registry/receiver.ts — Safe-transfer receiver hooks
//
// A receiver models a contract account. Safe transfers and mints call its
// hook after ownership has moved; the hook must answer with the acceptance
// selector. The hook runs while the reentrancy guard is held, so any mutating
// call it makes back into the registry is rejected.

import { toFunctionSelector, type Hex } from "viem"
import { RegistryError } from "./errors.js"
import type { Address } from "./types.js"

/** Selector a receiver returns to accept an artifact (0x150b7a02) */
export const ARTIFACT_RECEIVED_SELECTOR: Hex = toFunctionSelector(
  "onERC721Received(address,address,uint256,bytes)",
)

export interface ArtifactReceiver {
  onArtifactReceived(operator: Address, from: Address | null, tokenId: bigint, data: Hex): Hex
}

export class ReceiverDirectory {
  private readonly receivers = new Map<string, ArtifactReceiver>()

  register(address: Address, receiver: ArtifactReceiver): void {
    this.receivers.set(address.toLowerCase(), receiver)
  }

  unregister(address: Address): void {
    this.receivers.delete(address.toLowerCase())
  }

  get(address: Address): ArtifactReceiver | undefined {
    return this.receivers.get(address.toLowerCase())
  }

  /**
   * Ask the recipient to accept the artifact. Plain accounts (no hook
   * registered) always accept. Errors thrown by the hook propagate.
   */
  checkAccepts(operator: Address, from: Address | null, to: Address, tokenId: bigint, data: Hex): void {
    const receiver = this.get(to)
    if (!receiver) return

    const answer = receiver.onArtifactReceived(operator, from, tokenId, data)
    if (answer.toLowerCase() !== ARTIFACT_RECEIVED_SELECTOR) {
      throw new RegistryError(
        "TransferToNonReceiver",
        `Recipient ${to} did not accept token ${tokenId} (answered ${answer})`,
      )
    }
  }
}
