// src/registry/transfer-authorizer.ts — Transfer rules and the issuance path
//
// Authority is derived from the ledger and the delegation table on every
// call. Nothing is cached: once ownership moves, the previous owner's
// authority is gone, while operator grants persist until revoked.

import { getAddress } from "viem"
import type { DelegationTable } from "./delegation-table.js"
import { RegistryError } from "./errors.js"
import type { EventBuffer } from "./events.js"
import type { IdentityLedger } from "./identity-ledger.js"
import { isNullAddress, sameAddress, type Address } from "./types.js"

export class TransferAuthorizer {
  constructor(
    private readonly ledger: IdentityLedger,
    private readonly delegations: DelegationTable,
    private readonly events: EventBuffer,
  ) {}

  /** Whether caller may move tokenId out of owner's hands right now */
  isAuthorized(caller: Address, owner: Address, tokenId: bigint): boolean {
    const approved = this.delegations.getApproved(tokenId)
    return (
      sameAddress(caller, owner) ||
      (!isNullAddress(approved) && sameAddress(caller, approved)) ||
      this.delegations.isApprovedForAll(owner, caller)
    )
  }

  transfer(caller: Address, from: Address, to: Address, tokenId: bigint): void {
    const owner = this.ledger.peekOwner(tokenId)
    if (owner === null) {
      throw new RegistryError("InvalidToken", `Token ${tokenId} has not been minted`)
    }
    if (!sameAddress(owner, from)) {
      throw new RegistryError("TransferFromWrongOwner", `Token ${tokenId} is not owned by ${from}`)
    }
    if (isNullAddress(to)) {
      throw new RegistryError("TransferToZero", "Transfer to the null address")
    }
    if (!this.isAuthorized(caller, owner, tokenId)) {
      throw new RegistryError(
        "CallerNotOwnerNorApproved",
        `${caller} is not authorized to transfer token ${tokenId}`,
      )
    }

    this.delegations.clearApproval(tokenId)
    this.ledger.setOwner(tokenId, to)
    this.events.emit({ type: "Transfer", from: owner, to: getAddress(to), tokenId })
  }

  /** Creation path for the mint gate: no prior owner, no authorization step */
  issue(to: Address, tokenId: bigint): void {
    if (isNullAddress(to)) {
      throw new RegistryError("MintToZero", "Mint to the null address")
    }
    this.ledger.setOwner(tokenId, to)
    this.events.emit({ type: "Transfer", from: null, to: getAddress(to), tokenId })
  }
}
