// src/registry/delegation-table.ts — Single-spender and operator approvals
//
// Per-artifact approval is one spender (or none). Operator approval is a
// blanket grant from a holder over everything it holds, and survives
// transfers; per-artifact approval is cleared by every transfer.

import { getAddress } from "viem"
import { RegistryError } from "./errors.js"
import type { EventBuffer } from "./events.js"
import type { IdentityLedger } from "./identity-ledger.js"
import { Journal } from "./journal.js"
import { NULL_ADDRESS, isNullAddress, sameAddress, type Address } from "./types.js"

export class DelegationTable {
  private readonly tokenApprovals = new Map<bigint, Address>()
  /** `${holder}:${operator}` (lowercase) → true; absent means not approved */
  private readonly operatorApprovals = new Map<string, true>()

  constructor(
    private readonly ledger: IdentityLedger,
    private readonly events: EventBuffer,
    private readonly journal: Journal = new Journal(),
  ) {}

  approve(caller: Address, tokenId: bigint, spender: Address): void {
    const owner = this.ledger.ownerOf(tokenId)
    if (!sameAddress(caller, owner) && !this.isApprovedForAll(owner, caller)) {
      throw new RegistryError(
        "CallerNotOwnerNorApproved",
        `${caller} is neither the owner of token ${tokenId} nor an approved operator`,
      )
    }

    const normalized = getAddress(spender)
    if (isNullAddress(normalized)) {
      this.journal.deleteIn(this.tokenApprovals, tokenId)
    } else {
      this.journal.setIn(this.tokenApprovals, tokenId, normalized)
    }
    this.events.emit({ type: "Approval", owner, spender: normalized, tokenId })
  }

  setApprovalForAll(caller: Address, operator: Address, approved: boolean): void {
    if (sameAddress(caller, operator)) {
      throw new RegistryError("ApproveToCaller", "Cannot set operator approval for yourself")
    }

    const key = operatorKey(caller, operator)
    if (approved) this.journal.setIn(this.operatorApprovals, key, true)
    else this.journal.deleteIn(this.operatorApprovals, key)

    this.events.emit({
      type: "ApprovalForAll",
      owner: getAddress(caller),
      operator: getAddress(operator),
      approved,
    })
  }

  /** Approved spender for the token, or the null address if none */
  getApproved(tokenId: bigint): Address {
    if (!this.ledger.exists(tokenId)) {
      throw new RegistryError("InvalidToken", `Token ${tokenId} has not been minted`)
    }
    return this.tokenApprovals.get(tokenId) ?? NULL_ADDRESS
  }

  isApprovedForAll(holder: Address, operator: Address): boolean {
    return this.operatorApprovals.has(operatorKey(holder, operator))
  }

  clearApproval(tokenId: bigint): void {
    this.journal.deleteIn(this.tokenApprovals, tokenId)
  }
}

function operatorKey(holder: Address, operator: Address): string {
  return `${holder.toLowerCase()}:${operator.toLowerCase()}`
}
