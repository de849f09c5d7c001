// src/registry/interfaces.ts — Capability discovery (ERC-165 style)
//
// Interface ids are the XOR of the member function selectors, computed from
// the signatures rather than pasted in as magic numbers.

import { hexToBigInt, numberToHex, toFunctionSelector, type Hex } from "viem"

export function interfaceIdOf(signatures: readonly string[]): Hex {
  let id = 0n
  for (const signature of signatures) {
    id ^= hexToBigInt(toFunctionSelector(signature))
  }
  return numberToHex(id, { size: 4 })
}

// ---------------------------------------------------------------------------
// Known Interfaces
// ---------------------------------------------------------------------------

export const INTERFACE_ID_ERC165 = interfaceIdOf(["supportsInterface(bytes4)"])

export const INTERFACE_ID_ERC721 = interfaceIdOf([
  "balanceOf(address)",
  "ownerOf(uint256)",
  "safeTransferFrom(address,address,uint256,bytes)",
  "safeTransferFrom(address,address,uint256)",
  "transferFrom(address,address,uint256)",
  "approve(address,uint256)",
  "setApprovalForAll(address,bool)",
  "getApproved(uint256)",
  "isApprovedForAll(address,address)",
])

/** Royalty info capability, queried by marketplaces */
export const INTERFACE_ID_ERC2981 = interfaceIdOf(["royaltyInfo(uint256,uint256)"])

/** Reserved by ERC-165: must never report as supported */
export const INTERFACE_ID_INVALID: Hex = "0xffffffff"

const SUPPORTED: ReadonlySet<string> = new Set([
  INTERFACE_ID_ERC165,
  INTERFACE_ID_ERC721,
  INTERFACE_ID_ERC2981,
])

export function supportsInterface(interfaceId: Hex): boolean {
  const normalized = interfaceId.toLowerCase()
  if (normalized === INTERFACE_ID_INVALID) return false
  return SUPPORTED.has(normalized)
}
