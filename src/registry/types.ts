// src/registry/types.ts — Artifact Registry Types and Constants
//
// Addresses, hashes and hex values use viem's types so the registry speaks the
// same vocabulary as the on-chain readers. Amounts are wei, ids and block
// numbers are bigint (uint256 on the wire).

import { parseEther, zeroAddress, type Address, type Hash, type Hex } from "viem"

export type { Address, Hash, Hex }

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Hard cap on artifacts ever issued */
export const MAX_SUPPLY = 10_000n

/** Fixed mint price: 0.01 ether */
export const MINT_PRICE_WEI = parseEther("0.01")

/** Highest layer count an artifact may carry */
export const MAX_LAYERS_PER_ARTIFACT = 32

/** Blocks a caller must wait between successful mints */
export const MINT_COOLDOWN_BLOCKS = 18n

/** Royalty ceiling: 10% */
export const MAX_ROYALTY_BPS = 1000

export const BPS_DENOMINATOR = 10_000n

/** First id handed out by the mint gate */
export const FIRST_TOKEN_ID = 1n

/** The null identity ("no owner", "no spender") */
export const NULL_ADDRESS: Address = zeroAddress

export function isNullAddress(address: Address): boolean {
  return address.toLowerCase() === zeroAddress
}

/** Case-insensitive address equality (checksummed vs lowercase input) */
export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase()
}

// ---------------------------------------------------------------------------
// Artifact Record
// ---------------------------------------------------------------------------

/** Immutable per-artifact data, written once at mint */
export interface ArtifactRecord {
  readonly traitCommitment: Hash
  readonly layerCount: number
  /** Block number at issuance */
  readonly mintedAt: bigint
}

/** ArtifactRecord joined with live ownership state */
export interface ArtifactView extends ArtifactRecord {
  readonly tokenId: bigint
  readonly owner: Address
  readonly approved: Address
}

// ---------------------------------------------------------------------------
// Royalty
// ---------------------------------------------------------------------------

export interface RoyaltyQuote {
  receiver: Address
  amount: bigint
}

// ---------------------------------------------------------------------------
// Registry Construction
// ---------------------------------------------------------------------------

export interface RegistryOptions {
  name: string
  symbol: string
  baseURI?: string
  /** Controlling principal; fixed for the registry's lifetime */
  controller: Address
  /** Initial royalty payee (defaults to the controller) */
  royaltyReceiver?: Address
  /** Initial royalty rate in basis points (default: 500) */
  royaltyBps?: number
}

export const DEFAULT_ROYALTY_BPS = 500
