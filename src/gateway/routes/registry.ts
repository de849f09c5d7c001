// src/gateway/routes/registry.ts — Artifact Registry HTTP Endpoints
//
// GET  /                                  collection summary
// GET  /artifacts/:id[/owner|/approved]   per-artifact reads
// GET  /holders/:address/balance          balanceOf
// GET  /holders/:address/cooldown         blocks until the holder may mint again
// GET  /holders/:address/operators/:op    isApprovedForAll
// GET  /royalty?salePrice=                royalty quote
// GET  /interfaces/:interfaceId           capability discovery
// GET  /events?after=&limit=              committed facts from the event log
// POST /mint | /approve | /operators | /transfer | /withdraw
// PUT  /royalty | /base-uri
//
// The caller is the `x-wallet-address` header. Ids and wei amounts travel as
// decimal strings.

import { Hono, type Context } from "hono"
import { Type, type Static, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { getAddress, isAddress, isHex, size, type Address, type Hash, type Hex } from "viem"
import { STREAM_REGISTRY } from "../../events/types.js"
import type { EventReader } from "../../events/reader.js"
import { RegistryError } from "../../registry/errors.js"
import type { RegistryLogger, RegistryOperation } from "../../registry/logger.js"
import type { ArtifactRegistry } from "../../registry/registry.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RegistryRouteDeps {
  registry: ArtifactRegistry
  logger: RegistryLogger
  /** Replay source for GET /events; omitted when the event log is disabled */
  eventReader?: EventReader
}

const DEFAULT_EVENTS_LIMIT = 100
const MAX_EVENTS_LIMIT = 1000

// ---------------------------------------------------------------------------
// Request Schemas
// ---------------------------------------------------------------------------

const AddressString = Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" })
const UintString = Type.String({ pattern: "^[0-9]{1,78}$" })
const Bytes32String = Type.String({ pattern: "^0x[0-9a-fA-F]{64}$" })
const HexString = Type.String({ pattern: "^0x([0-9a-fA-F]{2})*$" })

export const MintBody = Type.Object({
  to: AddressString,
  traitCommitment: Bytes32String,
  layerCount: Type.Integer(),
  payment: UintString,
})

export const ApproveBody = Type.Object({
  spender: AddressString,
  tokenId: UintString,
})

export const OperatorBody = Type.Object({
  operator: AddressString,
  approved: Type.Boolean(),
})

export const TransferBody = Type.Object({
  from: AddressString,
  to: AddressString,
  tokenId: UintString,
  safe: Type.Optional(Type.Boolean()),
  data: Type.Optional(HexString),
})

export const RoyaltyBody = Type.Object({
  payee: AddressString,
  basisPoints: Type.Integer(),
})

export const BaseUriBody = Type.Object({
  uri: Type.String({ maxLength: 2048 }),
})

export const WithdrawBody = Type.Object({
  to: AddressString,
})

// ---------------------------------------------------------------------------
// Request Validation
// ---------------------------------------------------------------------------

export class RequestValidationError extends Error {
  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Invalid request: ${field} — ${reason}`)
    this.name = "RequestValidationError"
  }
}

async function readBody<S extends TSchema>(c: Context, schema: S): Promise<Static<S>> {
  let raw: unknown
  try {
    raw = await c.req.json()
  } catch {
    throw new RequestValidationError("body", "must be valid JSON")
  }
  if (!Value.Check(schema, raw)) {
    const first = Value.Errors(schema, raw).First()
    throw new RequestValidationError(first?.path || "body", first?.message ?? "does not match schema")
  }
  return raw
}

function parseAddress(value: string, field: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new RequestValidationError(field, "must be a 20-byte hex address")
  }
  return getAddress(value)
}

function parseUint(value: string | undefined, field: string): bigint {
  if (value === undefined || !/^[0-9]{1,78}$/.test(value)) {
    throw new RequestValidationError(field, "must be a non-negative decimal integer")
  }
  return BigInt(value)
}

function parseHash(value: string, field: string): Hash {
  if (!isHex(value) || size(value) !== 32) {
    throw new RequestValidationError(field, "must be 32 bytes of hex")
  }
  return value
}

function parseHex(value: string | undefined, field: string): Hex {
  if (value === undefined) return "0x"
  if (!isHex(value)) {
    throw new RequestValidationError(field, "must be 0x-prefixed hex")
  }
  return value
}

// ---------------------------------------------------------------------------
// Error Mapping
// ---------------------------------------------------------------------------

function errorResponse(c: Context, e: unknown): Response {
  if (e instanceof RegistryError) {
    return c.json({ error: e.message, code: e.code, category: e.category }, e.httpStatus)
  }
  if (e instanceof RequestValidationError) {
    return c.json({ error: e.message, code: "INVALID_REQUEST", field: e.field }, 400)
  }
  return c.json({ error: "Internal error", code: "INTERNAL_ERROR" }, 500)
}

// ---------------------------------------------------------------------------
// Route Factory
// ---------------------------------------------------------------------------

export function registryRoutes(deps: RegistryRouteDeps): Hono {
  const { registry, logger } = deps
  const app = new Hono()

  /**
   * Run a mutating handler with the caller resolved, logging the outcome.
   * Registry and validation errors become JSON responses.
   */
  async function mutate(
    c: Context,
    operation: RegistryOperation,
    handler: (caller: Address) => Promise<Record<string, unknown>>,
  ): Promise<Response> {
    const header = c.req.header("x-wallet-address")
    if (!header || !isAddress(header, { strict: false })) {
      return c.json({ error: "Missing or invalid x-wallet-address header", code: "UNAUTHENTICATED" }, 401)
    }
    const caller = getAddress(header)
    const start = Date.now()
    try {
      const body = await handler(caller)
      logger.log(operation, caller, body, Date.now() - start)
      return c.json(body)
    } catch (e) {
      logger.logError(operation, caller, e)
      return errorResponse(c, e)
    }
  }

  async function read(c: Context, handler: () => Promise<object> | object): Promise<Response> {
    try {
      return c.json(await handler())
    } catch (e) {
      if (!(e instanceof RegistryError) && !(e instanceof RequestValidationError)) {
        logger.logError("read", "anonymous", e, { path: c.req.path })
      }
      return errorResponse(c, e)
    }
  }

  // ── Reads ──────────────────────────────────────────────────

  app.get("/", (c) =>
    read(c, () => ({
      name: registry.name,
      symbol: registry.symbol,
      baseURI: registry.baseURI,
      totalMinted: registry.totalMinted.toString(),
      remainingSupply: registry.remainingSupply.toString(),
      nextTokenId: registry.nextTokenId.toString(),
      maxSupply: registry.maxSupply.toString(),
      mintPrice: registry.mintPrice.toString(),
      royalty: { receiver: registry.royaltyReceiver, basisPoints: registry.royaltyBps },
      controller: registry.controller,
      treasuryBalance: registry.treasuryBalance.toString(),
    })),
  )

  app.get("/artifacts/:id", (c) =>
    read(c, () => {
      const tokenId = parseUint(c.req.param("id"), "id")
      const data = registry.artifactData(tokenId)
      return {
        tokenId: tokenId.toString(),
        owner: registry.ownerOf(tokenId),
        approved: registry.getApproved(tokenId),
        traitCommitment: data.traitCommitment,
        layerCount: data.layerCount,
        mintedAt: data.mintedAt.toString(),
      }
    }),
  )

  app.get("/artifacts/:id/owner", (c) =>
    read(c, () => {
      const tokenId = parseUint(c.req.param("id"), "id")
      return { tokenId: tokenId.toString(), owner: registry.ownerOf(tokenId) }
    }),
  )

  app.get("/artifacts/:id/approved", (c) =>
    read(c, () => {
      const tokenId = parseUint(c.req.param("id"), "id")
      return { tokenId: tokenId.toString(), approved: registry.getApproved(tokenId) }
    }),
  )

  app.get("/holders/:address/balance", (c) =>
    read(c, () => {
      const holder = parseAddress(c.req.param("address"), "address")
      return { holder, balance: registry.balanceOf(holder).toString() }
    }),
  )

  app.get("/holders/:address/cooldown", (c) =>
    read(c, () => {
      const holder = parseAddress(c.req.param("address"), "address")
      return { holder, blocksRemaining: registry.cooldownRemaining(holder).toString() }
    }),
  )

  app.get("/holders/:address/operators/:operator", (c) =>
    read(c, () => {
      const holder = parseAddress(c.req.param("address"), "address")
      const operator = parseAddress(c.req.param("operator"), "operator")
      return { holder, operator, approved: registry.isApprovedForAll(holder, operator) }
    }),
  )

  app.get("/royalty", (c) =>
    read(c, () => {
      const salePrice = parseUint(c.req.query("salePrice"), "salePrice")
      const quote = registry.royaltyInfo(salePrice)
      return { receiver: quote.receiver, amount: quote.amount.toString(), basisPoints: registry.royaltyBps }
    }),
  )

  app.get("/interfaces/:interfaceId", (c) =>
    read(c, () => {
      const interfaceId = c.req.param("interfaceId")
      if (!isHex(interfaceId) || size(interfaceId) !== 4) {
        throw new RequestValidationError("interfaceId", "must be 4 bytes of hex")
      }
      return { interfaceId, supported: registry.supportsInterface(interfaceId) }
    }),
  )

  app.get("/events", async (c) => {
    const reader = deps.eventReader
    if (!reader) {
      return c.json({ error: "Event log is disabled", code: "EVENT_LOG_DISABLED" }, 404)
    }
    return read(c, async () => {
      const afterRaw = c.req.query("after")
      const limitRaw = c.req.query("limit")
      const after = afterRaw === undefined ? 0 : Number(parseUint(afterRaw, "after"))
      const limit = limitRaw === undefined
        ? DEFAULT_EVENTS_LIMIT
        : Math.min(Number(parseUint(limitRaw, "limit")), MAX_EVENTS_LIMIT)

      const events: unknown[] = []
      let lastSequence = after
      if (limit === 0) return { events, cursor: lastSequence }
      const cursor = { stream: STREAM_REGISTRY, last_sequence: after }
      // Stop at the page boundary instead of reading the rest of the log
      for await (const envelope of reader.replay(STREAM_REGISTRY, cursor)) {
        events.push({
          sequence: envelope.sequence,
          type: envelope.event_type,
          timestamp: envelope.timestamp,
          correlationId: envelope.correlation_id,
          payload: envelope.payload,
        })
        lastSequence = envelope.sequence
        if (events.length >= limit) break
      }
      return { events, cursor: lastSequence }
    })
  })

  // ── Mutations ──────────────────────────────────────────────

  app.post("/mint", (c) =>
    mutate(c, "mint", async (caller) => {
      const body = await readBody(c, MintBody)
      const tokenId = registry.mint(
        caller,
        parseUint(body.payment, "payment"),
        parseAddress(body.to, "to"),
        parseHash(body.traitCommitment, "traitCommitment"),
        body.layerCount,
      )
      return { tokenId: tokenId.toString(), owner: registry.ownerOf(tokenId) }
    }),
  )

  app.post("/approve", (c) =>
    mutate(c, "approve", async (caller) => {
      const body = await readBody(c, ApproveBody)
      const tokenId = parseUint(body.tokenId, "tokenId")
      registry.approve(caller, parseAddress(body.spender, "spender"), tokenId)
      return { tokenId: tokenId.toString(), approved: registry.getApproved(tokenId) }
    }),
  )

  app.post("/operators", (c) =>
    mutate(c, "set_approval_for_all", async (caller) => {
      const body = await readBody(c, OperatorBody)
      const operator = parseAddress(body.operator, "operator")
      registry.setApprovalForAll(caller, operator, body.approved)
      return { holder: caller, operator, approved: registry.isApprovedForAll(caller, operator) }
    }),
  )

  app.post("/transfer", (c) =>
    mutate(c, "transfer", async (caller) => {
      const body = await readBody(c, TransferBody)
      const from = parseAddress(body.from, "from")
      const to = parseAddress(body.to, "to")
      const tokenId = parseUint(body.tokenId, "tokenId")
      const safe = body.safe === true
      if (safe) {
        registry.safeTransferFrom(caller, from, to, tokenId, parseHex(body.data, "data"))
      } else {
        registry.transferFrom(caller, from, to, tokenId)
      }
      return { tokenId: tokenId.toString(), from, to, safe, owner: registry.ownerOf(tokenId) }
    }),
  )

  app.put("/royalty", (c) =>
    mutate(c, "configure_royalty", async (caller) => {
      const body = await readBody(c, RoyaltyBody)
      registry.configureRoyalty(caller, parseAddress(body.payee, "payee"), body.basisPoints)
      return { receiver: registry.royaltyReceiver, basisPoints: registry.royaltyBps }
    }),
  )

  app.put("/base-uri", (c) =>
    mutate(c, "set_base_uri", async (caller) => {
      const body = await readBody(c, BaseUriBody)
      registry.setBaseURI(caller, body.uri)
      return { baseURI: registry.baseURI }
    }),
  )

  app.post("/withdraw", (c) =>
    mutate(c, "withdraw", async (caller) => {
      const body = await readBody(c, WithdrawBody)
      const to = parseAddress(body.to, "to")
      const amount = registry.withdraw(caller, to)
      return { to, amount: amount.toString() }
    }),
  )

  return app
}
