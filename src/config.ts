// src/config.ts — Configuration loader from environment variables

import { getAddress, isAddress, type Address } from "viem"
import { DEFAULT_ROYALTY_BPS, MAX_ROYALTY_BPS } from "./registry/types.js"

export interface RegistryServiceConfig {
  // Gateway
  port: number
  host: string

  // Persistence
  dataDir: string
  eventLog: {
    enabled: boolean
    dir: string
  }

  // Collection
  registry: {
    name: string
    symbol: string
    baseURI: string
    controller: Address
    royaltyReceiver: Address
    royaltyBps: number
  }

  /** Wall-clock milliseconds per block for cooldowns and issuance times */
  blockTimeMs: number
}

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(envKey: string, fallback: string): number {
  const raw = process.env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  return value
}

function parseBoolEnv(envKey: string, fallback: boolean): boolean {
  const raw = process.env[envKey]
  if (raw === undefined || raw.trim() === "") return fallback
  const v = raw.trim().toLowerCase()
  if (v === "true" || v === "1") return true
  if (v === "false" || v === "0") return false
  throw new Error(`${envKey} must be true or false (got "${raw}")`)
}

function parseAddressEnv(envKey: string, raw: string): Address {
  if (!isAddress(raw, { strict: false })) {
    throw new Error(`${envKey} must be a 20-byte hex address (got "${raw}")`)
  }
  return getAddress(raw)
}

export function loadConfig(): RegistryServiceConfig {
  const controllerRaw = process.env.CONTROLLER_ADDRESS
  if (!controllerRaw) {
    throw new Error("CONTROLLER_ADDRESS is required")
  }
  const controller = parseAddressEnv("CONTROLLER_ADDRESS", controllerRaw)

  const royaltyBps = parseIntEnv("ROYALTY_BPS", String(DEFAULT_ROYALTY_BPS))
  if (royaltyBps < 0 || royaltyBps > MAX_ROYALTY_BPS) {
    throw new Error(`ROYALTY_BPS must be between 0 and ${MAX_ROYALTY_BPS} (got ${royaltyBps})`)
  }

  const blockTimeMs = parseIntEnv("BLOCK_TIME_MS", "2000")
  if (blockTimeMs <= 0) {
    throw new Error(`BLOCK_TIME_MS must be positive (got ${blockTimeMs})`)
  }

  const dataDir = process.env.DATA_DIR ?? "./data"

  return {
    port: parseIntEnv("PORT", "3000"),
    host: process.env.HOST ?? "0.0.0.0",

    dataDir,
    eventLog: {
      enabled: parseBoolEnv("EVENT_LOG_ENABLED", true),
      dir: `${dataDir}/events`,
    },

    registry: {
      name: process.env.REGISTRY_NAME ?? "Layered Artifacts",
      symbol: process.env.REGISTRY_SYMBOL ?? "LAYR",
      baseURI: process.env.REGISTRY_BASE_URI ?? "",
      controller,
      royaltyReceiver: process.env.ROYALTY_RECEIVER
        ? parseAddressEnv("ROYALTY_RECEIVER", process.env.ROYALTY_RECEIVER)
        : controller,
      royaltyBps,
    },

    blockTimeMs,
  }
}
