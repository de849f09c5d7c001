// src/registry/logger.ts — Structured Registry Logger
//
// Structured JSON logger for registry operations.
// Outputs timestamped JSON lines to console for observability.

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Registry operations that get a log line */
export type RegistryOperation =
  | "mint"
  | "approve"
  | "set_approval_for_all"
  | "transfer"
  | "configure_royalty"
  | "set_base_uri"
  | "withdraw"
  | "read"
  | "event_log_append"
  | "replay"
  | "boot"
  | "shutdown"

/** Structured log entry shape */
export interface RegistryLogEntry {
  timestamp: string
  operation: RegistryOperation
  caller: string
  token_id?: string
  latency_ms?: number
  [key: string]: unknown
}

/** Structured error log entry shape */
export interface RegistryErrorLogEntry {
  timestamp: string
  operation: RegistryOperation
  caller: string
  error: string
  error_name?: string
  code?: string
  [key: string]: unknown
}

export interface RegistryLogger {
  /** Log a completed operation with optional metadata and latency */
  log(
    operation: RegistryOperation,
    caller: string,
    metadata?: Record<string, unknown>,
    latencyMs?: number,
  ): void

  /** Log a rejected or failed operation */
  logError(
    operation: RegistryOperation,
    caller: string,
    error: unknown,
    metadata?: Record<string, unknown>,
  ): void
}

// ---------------------------------------------------------------------------
// Default Implementation
// ---------------------------------------------------------------------------

class ConsoleRegistryLogger implements RegistryLogger {
  constructor(private readonly write: (line: string) => void) {}

  log(
    operation: RegistryOperation,
    caller: string,
    metadata?: Record<string, unknown>,
    latencyMs?: number,
  ): void {
    const entry: RegistryLogEntry = {
      timestamp: new Date().toISOString(),
      operation,
      caller,
      ...(latencyMs !== undefined ? { latency_ms: latencyMs } : {}),
      ...(metadata ?? {}),
    }
    this.write(stringify(entry))
  }

  logError(
    operation: RegistryOperation,
    caller: string,
    error: unknown,
    metadata?: Record<string, unknown>,
  ): void {
    const code = errorCode(error)
    const entry: RegistryErrorLogEntry = {
      timestamp: new Date().toISOString(),
      operation,
      caller,
      error: error instanceof Error ? error.message : String(error),
      ...(error instanceof Error ? { error_name: error.name } : {}),
      ...(code !== undefined ? { code } : {}),
      ...(metadata ?? {}),
    }
    this.write(stringify(entry))
  }
}

/** bigint-safe JSON (token ids and wei amounts end up in metadata) */
function stringify(entry: object): string {
  return JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value,
  )
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined
  return typeof error.code === "string" ? error.code : undefined
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a RegistryLogger instance.
 * Default implementation writes JSON lines to console.log.
 */
export function createRegistryLogger(write: (line: string) => void = (line) => console.log(line)): RegistryLogger {
  return new ConsoleRegistryLogger(write)
}

/** Logger that drops everything (tests) */
export function createSilentLogger(): RegistryLogger {
  return new ConsoleRegistryLogger(() => {})
}
