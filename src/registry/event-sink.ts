// src/registry/event-sink.ts — Persist committed registry facts to the EventStore
//
// Subscribes to the registry and appends each fact, in wire form, to the
// `registry` stream. Appends are chained so the log preserves commit order.
// A failed append is logged; it never reaches back into the registry, whose
// call has already committed.

import { STREAM_REGISTRY } from "../events/types.js"
import type { EventWriter } from "../events/writer.js"
import type { CommitInfo, RegistryEvent } from "./events.js"
import { toWireEvent } from "./events.js"
import type { RegistryLogger } from "./logger.js"
import type { ArtifactRegistry } from "./registry.js"

export interface EventSinkOptions {
  writer: EventWriter
  logger: RegistryLogger
  /** Prefix for correlation ids; one id per committed call (default: "commit") */
  correlationPrefix?: string
}

export class RegistryEventSink {
  private readonly writer: EventWriter
  private readonly logger: RegistryLogger
  private readonly correlationPrefix: string
  private chain: Promise<void> = Promise.resolve()
  private unsubscribe: (() => void) | null = null
  private appended = 0
  private failed = 0

  constructor(options: EventSinkOptions) {
    this.writer = options.writer
    this.logger = options.logger
    this.correlationPrefix = options.correlationPrefix ?? "commit"
  }

  /** Start forwarding facts from the registry. Idempotent. */
  attach(registry: ArtifactRegistry): void {
    if (this.unsubscribe) return
    this.unsubscribe = registry.subscribe((event, info) => this.enqueue(event, info))
  }

  detach(): void {
    this.unsubscribe?.()
    this.unsubscribe = null
  }

  /** Resolves once every fact received so far has been appended (or logged as failed) */
  flush(): Promise<void> {
    return this.chain
  }

  get stats(): { appended: number; failed: number } {
    return { appended: this.appended, failed: this.failed }
  }

  private enqueue(event: RegistryEvent, info: CommitInfo): void {
    const correlationId = `${this.correlationPrefix}-${info.commit}`
    this.chain = this.chain.then(() => this.append(event, correlationId))
  }

  private async append(event: RegistryEvent, correlationId: string): Promise<void> {
    try {
      await this.writer.append(STREAM_REGISTRY, event.type, toWireEvent(event), correlationId)
      this.appended++
    } catch (error) {
      this.failed++
      this.logger.logError("event_log_append", "system", error, {
        event_type: event.type,
        correlation_id: correlationId,
      })
    }
  }
}
