// src/gateway/server.ts — Hono HTTP server with routes

import { Hono } from "hono"
import type { EventReader } from "../events/reader.js"
import type { RegistryLogger } from "../registry/logger.js"
import type { ArtifactRegistry } from "../registry/registry.js"
import { registryRoutes } from "./routes/registry.js"

export interface AppOptions {
  registry: ArtifactRegistry
  logger: RegistryLogger
  /** Event log replay for GET /api/v1/registry/events */
  eventReader?: EventReader
  /** Clock for uptime reporting (default: Date.now) */
  now?: () => number
}

export function createApp(options: AppOptions) {
  const app = new Hono()
  const now = options.now ?? Date.now
  const startedAt = now()

  // Health endpoint (no auth required)
  app.get("/health", (c) =>
    c.json({
      status: "ok",
      uptime_ms: now() - startedAt,
      registry: {
        name: options.registry.name,
        total_minted: options.registry.totalMinted.toString(),
        busy: options.registry.busy,
      },
      event_log: options.eventReader ? "enabled" : "disabled",
    }),
  )

  app.route(
    "/api/v1/registry",
    registryRoutes({
      registry: options.registry,
      logger: options.logger,
      eventReader: options.eventReader,
    }),
  )

  app.notFound((c) => c.json({ error: "Not found", code: "NOT_FOUND" }, 404))

  return app
}
