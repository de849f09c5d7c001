// src/index.ts — Artifact registry service entry point
// Boot sequence: config → block clock → registry → event log replay → sink → gateway → serve

import { serve } from "@hono/node-server"
import { loadConfig } from "./config.js"
import { JsonlEventReader } from "./events/jsonl-reader.js"
import { JsonlEventWriter } from "./events/jsonl-writer.js"
import { createApp } from "./gateway/server.js"
import { WallClockBlockClock } from "./registry/clock.js"
import { RegistryEventSink } from "./registry/event-sink.js"
import { createRegistryLogger } from "./registry/logger.js"
import { ArtifactRegistry } from "./registry/registry.js"
import { replayRegistryLog } from "./registry/replay.js"

async function main() {
  const bootStart = Date.now()
  console.log("[registry] booting...")

  // 1. Load config
  const config = loadConfig()
  console.log(`[registry] config loaded: ${config.registry.name} (${config.registry.symbol}), port=${config.port}`)

  const logger = createRegistryLogger()

  // 2. Block clock + registry
  const clock = new WallClockBlockClock(config.blockTimeMs)
  const registry = new ArtifactRegistry(
    {
      name: config.registry.name,
      symbol: config.registry.symbol,
      baseURI: config.registry.baseURI,
      controller: config.registry.controller,
      royaltyReceiver: config.registry.royaltyReceiver,
      royaltyBps: config.registry.royaltyBps,
    },
    {
      clock,
      onListenerError: (error, event) =>
        logger.logError("event_log_append", "system", error, { event_type: event.type }),
    },
  )
  console.log(`[registry] controller=${registry.controller}, royalty=${registry.royaltyBps}bps → ${registry.royaltyReceiver}`)

  // 3. Event log: replay what earlier runs committed, then record new facts.
  //    A log that does not replay cleanly aborts boot.
  let writer: JsonlEventWriter | null = null
  let reader: JsonlEventReader | undefined
  let sink: RegistryEventSink | null = null
  if (config.eventLog.enabled) {
    reader = new JsonlEventReader({ dir: config.eventLog.dir })
    const replayed = await replayRegistryLog(registry, reader)
    clock.resumeFrom(replayed.lastBlock)
    logger.log("replay", "system", {
      facts: replayed.factsApplied,
      commits: replayed.lastCommit,
      last_sequence: replayed.lastSequence,
      next_token_id: registry.nextTokenId.toString(),
    }, replayed.durationMs)

    writer = new JsonlEventWriter({ dir: config.eventLog.dir })
    sink = new RegistryEventSink({ writer, logger })
    sink.attach(registry)
    console.log(`[registry] event log: ${config.eventLog.dir}`)
  } else {
    console.log("[registry] event log disabled")
  }

  // 4. Gateway
  const app = createApp({ registry, logger, eventReader: reader })

  // 5. Serve
  const bootDuration = Date.now() - bootStart
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[registry] ready on :${info.port} (boot: ${bootDuration}ms)`)
    logger.log("boot", "system", { port: info.port }, bootDuration)
  })

  // 6. Graceful shutdown: stop accepting requests, then drain the event log
  let shuttingDown = false
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    const start = Date.now()
    console.log(`[registry] ${signal} received, shutting down gracefully...`)

    server.close()

    if (sink) {
      await sink.flush()
      sink.detach()
    }
    await writer?.close()
    await reader?.close()

    logger.log("shutdown", "system", { signal }, Date.now() - start)
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    // Start force-exit timer on first signal
    setTimeout(() => {
      console.error("[registry] forced shutdown after 10s timeout")
      process.exit(1)
    }, 10_000).unref()

    gracefulShutdown(signal).catch((err) => {
      console.error("[registry] shutdown failed:", err)
      process.exit(1)
    })
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}

main().catch((err) => {
  console.error("[registry] fatal:", err)
  process.exit(1)
})
