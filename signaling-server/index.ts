// Standalone signaling broker
import { loadConfig } from "../lib/config"
import { errorMessage } from "../lib/errors"
import { SignalingBroker } from "../lib/signaling-broker"

const FORCE_EXIT_MS = 20 * 1000

async function main(): Promise<void> {
  const config = loadConfig()
  const broker = new SignalingBroker()

  await broker.listen(config.port, config.host)
  console.log(`📊 Health check: http://localhost:${config.port}/health`)

  let stopping = false
  const shutdown = (signal: string) => {
    if (stopping) return
    stopping = true
    console.log(`\n🛑 ${signal} received, shutting down signaling broker...`)

    setTimeout(() => {
      console.log("⚠️ Force closing signaling broker")
      process.exit(1)
    }, FORCE_EXIT_MS).unref()

    broker.close().then(
      () => {
        console.log("✅ Signaling broker shut down gracefully")
        process.exit(0)
      },
      (error: unknown) => {
        console.error("❌ Error during shutdown:", errorMessage(error))
        process.exit(1)
      },
    )
  }

  process.on("SIGINT", () => shutdown("SIGINT"))
  process.on("SIGTERM", () => shutdown("SIGTERM"))
}

main().catch((error: unknown) => {
  console.error("❌ Failed to start signaling broker:", errorMessage(error))
  process.exit(1)
})
