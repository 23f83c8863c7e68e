// Check that a signaling broker is running and answering room requests
import { loadConfig } from "../lib/config"
import { errorMessage } from "../lib/errors"
import { SignalingClient } from "../lib/signaling-client"
import { generateFileId } from "../lib/utils"

const CHECK_TIMEOUT_MS = 5000

async function checkSignalingServer(): Promise<boolean> {
  const { signalingUrl } = loadConfig()
  if (!signalingUrl) {
    console.error("❌ SIGNALING_URL is set to manual, nothing to check")
    return false
  }

  console.log("🔍 Checking signaling server...")

  let client: SignalingClient
  try {
    client = await SignalingClient.connect(signalingUrl, CHECK_TIMEOUT_MS)
  } catch (error) {
    console.error("❌ Signaling server is not running:", errorMessage(error))
    console.log("💡 Start the server with: npm run start:signaling")
    return false
  }

  const probeRoom = `probe-${generateFileId()}`
  try {
    client.send({ type: "create_room", room_id: probeRoom })
    const reply = await client.receive(CHECK_TIMEOUT_MS)

    if (reply.type === "room_created") {
      console.log(`✅ Signaling server is running on ${signalingUrl}`)
      return true
    }
    console.error(`❌ Unexpected reply: ${reply.type}${reply.error ? ` (${reply.error})` : ""}`)
    return false
  } catch (error) {
    console.error("⏰ No answer from signaling server:", errorMessage(error))
    return false
  } finally {
    client.close()
  }
}

checkSignalingServer().then(
  (ok) => process.exit(ok ? 0 : 1),
  (error: unknown) => {
    console.error("❌ Failed to check signaling server:", errorMessage(error))
    process.exit(1)
  },
)
