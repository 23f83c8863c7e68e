import { WebSocket } from "ws"
import { TransportError, errorMessage } from "./errors"
import { EventQueue } from "./event-queue"
import {
  decodeSignalingMessage,
  encodeSignalingMessage,
  rawDataToString,
  type IncomingSignalingMessage,
  type SignalingMessage,
} from "./signaling-types"

export const CONNECT_TIMEOUT_MS = 10 * 1000

/** A peer's view of the broker: ordered messages in, messages out. */
export interface SignalingChannel {
  send(message: SignalingMessage): void
  receive(timeoutMs: number): Promise<IncomingSignalingMessage>
  close(): void
}

/** http(s) becomes ws(s); an address without a scheme is assumed to be ws. */
export function normalizeSignalingUrl(url: string): string {
  const trimmed = url.trim()
  if (/^https:\/\//i.test(trimmed)) return trimmed.replace(/^https:/i, "wss:")
  if (/^http:\/\//i.test(trimmed)) return trimmed.replace(/^http:/i, "ws:")
  if (!trimmed.includes("://")) return `ws://${trimmed}`
  return trimmed
}

export class SignalingClient implements SignalingChannel {
  private readonly inbox = new EventQueue<IncomingSignalingMessage>()

  static connect(url: string, timeoutMs = CONNECT_TIMEOUT_MS): Promise<SignalingClient> {
    const target = normalizeSignalingUrl(url)
    console.log(`🔗 Connecting to signaling server: ${target}`)

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(target, { handshakeTimeout: timeoutMs })

      const onError = (error: Error) => {
        reject(new TransportError(`Failed to connect to signaling server ${target}: ${error.message}`, { cause: error }))
      }
      ws.once("error", onError)
      ws.once("open", () => {
        ws.off("error", onError)
        console.log("✅ Signaling connection open")
        resolve(new SignalingClient(ws))
      })
    })
  }

  constructor(private readonly ws: WebSocket) {
    ws.on("message", (data) => {
      try {
        this.inbox.push(decodeSignalingMessage(rawDataToString(data)))
      } catch (error) {
        console.error("❌ Failed to parse signaling message:", errorMessage(error))
      }
    })

    ws.on("close", (code) => {
      this.inbox.close(new TransportError(`Signaling connection closed (code ${code})`))
    })

    ws.on("error", (error) => {
      console.error("❌ Signaling connection error:", error.message)
      this.inbox.close(new TransportError(`Signaling connection failed: ${error.message}`, { cause: error }))
    })
  }

  send(message: SignalingMessage): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new TransportError(`Cannot send ${message.type}: signaling connection is not open`)
    }

    this.ws.send(encodeSignalingMessage(message), (error) => {
      if (!error) return
      console.error(`❌ Failed to send ${message.type}:`, error.message)
      this.inbox.close(new TransportError(`Signaling write failed: ${error.message}`, { cause: error }))
    })
  }

  receive(timeoutMs: number): Promise<IncomingSignalingMessage> {
    return this.inbox.next(timeoutMs)
  }

  close(): void {
    this.inbox.close(new TransportError("Signaling connection closed by client"))
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close()
    }
  }
}
