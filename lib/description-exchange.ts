// Two ways to swap session descriptions: through a broker room, or by hand
import { createInterface } from "readline/promises"
import { WaitTimeoutError } from "./event-queue"
import { SignalingClient, type SignalingChannel } from "./signaling-client"
import type { ClientRole, IncomingSignalingMessage, SignalingMessageType } from "./signaling-types"

export interface RemoteDescription {
  sdp: string
  fileId?: string
}

/**
 * Everything the negotiator needs from the outside world to swap
 * descriptions. Timeouts surface as WaitTimeoutError; anything else the
 * other side or the broker refuses surfaces as a plain Error.
 */
export interface DescriptionExchange {
  readonly mode: "broker" | "manual"
  open(role: ClientRole, timeoutMs: number): Promise<void>
  waitForPeer(timeoutMs: number): Promise<void>
  publishDescription(blob: string, fileId: string): Promise<void>
  receiveDescription(timeoutMs: number): Promise<RemoteDescription>
  close(): void
}

export class BrokerDescriptionExchange implements DescriptionExchange {
  readonly mode = "broker"
  private role: ClientRole | null = null

  constructor(
    private readonly channel: SignalingChannel,
    readonly roomId: string,
  ) {}

  async open(role: ClientRole, timeoutMs: number): Promise<void> {
    this.role = role
    const request = role === "sender" ? "create_room" : "join_room"
    const confirmation = role === "sender" ? "room_created" : "room_joined"

    this.channel.send({ type: request, room_id: this.roomId })

    const reply = await this.channel.receive(timeoutMs)
    if (reply.type === "error") {
      throw new Error(`Broker refused ${request}: ${reply.error ?? "unknown error"}`)
    }
    if (reply.type !== confirmation) {
      throw new Error(`Unexpected reply to ${request}: ${reply.type}`)
    }
    console.log(role === "sender" ? `🆕 Room created: ${this.roomId}` : `✅ Joined room: ${this.roomId}`)
  }

  async waitForPeer(timeoutMs: number): Promise<void> {
    await this.waitFor("peer_joined", timeoutMs)
    console.log("👤 Peer joined the room")
  }

  async publishDescription(blob: string, fileId: string): Promise<void> {
    if (this.requireRole() === "sender") {
      this.channel.send({ type: "offer", room_id: this.roomId, file_id: fileId, sdp: blob })
    } else {
      this.channel.send({ type: "answer", room_id: this.roomId, sdp: blob })
    }
  }

  async receiveDescription(timeoutMs: number): Promise<RemoteDescription> {
    const expected = this.requireRole() === "sender" ? "answer" : "offer"
    const message = await this.waitFor(expected, timeoutMs)
    if (!message.sdp) {
      throw new Error(`The ${expected} carried no session description`)
    }
    return { sdp: message.sdp, fileId: message.file_id }
  }

  close(): void {
    this.channel.close()
  }

  private requireRole(): ClientRole {
    if (!this.role) throw new Error("Exchange used before open()")
    return this.role
  }

  /** Skips unrelated traffic; an error or a departing peer ends the wait. */
  private async waitFor(type: SignalingMessageType, timeoutMs: number): Promise<IncomingSignalingMessage> {
    const deadline = Date.now() + timeoutMs

    for (;;) {
      const remaining = deadline - Date.now()
      if (remaining <= 0) throw new WaitTimeoutError(timeoutMs)

      let message: IncomingSignalingMessage
      try {
        message = await this.channel.receive(remaining)
      } catch (error) {
        if (error instanceof WaitTimeoutError) throw new WaitTimeoutError(timeoutMs)
        throw error
      }

      if (message.type === type) return message
      if (message.type === "error") {
        throw new Error(`Signaling server error: ${message.error ?? "unknown error"}`)
      }
      if (message.type === "peer_left") {
        throw new Error("The peer left the room")
      }
      console.warn(`⚠️ Ignoring ${message.type} while waiting for ${type}`)
    }
  }
}

/** Where a human reads the local description and pastes the remote one. */
export interface ManualPrompt {
  show(title: string, lines: string[]): void
  ask(question: string, timeoutMs: number): Promise<string>
}

export function createConsolePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ManualPrompt {
  const rule = "=".repeat(70)

  return {
    show(title, lines) {
      output.write(`\n${rule}\n${title}\n${rule}\n${lines.join("\n")}\n${rule}\n`)
    },

    async ask(question, timeoutMs) {
      const rl = createInterface({ input, output })
      try {
        return await rl.question(question, { signal: AbortSignal.timeout(timeoutMs) })
      } catch (error) {
        if (error instanceof Error && error.name === "AbortError") {
          throw new WaitTimeoutError(timeoutMs)
        }
        throw error
      } finally {
        rl.close()
      }
    },
  }
}

/**
 * Copy-paste exchange. The sender's blob is shown as `fileId|offer` so the
 * receiver can pass it straight in as its address.
 */
export class ManualDescriptionExchange implements DescriptionExchange {
  readonly mode = "manual"
  private role: ClientRole | null = null

  constructor(
    private readonly prompt: ManualPrompt,
    private readonly presetRemote?: RemoteDescription,
  ) {}

  async open(role: ClientRole): Promise<void> {
    this.role = role
  }

  async waitForPeer(): Promise<void> {}

  async publishDescription(blob: string, fileId: string): Promise<void> {
    if (this.role === "sender") {
      this.prompt.show("Send the following to the receiver:", [`File ID: ${fileId}`, `${fileId}|${blob}`])
    } else {
      this.prompt.show("Send the following answer back to the sender:", [blob])
    }
  }

  async receiveDescription(timeoutMs: number): Promise<RemoteDescription> {
    if (this.presetRemote) return this.presetRemote

    const label = this.role === "sender" ? "answer" : "offer"
    const pasted = (await this.prompt.ask(`Paste the ${label} (base64): `, timeoutMs)).trim()
    if (!pasted) {
      throw new Error(`No ${label} was entered`)
    }

    const separator = pasted.indexOf("|")
    if (separator === -1) return { sdp: pasted }
    return { fileId: pasted.slice(0, separator), sdp: pasted.slice(separator + 1) }
  }

  close(): void {}
}

export interface ExchangeSettings {
  /** null selects the manual exchange */
  signalingUrl: string | null
  roomId: string
  prompt?: ManualPrompt
  presetRemote?: RemoteDescription
}

export async function connectExchange(settings: ExchangeSettings): Promise<DescriptionExchange> {
  if (!settings.signalingUrl) {
    return new ManualDescriptionExchange(settings.prompt ?? createConsolePrompt(), settings.presetRemote)
  }
  const client = await SignalingClient.connect(settings.signalingUrl)
  return new BrokerDescriptionExchange(client, settings.roomId)
}
