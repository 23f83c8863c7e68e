// Interface to the peer-connection engine (ICE, DTLS, SCTP). The engine itself lives outside this package.
import { TransferError } from "./errors"

export type SessionDescriptionType = "offer" | "answer"

export interface SessionDescription {
  type: SessionDescriptionType
  sdp: string
}

export type ConnectionState = "new" | "checking" | "connected" | "completed" | "disconnected" | "failed" | "closed"

export type ChannelData = string | Uint8Array

export interface IceServer {
  urls: string[]
  username?: string
  credential?: string
}

/**
 * A message-oriented channel. Handler registration is additive: every
 * registered handler is called, in registration order.
 */
export interface DataChannel {
  readonly label: string
  readonly bufferedAmount: number
  isOpen(): boolean
  send(data: ChannelData): void
  close(): void
  onOpen(handler: () => void): void
  onMessage(handler: (data: ChannelData) => void): void
  onClosed(handler: () => void): void
}

export interface TransportEngine {
  createOffer(): Promise<SessionDescription>
  createAnswer(): Promise<SessionDescription>
  setLocalDescription(description: SessionDescription): Promise<void>
  setRemoteDescription(description: SessionDescription): Promise<void>
  /** The current local description, including whatever candidates have been gathered so far. */
  localDescription(): SessionDescription | null
  createDataChannel(label: string, options: { ordered: boolean }): DataChannel
  onIceGatheringComplete(handler: () => void): void
  onConnectionStateChange(handler: (state: ConnectionState) => void): void
  onDataChannel(handler: (channel: DataChannel) => void): void
  close(): void
}

export type TransportFactory = (iceServers: IceServer[]) => TransportEngine

export function isConnectedState(state: ConnectionState): boolean {
  return state === "connected" || state === "completed"
}

export function isFailedState(state: ConnectionState): boolean {
  return state === "failed" || state === "disconnected" || state === "closed"
}

/** base64(JSON) envelope used both on the signaling link and for manual copy-paste. */
export function encodeSessionDescription(description: SessionDescription): string {
  const json = JSON.stringify({ type: description.type, sdp: description.sdp })
  return Buffer.from(json, "utf8").toString("base64")
}

export class DescriptionFormatError extends Error {
  constructor(detail: string) {
    super(`Invalid session description: ${detail}`)
    this.name = "DescriptionFormatError"
  }
}

export function decodeSessionDescription(blob: string, expected: SessionDescriptionType): SessionDescription {
  const fail = (detail: string) => new DescriptionFormatError(detail)

  let parsed: unknown
  try {
    parsed = JSON.parse(Buffer.from(blob.trim(), "base64").toString("utf8"))
  } catch {
    throw fail("the description is not base64-encoded JSON")
  }

  if (typeof parsed !== "object" || parsed === null) throw fail("the description is not an object")
  const type = "type" in parsed ? parsed.type : undefined
  const sdp = "sdp" in parsed ? parsed.sdp : undefined

  if (type !== expected) throw fail(`expected an ${expected}, got ${String(type)}`)
  if (typeof sdp !== "string" || !sdp) throw fail("the description has no sdp")
  return { type: expected, sdp }
}

export function toBytes(data: ChannelData): Uint8Array {
  return typeof data === "string" ? Buffer.from(data, "utf8") : data
}

/**
 * Holds messages that arrive before anyone subscribes, so nothing sent the
 * moment the channel opens is lost while control passes from the negotiator
 * to the transfer codec.
 */
export class BufferedChannel {
  private handler: ((data: ChannelData) => void) | null = null
  private backlog: ChannelData[] = []
  private readonly closeHandlers: Array<() => void> = []
  private closed = false

  constructor(readonly channel: DataChannel) {
    channel.onMessage((data) => {
      if (this.handler) {
        this.handler(data)
      } else {
        this.backlog.push(data)
      }
    })
    channel.onClosed(() => {
      if (this.closed) return
      this.closed = true
      for (const handler of this.closeHandlers) handler()
    })
  }

  get label(): string {
    return this.channel.label
  }

  get bufferedAmount(): number {
    return this.channel.bufferedAmount
  }

  isOpen(): boolean {
    return !this.closed && this.channel.isOpen()
  }

  setMessageHandler(handler: (data: ChannelData) => void): void {
    this.handler = handler
    const backlog = this.backlog
    this.backlog = []
    for (const data of backlog) handler(data)
  }

  /** Runs immediately when the channel is already closed. */
  onClosed(handler: () => void): void {
    if (this.closed) {
      handler()
      return
    }
    this.closeHandlers.push(handler)
  }

  send(data: ChannelData): void {
    if (!this.isOpen()) {
      throw new TransferError("channel-closed", "Data channel is not open")
    }
    this.channel.send(data)
  }

  close(): void {
    this.channel.close()
  }
}
