// Signaling wire vocabulary shared by the broker and both peers
import type { RawData } from "ws"
import { ProtocolError } from "./errors"

export const SIGNALING_PATH = "/ws"

export const SIGNALING_MESSAGE_TYPES = [
  "create_room",
  "join_room",
  "offer",
  "answer",
  "peer_joined",
  "peer_left",
  "room_created",
  "room_joined",
  "error",
] as const

export type SignalingMessageType = (typeof SIGNALING_MESSAGE_TYPES)[number]

export type ClientRole = "sender" | "receiver"

export interface SignalingFields {
  room_id?: string
  file_id?: string
  /** base64 session description, opaque to the broker */
  sdp?: string
  error?: string
  client_type?: string
}

export interface SignalingMessage extends SignalingFields {
  type: SignalingMessageType
}

/** What actually arrives on the wire: the type may be anything. */
export interface IncomingSignalingMessage extends SignalingFields {
  type: string
}

export interface FileMetadata {
  fileName: string
  fileSize: number
}

export const FILE_RECEIVED_ACK = { type: "file_received" } as const

const OPTIONAL_FIELDS = ["room_id", "file_id", "sdp", "error", "client_type"] as const

export function isSignalingMessageType(value: string): value is SignalingMessageType {
  return SIGNALING_MESSAGE_TYPES.some((type) => type === value)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8")
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8")
  return data.toString("utf8")
}

/** Serialises a message, leaving out every empty optional field. */
export function encodeSignalingMessage(message: SignalingMessage): string {
  const wire: Record<string, string> = { type: message.type }
  for (const field of OPTIONAL_FIELDS) {
    const value = message[field]
    if (value) wire[field] = value
  }
  return JSON.stringify(wire)
}

/**
 * Parses one frame. A missing `type` decodes as the empty type so that the
 * caller reports it as unknown; anything structurally wrong is rejected.
 */
export function decodeSignalingMessage(frame: string): IncomingSignalingMessage {
  let parsed: unknown
  try {
    parsed = JSON.parse(frame)
  } catch {
    throw new ProtocolError("InvalidMessage", "Invalid message format: not valid JSON")
  }

  if (!isRecord(parsed)) {
    throw new ProtocolError("InvalidMessage", "Invalid message format: expected a JSON object")
  }

  const type = parsed.type ?? ""
  if (typeof type !== "string") {
    throw new ProtocolError("InvalidMessage", "Invalid message format: type must be a string")
  }

  const message: IncomingSignalingMessage = { type }
  for (const field of OPTIONAL_FIELDS) {
    const value = parsed[field]
    if (value === undefined || value === null) continue
    if (typeof value !== "string") {
      throw new ProtocolError("InvalidMessage", `Invalid message format: ${field} must be a string`)
    }
    if (value) message[field] = value
  }
  return message
}
