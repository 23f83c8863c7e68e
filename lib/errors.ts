// Error taxonomy shared by the broker, the negotiator and the transfer codec

export type ProtocolErrorCode =
  | "InvalidMessage"
  | "UnknownType"
  | "InvalidRoomId"
  | "AlreadyInRoom"
  | "RoomExists"
  | "DuplicateRoom"
  | "RoomNotFound"
  | "RoomFull"
  | "NotInRoom"
  | "WrongRole"

/** A signaling request the broker refuses. The connection stays open. */
export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode

  constructor(code: ProtocolErrorCode, message: string) {
    super(message)
    this.name = "ProtocolError"
    this.code = code
  }
}

/** The signaling socket failed or closed underneath us. */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "TransportError"
  }
}

export type NegotiationStage =
  | "room-setup"
  | "peer-join"
  | "local-description"
  | "description-publish"
  | "remote-description"
  | "connectivity"
  | "channel-open"
  | "transfer"

export type NegotiationFailure = "timeout" | "failed" | "rejected" | "invalid"

const STAGE_LABELS: Record<NegotiationStage, string> = {
  "room-setup": "Room setup",
  "peer-join": "Waiting for the peer to join",
  "local-description": "Creating the local description",
  "description-publish": "Sending the local description",
  "remote-description": "Waiting for the remote description",
  connectivity: "Connectivity establishment",
  "channel-open": "Opening the data channel",
  transfer: "File transfer",
}

export function describeStage(stage: NegotiationStage): string {
  return STAGE_LABELS[stage]
}

export function formatElapsed(elapsedMs: number): string {
  return `${(elapsedMs / 1000).toFixed(1)}s`
}

/**
 * Fatal for the current attempt. Carries the stage that failed and how long
 * it had been running so the caller can tell the user exactly where it stopped.
 */
export class NegotiationError extends Error {
  readonly stage: NegotiationStage
  readonly reason: NegotiationFailure
  readonly elapsedMs: number

  constructor(
    stage: NegotiationStage,
    reason: NegotiationFailure,
    elapsedMs: number,
    detail?: string,
    options?: { cause?: unknown },
  ) {
    const verb = reason === "timeout" ? "timed out" : "failed"
    const suffix = detail ? `: ${detail}` : ""
    super(`${describeStage(stage)} ${verb} after ${formatElapsed(elapsedMs)}${suffix}`, options)
    this.name = "NegotiationError"
    this.stage = stage
    this.reason = reason
    this.elapsedMs = elapsedMs
  }
}

export type TransferErrorKind = "decode" | "io" | "protocol" | "channel-closed"

export class TransferError extends Error {
  readonly kind: TransferErrorKind

  constructor(kind: TransferErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "TransferError"
    this.kind = kind
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
