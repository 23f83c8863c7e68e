import type { DescriptionExchange } from "./description-exchange"
import {
  NegotiationError,
  TransportError,
  errorMessage,
  formatElapsed,
  type NegotiationStage,
} from "./errors"
import { EventQueue, WaitTimeoutError } from "./event-queue"
import {
  BufferedChannel,
  DescriptionFormatError,
  decodeSessionDescription,
  encodeSessionDescription,
  isConnectedState,
  isFailedState,
  type ConnectionState,
  type DataChannel,
  type SessionDescription,
  type TransportEngine,
} from "./transport-engine"

export const DATA_CHANNEL_LABEL = "file-transfer"

export interface NegotiationTimeouts {
  /** fallback for candidate gathering; expiry is not an error */
  gatheringMs: number
  roomSetupMs: number
  peerJoinMs: number
  remoteDescriptionMs: number
  connectivityMs: number
  channelOpenMs: number
}

export const DEFAULT_NEGOTIATION_TIMEOUTS: NegotiationTimeouts = {
  gatheringMs: 10 * 1000,
  roomSetupMs: 5 * 1000,
  peerJoinMs: 5 * 60 * 1000,
  remoteDescriptionMs: 5 * 60 * 1000,
  connectivityMs: 60 * 1000,
  channelOpenMs: 30 * 1000,
}

export type NegotiationPhase =
  | "idle"
  | "joined"
  | "remote-description-received"
  | "local-description-created"
  | "local-description-sent"
  | "remote-description-applied"
  | "connectivity-established"
  | "channel-open"
  | "completed"
  | "failed"
  | "timed-out"

export type NegotiationEvent =
  | { kind: "gathering-complete" }
  | { kind: "connection-state"; state: ConnectionState }
  | { kind: "data-channel"; channel: BufferedChannel }
  | { kind: "channel-open"; label: string }
  | { kind: "channel-closed"; label: string }

export interface NegotiatorOptions {
  timeouts?: Partial<NegotiationTimeouts>
  debug?: boolean
  onPhaseChange?: (phase: NegotiationPhase) => void
}

const TERMINAL_PHASES: ReadonlySet<NegotiationPhase> = new Set(["completed", "failed", "timed-out"])

function isFailureEvent(event: NegotiationEvent): boolean {
  return event.kind === "connection-state" && isFailedState(event.state)
}

/**
 * Drives one transfer attempt from an idle engine to an open data channel.
 *
 * Engine callbacks only push events onto a single queue; the driver pulls
 * from that queue with selective, time-bounded waits, so every transition
 * happens in one place and tests can feed synthetic events through a fake
 * engine.
 */
export class SessionNegotiator {
  readonly timeouts: NegotiationTimeouts
  readonly history: NegotiationPhase[] = ["idle"]
  private readonly events = new EventQueue<NegotiationEvent>()
  private channel: BufferedChannel | null = null
  private currentPhase: NegotiationPhase = "idle"
  private remoteFileId: string | null = null
  private closed = false

  constructor(
    private readonly engine: TransportEngine,
    private readonly exchange: DescriptionExchange,
    private readonly options: NegotiatorOptions = {},
  ) {
    this.timeouts = { ...DEFAULT_NEGOTIATION_TIMEOUTS, ...options.timeouts }

    engine.onIceGatheringComplete(() => {
      this.debug("🧊 Candidate gathering complete")
      this.events.push({ kind: "gathering-complete" })
    })

    engine.onConnectionStateChange((state) => {
      this.debug(`🔄 Connection state: ${state}`)
      this.events.push({ kind: "connection-state", state })

      if (this.currentPhase === "channel-open" && isFailedState(state)) {
        console.error(`❌ Peer connection ${state} during transfer`)
        this.channel?.close()
      }
    })

    engine.onDataChannel((channel) => {
      this.debug(`📡 Data channel announced: ${channel.label}`)
      this.events.push({ kind: "data-channel", channel: this.bindChannel(channel) })
    })
  }

  get phase(): NegotiationPhase {
    return this.currentPhase
  }

  /** The file id the sender attached to its offer, when there was one. */
  get fileId(): string | null {
    return this.remoteFileId
  }

  async negotiateAsSender(fileId: string): Promise<BufferedChannel> {
    const channel = this.bindChannel(this.engine.createDataChannel(DATA_CHANNEL_LABEL, { ordered: true }))
    this.channel = channel

    const offer = await this.step("local-description", this.timeouts.gatheringMs, async () => {
      const created = await this.engine.createOffer()
      await this.engine.setLocalDescription(created)
      return this.gatherCandidates(created)
    })
    this.transition("local-description-created")

    await this.step("room-setup", this.timeouts.roomSetupMs, (timeout) => this.exchange.open("sender", timeout))
    if (this.exchange.mode === "broker") {
      console.log("⏳ Waiting for the receiver to join...")
    }
    await this.step("peer-join", this.timeouts.peerJoinMs, (timeout) => this.exchange.waitForPeer(timeout))
    await this.step("description-publish", this.timeouts.roomSetupMs, () =>
      this.exchange.publishDescription(encodeSessionDescription(offer), fileId),
    )
    this.transition("local-description-sent")

    await this.step("remote-description", this.timeouts.remoteDescriptionMs, async (timeout) => {
      const remote = await this.exchange.receiveDescription(timeout)
      await this.engine.setRemoteDescription(decodeSessionDescription(remote.sdp, "answer"))
    })
    this.transition("remote-description-applied")

    await this.awaitConnectivity()
    await this.awaitChannelOpen(channel)
    return channel
  }

  async negotiateAsReceiver(): Promise<BufferedChannel> {
    await this.step("room-setup", this.timeouts.roomSetupMs, (timeout) => this.exchange.open("receiver", timeout))
    this.transition("joined")

    const remote = await this.step("remote-description", this.timeouts.remoteDescriptionMs, async (timeout) => {
      const received = await this.exchange.receiveDescription(timeout)
      return { fileId: received.fileId, offer: decodeSessionDescription(received.sdp, "offer") }
    })
    this.remoteFileId = remote.fileId ?? null
    if (remote.fileId) console.log(`📄 File ID: ${remote.fileId}`)
    this.transition("remote-description-received")

    const answer = await this.step("local-description", this.timeouts.gatheringMs, async () => {
      await this.engine.setRemoteDescription(remote.offer)
      const created = await this.engine.createAnswer()
      await this.engine.setLocalDescription(created)
      return this.gatherCandidates(created)
    })
    this.transition("local-description-created")

    await this.step("description-publish", this.timeouts.roomSetupMs, () =>
      this.exchange.publishDescription(encodeSessionDescription(answer), remote.fileId ?? ""),
    )
    this.transition("local-description-sent")

    await this.awaitConnectivity()

    const channel = await this.step("channel-open", this.timeouts.channelOpenMs, async (timeout) => {
      const startedAt = Date.now()
      const event = await this.events.next(timeout, (e) => e.kind === "data-channel" || isFailureEvent(e))
      if (event.kind !== "data-channel") throw this.connectionFailure(event)
      await this.waitForOpen(event.channel, Math.max(1, timeout - (Date.now() - startedAt)))
      return event.channel
    })
    this.channel = channel
    this.transition("channel-open")
    console.log("✅ Data channel open")
    return channel
  }

  complete(): void {
    this.transition("completed")
  }

  fail(error: unknown): void {
    if (TERMINAL_PHASES.has(this.currentPhase)) return
    const timedOut = error instanceof NegotiationError && error.reason === "timeout"
    this.transition(timedOut ? "timed-out" : "failed")
  }

  /** Releases the engine and fails any wait still pending. Safe to call more than once. */
  close(): void {
    if (this.closed) return
    this.closed = true
    this.events.close(new TransportError("Negotiation closed"))
    this.engine.close()
  }

  private bindChannel(raw: DataChannel): BufferedChannel {
    const channel = new BufferedChannel(raw)
    raw.onOpen(() => this.events.push({ kind: "channel-open", label: raw.label }))
    raw.onClosed(() => this.events.push({ kind: "channel-closed", label: raw.label }))
    return channel
  }

  /**
   * Waits for the engine to finish gathering candidates. On expiry the
   * description is sent with whatever has been gathered so far.
   */
  private async gatherCandidates(created: SessionDescription): Promise<SessionDescription> {
    try {
      const event = await this.events.next(
        this.timeouts.gatheringMs,
        (e) => e.kind === "gathering-complete" || isFailureEvent(e),
      )
      if (event.kind !== "gathering-complete") throw this.connectionFailure(event)
    } catch (error) {
      if (!(error instanceof WaitTimeoutError)) throw error
      console.warn(
        `⚠️ Candidate gathering did not finish within ${formatElapsed(this.timeouts.gatheringMs)}, continuing with the current description`,
      )
    }
    return this.engine.localDescription() ?? created
  }

  private async awaitConnectivity(): Promise<void> {
    console.log("⏳ Waiting for the peer connection...")
    await this.step("connectivity", this.timeouts.connectivityMs, async (timeout) => {
      const event = await this.events.next(
        timeout,
        (e) => e.kind === "connection-state" && (isConnectedState(e.state) || isFailedState(e.state)),
      )
      if (isFailureEvent(event)) throw this.connectionFailure(event)
    })
    this.transition("connectivity-established")
    console.log("✅ Peer connection established")
  }

  private async awaitChannelOpen(channel: BufferedChannel): Promise<void> {
    await this.step("channel-open", this.timeouts.channelOpenMs, (timeout) => this.waitForOpen(channel, timeout))
    this.transition("channel-open")
    console.log("✅ Data channel open")
  }

  private async waitForOpen(channel: BufferedChannel, timeoutMs: number): Promise<void> {
    if (channel.isOpen()) return

    const event = await this.events.next(
      timeoutMs,
      (e) =>
        ((e.kind === "channel-open" || e.kind === "channel-closed") && e.label === channel.label) ||
        isFailureEvent(e),
    )
    if (event.kind === "channel-closed") throw new Error("The data channel closed before opening")
    if (event.kind !== "channel-open") throw this.connectionFailure(event)
  }

  private connectionFailure(event: NegotiationEvent): Error {
    const state = event.kind === "connection-state" ? event.state : event.kind
    return new ConnectionFailedError(state)
  }

  /** Runs one stage and turns whatever it throws into a NegotiationError naming that stage. */
  private async step<T>(stage: NegotiationStage, timeoutMs: number, run: (timeoutMs: number) => Promise<T>): Promise<T> {
    const startedAt = Date.now()
    this.debug(`▶️ ${stage}`)
    try {
      return await run(timeoutMs)
    } catch (error) {
      throw toNegotiationError(error, stage, Date.now() - startedAt)
    }
  }

  private transition(phase: NegotiationPhase): void {
    if (this.currentPhase === phase) return
    this.currentPhase = phase
    this.history.push(phase)
    this.debug(`📍 Phase: ${phase}`)
    this.options.onPhaseChange?.(phase)
  }

  private debug(message: string): void {
    if (this.options.debug) console.log(message)
  }
}

class ConnectionFailedError extends Error {
  constructor(readonly state: string) {
    super(`peer connection ${state}`)
    this.name = "ConnectionFailedError"
  }
}

function toNegotiationError(error: unknown, stage: NegotiationStage, elapsedMs: number): Error {
  if (error instanceof NegotiationError || error instanceof TransportError) return error
  if (error instanceof WaitTimeoutError) {
    return new NegotiationError(stage, "timeout", elapsedMs, undefined, { cause: error })
  }
  if (error instanceof ConnectionFailedError) {
    return new NegotiationError(stage, "failed", elapsedMs, error.message, { cause: error })
  }
  if (error instanceof DescriptionFormatError) {
    return new NegotiationError(stage, "invalid", elapsedMs, error.message, { cause: error })
  }
  return new NegotiationError(stage, "rejected", elapsedMs, errorMessage(error), { cause: error })
}
