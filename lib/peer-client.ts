import type { AppConfig } from "./config"
import { connectExchange, type DescriptionExchange, type ManualPrompt, type RemoteDescription } from "./description-exchange"
import { NegotiationError, errorMessage } from "./errors"
import { delay, withDeadline } from "./event-queue"
import { buildIceServers } from "./ice-servers"
import { SessionNegotiator, type NegotiationPhase, type NegotiationTimeouts } from "./session-negotiator"
import type { ClientRole, FileMetadata } from "./signaling-types"
import {
  DEFAULT_CHUNK_SIZE,
  formatProgress,
  sendFile,
  TransferReceiver,
  type SendResult,
  type TransferProgress,
  type TransferSink,
  type TransferSource,
  type TransferStats,
} from "./transfer-codec"
import { toBytes, type BufferedChannel, type IceServer, type TransportFactory } from "./transport-engine"
import { generateFileId } from "./utils"

export const TRANSFER_TIMEOUT_MS = 30 * 60 * 1000
const ACK_FLUSH_MS = 500
const PROGRESS_LOG_INTERVAL_MS = 1000

export type ExchangeFactory = (roomId: string) => Promise<DescriptionExchange>

export interface PeerClientOptions {
  createTransport: TransportFactory
  connect: ExchangeFactory
  iceServers?: IceServer[]
  timeouts?: Partial<NegotiationTimeouts>
  /** ceiling for one whole attempt, negotiation included */
  transferTimeoutMs?: number
  ackTimeoutMs?: number
  chunkSize?: number
  debug?: boolean
  onPhaseChange?: (phase: NegotiationPhase, role: ClientRole) => void
  onMetadata?: (metadata: FileMetadata) => void
  onProgress?: (progress: TransferProgress, role: ClientRole) => void
}

export interface SendReport extends SendResult {
  fileId: string
}

export interface ReceiveReport extends TransferStats {
  fileId: string | null
}

/** Exchange factory for a loaded configuration: broker when a URL is set, manual otherwise. */
export function exchangeFromConfig(
  config: Pick<AppConfig, "signalingUrl">,
  manual: { prompt?: ManualPrompt; presetRemote?: RemoteDescription } = {},
): ExchangeFactory {
  return (roomId) => connectExchange({ signalingUrl: config.signalingUrl, roomId, ...manual })
}

async function waitForDrain(channel: BufferedChannel, timeoutMs: number): Promise<void> {
  const deadline = Date.now() + timeoutMs
  while (channel.isOpen() && channel.bufferedAmount > 0 && Date.now() < deadline) {
    await delay(10)
  }
}

/**
 * One peer's side of a transfer. Each call runs a fresh engine, exchange and
 * negotiator, and releases all three however the attempt ends.
 */
export class PeerClient {
  private readonly iceServers: IceServer[]
  private readonly transferTimeoutMs: number

  constructor(private readonly options: PeerClientOptions) {
    this.iceServers = options.iceServers ?? buildIceServers()
    this.transferTimeoutMs = options.transferTimeoutMs ?? TRANSFER_TIMEOUT_MS
  }

  async send(source: TransferSource, fileId = generateFileId(), roomId = fileId): Promise<SendReport> {
    console.log(`📤 Sending ${source.metadata.fileName} (${source.metadata.fileSize} bytes)`)
    console.log(`📄 File ID: ${fileId}`)

    return this.attempt("sender", roomId, async (negotiator) => {
      const channel = await negotiator.negotiateAsSender(fileId)
      const result = await sendFile(channel, source, {
        chunkSize: this.options.chunkSize ?? DEFAULT_CHUNK_SIZE,
        ackTimeoutMs: this.options.ackTimeoutMs,
        onProgress: this.progressReporter("sender"),
      })
      return { ...result, fileId }
    })
  }

  async receive(sink: TransferSink, roomId: string): Promise<ReceiveReport> {
    console.log(`📥 Receiving from room ${roomId}`)

    return this.attempt("receiver", roomId, async (negotiator) => {
      const channel = await negotiator.negotiateAsReceiver()
      const receiver = new TransferReceiver({
        sink,
        reply: (data) => channel.send(data),
        onMetadata: this.options.onMetadata,
        onProgress: this.progressReporter("receiver"),
      })

      channel.setMessageHandler((data) => receiver.push(toBytes(data)))
      channel.onClosed(() => receiver.channelClosed())

      const stats = await receiver.done
      await waitForDrain(channel, ACK_FLUSH_MS)
      return { ...stats, fileId: negotiator.fileId }
    })
  }

  private async attempt<T>(
    role: ClientRole,
    roomId: string,
    run: (negotiator: SessionNegotiator) => Promise<T>,
  ): Promise<T> {
    const startedAt = Date.now()
    const engine = this.options.createTransport(this.iceServers)
    let exchange: DescriptionExchange | null = null
    let negotiator: SessionNegotiator | null = null

    try {
      exchange = await this.options.connect(roomId)
      negotiator = new SessionNegotiator(engine, exchange, {
        timeouts: this.options.timeouts,
        debug: this.options.debug,
        onPhaseChange: (phase) => this.options.onPhaseChange?.(phase, role),
      })

      const result = await withDeadline(
        run(negotiator),
        this.transferTimeoutMs,
        () => new NegotiationError("transfer", "timeout", Date.now() - startedAt),
      )
      negotiator.complete()
      return result
    } catch (error) {
      negotiator?.fail(error)
      console.error(`❌ ${role === "sender" ? "Send" : "Receive"} failed: ${errorMessage(error)}`)
      throw error
    } finally {
      if (negotiator) {
        negotiator.close()
      } else {
        engine.close()
      }
      exchange?.close()
    }
  }

  private progressReporter(role: ClientRole): (progress: TransferProgress) => void {
    const listener = this.options.onProgress
    if (listener) return (progress) => listener(progress, role)

    let lastLog = 0
    return (progress) => {
      const now = Date.now()
      if (now - lastLog < PROGRESS_LOG_INTERVAL_MS && progress.percent !== 100) return
      lastLog = now
      console.log(`📊 ${formatProgress(progress)}`)
    }
  }
}
