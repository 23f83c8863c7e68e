// File framing over an ordered, reliable data channel:
// [u32 BE metadata length][metadata JSON][payload bytes...], then a JSON ack from the receiver
import { TransferError, errorMessage } from "./errors"
import { EventQueue, WaitTimeoutError, Deferred, delay } from "./event-queue"
import { FILE_RECEIVED_ACK, type FileMetadata } from "./signaling-types"
import type { BufferedChannel, ChannelData } from "./transport-engine"
import { formatFileSize } from "./utils"

export const LENGTH_PREFIX_SIZE = 4
export const DEFAULT_CHUNK_SIZE = 32 * 1024
/** Largest message the channel is assumed to carry */
export const MAX_CHANNEL_MESSAGE_SIZE = 64 * 1024
export const MAX_METADATA_LENGTH = 64 * 1024
export const ACK_TIMEOUT_MS = 5 * 60 * 1000
const BUFFERED_AMOUNT_CHUNKS = 16
const BACKPRESSURE_POLL_MS = 10

export interface TransferProgress {
  transferred: number
  /** 0 when the size is unknown */
  total: number
  /** null when the size is unknown */
  percent: number | null
  bytesPerSecond: number
}

export interface TransferStats {
  fileName: string
  bytes: number
  elapsedMs: number
  bytesPerSecond: number
  /** where the sink put the file, if it has a location */
  location?: string
}

export function measureProgress(transferred: number, total: number, startedAt: number): TransferProgress {
  const elapsedMs = Math.max(1, Date.now() - startedAt)
  return {
    transferred,
    total,
    percent: total > 0 ? Math.min(100, (transferred / total) * 100) : null,
    bytesPerSecond: (transferred / elapsedMs) * 1000,
  }
}

export function formatProgress(progress: TransferProgress): string {
  const speed = `${formatFileSize(progress.bytesPerSecond)}/s`
  if (progress.percent === null) {
    return `Received ${formatFileSize(progress.transferred)} (${speed})`
  }
  return `Progress: ${progress.percent.toFixed(2)}% | ${formatFileSize(progress.transferred)} / ${formatFileSize(progress.total)} | ${speed}`
}

function assertChunkSize(chunkSize: number): number {
  if (!Number.isInteger(chunkSize) || chunkSize < 1 || chunkSize > MAX_CHANNEL_MESSAGE_SIZE) {
    throw new RangeError(`Chunk size must be an integer between 1 and ${MAX_CHANNEL_MESSAGE_SIZE}, got ${chunkSize}`)
  }
  return chunkSize
}

export function encodeMetadata(metadata: FileMetadata): Uint8Array {
  return Buffer.from(JSON.stringify({ fileName: metadata.fileName, fileSize: metadata.fileSize }), "utf8")
}

export function decodeMetadata(body: Uint8Array): FileMetadata {
  let parsed: unknown
  try {
    parsed = JSON.parse(Buffer.from(body.buffer, body.byteOffset, body.byteLength).toString("utf8"))
  } catch (error) {
    throw new TransferError("decode", `Failed to parse file metadata: ${errorMessage(error)}`, { cause: error })
  }

  if (typeof parsed !== "object" || parsed === null) {
    throw new TransferError("decode", "File metadata must be a JSON object")
  }
  const fileName = "fileName" in parsed ? parsed.fileName : undefined
  const fileSize = "fileSize" in parsed ? parsed.fileSize : undefined

  if (typeof fileName !== "string") {
    throw new TransferError("decode", "File metadata has no fileName")
  }
  if (typeof fileSize !== "number" || !Number.isSafeInteger(fileSize) || fileSize < 0) {
    throw new TransferError("decode", "File metadata fileSize must be a non-negative integer")
  }
  return { fileName, fileSize }
}

/** Length prefix plus metadata, cut into messages of at most `chunkSize` bytes. */
export function frameMetadata(metadata: FileMetadata, chunkSize = DEFAULT_CHUNK_SIZE): Uint8Array[] {
  assertChunkSize(chunkSize)
  const body = encodeMetadata(metadata)
  const header = Buffer.alloc(LENGTH_PREFIX_SIZE + body.length)
  header.writeUInt32BE(body.length, 0)
  header.set(body, LENGTH_PREFIX_SIZE)

  const frames: Uint8Array[] = []
  for (let offset = 0; offset < header.length; offset += chunkSize) {
    frames.push(header.subarray(offset, offset + chunkSize))
  }
  return frames
}

export function isFileReceivedAck(data: ChannelData): boolean {
  const text = typeof data === "string" ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("utf8")
  try {
    const parsed: unknown = JSON.parse(text)
    return typeof parsed === "object" && parsed !== null && "type" in parsed && parsed.type === FILE_RECEIVED_ACK.type
  } catch {
    return false
  }
}

export interface TransferSource {
  metadata: FileMetadata
  open(chunkSize: number): AsyncIterable<Uint8Array>
}

export interface SendOptions {
  chunkSize?: number
  ackTimeoutMs?: number
  onProgress?: (progress: TransferProgress) => void
}

export interface SendResult {
  fileName: string
  bytes: number
  elapsedMs: number
  bytesPerSecond: number
  acknowledged: boolean
}

type SenderSignal = "ack" | "closed"

async function waitForBufferSpace(channel: BufferedChannel, highWaterMark: number): Promise<void> {
  while (channel.bufferedAmount > highWaterMark) {
    if (!channel.isOpen()) return
    await delay(BACKPRESSURE_POLL_MS)
  }
}

/**
 * Streams `source` through an open channel. The channel is left open so the
 * receiver can answer with its acknowledgment; a missing acknowledgment is
 * only a warning since every byte has already gone out. A source of unknown
 * size (fileSize 0) ends by closing the channel instead.
 */
export async function sendFile(channel: BufferedChannel, source: TransferSource, options: SendOptions = {}): Promise<SendResult> {
  const chunkSize = assertChunkSize(options.chunkSize ?? DEFAULT_CHUNK_SIZE)
  const { metadata } = source
  const signals = new EventQueue<SenderSignal>()

  channel.setMessageHandler((data) => {
    if (isFileReceivedAck(data)) {
      signals.push("ack")
    } else {
      console.warn("⚠️ Unexpected message from receiver ignored")
    }
  })
  channel.onClosed(() => signals.push("closed"))

  for (const frame of frameMetadata(metadata, chunkSize)) {
    channel.send(frame)
  }
  console.log(`📤 Metadata sent: ${metadata.fileName} (${formatFileSize(metadata.fileSize)})`)

  const startedAt = Date.now()
  let sent = 0
  try {
    for await (const block of source.open(chunkSize)) {
      for (let offset = 0; offset < block.length; offset += chunkSize) {
        await waitForBufferSpace(channel, chunkSize * BUFFERED_AMOUNT_CHUNKS)
        const chunk = block.subarray(offset, offset + chunkSize)
        channel.send(chunk)
        sent += chunk.length
        options.onProgress?.(measureProgress(sent, metadata.fileSize, startedAt))
      }
    }
  } catch (error) {
    if (error instanceof TransferError) throw error
    throw new TransferError("io", `Failed to read ${metadata.fileName}: ${errorMessage(error)}`, { cause: error })
  }

  const elapsedMs = Date.now() - startedAt
  const result = {
    fileName: metadata.fileName,
    bytes: sent,
    elapsedMs,
    bytesPerSecond: (sent / Math.max(1, elapsedMs)) * 1000,
  }
  console.log(`✅ Sent ${formatFileSize(sent)} in ${(elapsedMs / 1000).toFixed(2)}s`)

  if (metadata.fileSize > 0 && sent !== metadata.fileSize) {
    console.warn(`⚠️ Sent ${sent} bytes but announced ${metadata.fileSize}`)
  }

  if (metadata.fileSize === 0) {
    channel.close()
    return { ...result, acknowledged: false }
  }

  const ackTimeoutMs = options.ackTimeoutMs ?? ACK_TIMEOUT_MS
  try {
    const signal = await signals.next(ackTimeoutMs)
    if (signal === "ack") {
      console.log("✅ Receiver confirmed the file")
      return { ...result, acknowledged: true }
    }
    console.warn("⚠️ Channel closed before the receiver confirmed, but the file was sent")
  } catch (error) {
    if (!(error instanceof WaitTimeoutError)) throw error
    console.warn("⚠️ Timed out waiting for the receiver to confirm, but the file was sent")
  }
  return { ...result, acknowledged: false }
}

/** Destination for received bytes. */
export interface TransferSink {
  open(metadata: FileMetadata): Promise<void>
  write(chunk: Uint8Array): Promise<void>
  /** Returns where the data ended up, if that means anything for this sink. */
  close(): Promise<string | undefined>
  abort(): Promise<void>
}

export type ReceiverPhase = "awaiting-length" | "awaiting-metadata" | "receiving-payload" | "done"

type ReceiverState =
  | { phase: "awaiting-length"; prefix: Uint8Array; filled: number }
  | { phase: "awaiting-metadata"; body: Uint8Array; filled: number }
  | { phase: "receiving-payload"; metadata: FileMetadata }
  | { phase: "done" }

export interface ReceiverOptions {
  sink: TransferSink
  /** Sends a message back over the channel. */
  reply: (data: string) => void
  onMetadata?: (metadata: FileMetadata) => void
  onProgress?: (progress: TransferProgress) => void
}

/**
 * Receiver-side parser. Each incoming message is walked with a cursor, and
 * bytes left over after one phase completes carry straight into the next, so
 * any split of prefix, metadata and payload across messages parses the same.
 * Messages are processed strictly one after another.
 */
export class TransferReceiver {
  private state: ReceiverState = { phase: "awaiting-length", prefix: new Uint8Array(LENGTH_PREFIX_SIZE), filled: 0 }
  private readonly result = new Deferred<TransferStats>()
  private queue: Promise<void> = Promise.resolve()
  private readonly startedAt = Date.now()
  private receivedBytes = 0
  private destinationOpen = false
  private settled = false
  private failed = false
  private fileName = ""

  constructor(private readonly options: ReceiverOptions) {}

  get done(): Promise<TransferStats> {
    return this.result.promise
  }

  get phase(): ReceiverPhase {
    return this.state.phase
  }

  get received(): number {
    return this.receivedBytes
  }

  push(data: Uint8Array): void {
    if (this.settled) {
      if (!this.failed && data.length > 0) {
        console.warn(`⚠️ Ignoring ${data.length} bytes past the end of the file`)
      }
      return
    }
    this.queue = this.queue.then(() => this.process(data)).catch((error: unknown) => this.fail(error))
  }

  /** A streaming transfer (fileSize 0) ends here; any other transfer is cut short. */
  channelClosed(): void {
    this.queue = this.queue
      .then(async () => {
        if (this.settled) return
        const state = this.state
        if (state.phase === "receiving-payload" && state.metadata.fileSize === 0) {
          await this.finish(false)
          return
        }
        if (state.phase === "done") return
        throw new TransferError("channel-closed", `Data channel closed after ${this.receivedBytes} bytes`)
      })
      .catch((error: unknown) => this.fail(error))
  }

  private async process(data: Uint8Array): Promise<void> {
    let cursor = 0

    while (cursor < data.length && !this.settled) {
      const state = this.state

      switch (state.phase) {
        case "awaiting-length": {
          const take = Math.min(LENGTH_PREFIX_SIZE - state.filled, data.length - cursor)
          state.prefix.set(data.subarray(cursor, cursor + take), state.filled)
          state.filled += take
          cursor += take

          if (state.filled === LENGTH_PREFIX_SIZE) {
            const length = Buffer.from(state.prefix).readUInt32BE(0)
            if (length === 0 || length > MAX_METADATA_LENGTH) {
              throw new TransferError("decode", `Invalid metadata length: ${length}`)
            }
            this.state = { phase: "awaiting-metadata", body: new Uint8Array(length), filled: 0 }
          }
          break
        }

        case "awaiting-metadata": {
          const take = Math.min(state.body.length - state.filled, data.length - cursor)
          state.body.set(data.subarray(cursor, cursor + take), state.filled)
          state.filled += take
          cursor += take

          if (state.filled === state.body.length) {
            await this.openDestination(decodeMetadata(state.body))
          }
          break
        }

        case "receiving-payload": {
          if (!this.destinationOpen) {
            throw new TransferError("protocol", "Payload arrived before the destination was opened")
          }
          const { fileSize } = state.metadata
          const end = fileSize > 0 ? Math.min(data.length, cursor + (fileSize - this.receivedBytes)) : data.length
          await this.write(data.subarray(cursor, end))
          cursor = end

          if (fileSize > 0 && this.receivedBytes >= fileSize) {
            await this.finish(true)
          }
          break
        }

        case "done":
          cursor = data.length
          break
      }
    }

    if (cursor < data.length && !this.failed) {
      console.warn(`⚠️ Ignoring ${data.length - cursor} bytes past the end of the file`)
    }
  }

  private async openDestination(metadata: FileMetadata): Promise<void> {
    this.fileName = metadata.fileName
    console.log(`📄 File: ${metadata.fileName}`)
    console.log(`📦 Size: ${metadata.fileSize} bytes (${formatFileSize(metadata.fileSize)})`)
    this.options.onMetadata?.(metadata)

    try {
      await this.options.sink.open(metadata)
    } catch (error) {
      if (error instanceof TransferError) throw error
      throw new TransferError("io", `Failed to open destination: ${errorMessage(error)}`, { cause: error })
    }
    this.destinationOpen = true
    this.state = { phase: "receiving-payload", metadata }

    if (metadata.fileSize === 0) {
      console.log("📥 Size unknown, receiving until the sender closes the channel")
    }
  }

  private async write(chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return
    try {
      await this.options.sink.write(chunk)
    } catch (error) {
      if (error instanceof TransferError) throw error
      throw new TransferError("io", `Failed to write to destination: ${errorMessage(error)}`, { cause: error })
    }
    this.receivedBytes += chunk.length
    const total = this.state.phase === "receiving-payload" ? this.state.metadata.fileSize : 0
    this.options.onProgress?.(measureProgress(this.receivedBytes, total, this.startedAt))
  }

  private async finish(acknowledge: boolean): Promise<void> {
    this.state = { phase: "done" }

    let location: string | undefined
    try {
      location = await this.options.sink.close()
    } catch (error) {
      throw new TransferError("io", `Failed to finalize destination: ${errorMessage(error)}`, { cause: error })
    }

    const elapsedMs = Date.now() - this.startedAt
    const stats: TransferStats = {
      fileName: this.fileName,
      bytes: this.receivedBytes,
      elapsedMs,
      bytesPerSecond: (this.receivedBytes / Math.max(1, elapsedMs)) * 1000,
      location,
    }
    this.settled = true
    console.log(`✅ Received ${formatFileSize(stats.bytes)} in ${(elapsedMs / 1000).toFixed(2)}s`)

    if (acknowledge) {
      try {
        this.options.reply(JSON.stringify(FILE_RECEIVED_ACK))
      } catch (error) {
        console.warn(`⚠️ Failed to send the acknowledgment: ${errorMessage(error)}`)
      }
    }
    this.result.resolve(stats)
  }

  private async fail(error: unknown): Promise<void> {
    if (this.settled) return
    this.settled = true
    this.failed = true
    this.state = { phase: "done" }

    const failure =
      error instanceof TransferError
        ? error
        : new TransferError("protocol", `Transfer failed: ${errorMessage(error)}`, { cause: error })
    console.error(`❌ ${failure.message}`)

    if (this.destinationOpen) {
      try {
        await this.options.sink.abort()
      } catch (abortError) {
        console.error(`❌ Failed to clean up the destination: ${errorMessage(abortError)}`)
      }
    }
    this.result.reject(failure)
  }
}
