import type { FileMetadata } from "../../signaling-types"
import type { TransferSink, TransferSource } from "../../transfer-codec"

export class MemorySink implements TransferSink {
  metadata: FileMetadata | null = null
  readonly chunks: Uint8Array[] = []
  closed = false
  aborted = false

  async open(metadata: FileMetadata): Promise<void> {
    this.metadata = metadata
  }

  async write(chunk: Uint8Array): Promise<void> {
    this.chunks.push(Uint8Array.from(chunk))
  }

  async close(): Promise<string | undefined> {
    this.closed = true
    return "memory"
  }

  async abort(): Promise<void> {
    this.aborted = true
  }

  bytes(): Buffer {
    return Buffer.concat(this.chunks)
  }
}

export function memorySource(fileName: string, content: Uint8Array, announcedSize = content.length): TransferSource {
  return {
    metadata: { fileName, fileSize: announcedSize },
    async *open(chunkSize: number) {
      for (let offset = 0; offset < content.length; offset += chunkSize) {
        yield content.subarray(offset, offset + chunkSize)
      }
    },
  }
}

/** Deterministic bytes so a mismatch shows up at a stable offset. */
export function patternBytes(length: number): Uint8Array {
  const bytes = new Uint8Array(length)
  for (let i = 0; i < length; i++) bytes[i] = (i * 31 + 7) % 251
  return bytes
}
