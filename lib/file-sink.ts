import { createReadStream } from "fs"
import { mkdir, open, rm, stat, type FileHandle } from "fs/promises"
import { basename, join } from "path"
import { TransferError } from "./errors"
import type { FileMetadata } from "./signaling-types"
import type { TransferSink, TransferSource } from "./transfer-codec"

/** Strips any directory part the sender put in the name. */
export function safeFileName(fileName: string): string {
  const name = basename(fileName.replace(/\\/g, "/"))
  if (!name || name === "." || name === "..") {
    throw new TransferError("protocol", `Refusing unusable file name "${fileName}"`)
  }
  return name
}

/**
 * Empty or "." saves into the working directory; an existing directory saves
 * inside it; a path that does not exist yet is created as a directory;
 * anything else is used as the file path.
 */
export async function resolveSavePath(savePath: string, fileName: string): Promise<string> {
  const name = safeFileName(fileName)
  if (!savePath || savePath === ".") return name

  const info = await stat(savePath).catch((error: unknown) => {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null
    throw error
  })

  if (info?.isDirectory()) return join(savePath, name)
  if (info) return savePath

  await mkdir(savePath, { recursive: true })
  return join(savePath, name)
}

export class FileSink implements TransferSink {
  private handle: FileHandle | null = null
  private target: string | null = null

  constructor(private readonly savePath = ".") {}

  get path(): string | null {
    return this.target
  }

  async open(metadata: FileMetadata): Promise<void> {
    this.target = await resolveSavePath(this.savePath, metadata.fileName)
    this.handle = await open(this.target, "w")
    console.log(`💾 Saving to: ${this.target}`)
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (!this.handle) throw new TransferError("io", "Destination is not open")
    let offset = 0
    while (offset < chunk.length) {
      const { bytesWritten } = await this.handle.write(chunk, offset, chunk.length - offset)
      offset += bytesWritten
    }
  }

  async close(): Promise<string | undefined> {
    await this.handle?.close()
    this.handle = null
    return this.target ?? undefined
  }

  /** Closes and removes the partial file. */
  async abort(): Promise<void> {
    const handle = this.handle
    this.handle = null
    await handle?.close()
    if (this.target) {
      await rm(this.target, { force: true })
    }
  }
}

export async function fileSource(path: string): Promise<TransferSource> {
  const info = await stat(path)
  if (!info.isFile()) {
    throw new TransferError("io", `${path} is not a regular file`)
  }

  return {
    metadata: { fileName: basename(path), fileSize: info.size },
    async *open(chunkSize: number) {
      for await (const block of createReadStream(path, { highWaterMark: chunkSize })) {
        if (block instanceof Uint8Array) yield block
      }
    },
  }
}
