import { randomBytes } from "crypto"

const FILE_ID_PATTERN = /^[0-9a-fA-F]{16}$/

/** 16 random hex characters; also the default room id. */
export function generateFileId(): string {
  return randomBytes(8).toString("hex")
}

export function validateFileId(fileId: string): boolean {
  return FILE_ID_PATTERN.test(fileId)
}

export function formatFileSize(bytes: number): string {
  if (bytes === 0) return "0 Bytes"

  const k = 1024
  const sizes = ["Bytes", "KB", "MB", "GB", "TB"]
  const i = Math.min(sizes.length - 1, Math.max(0, Math.floor(Math.log(bytes) / Math.log(k))))

  return Number.parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + " " + sizes[i]
}

/**
 * Guesses whether a receive address points at a plain HTTP download rather
 * than a peer. Explicit schemes win; a bare 16-hex-character string is a file
 * id; anything else with a slash or a dot looks like a host.
 */
export function isHttpAddress(address: string): boolean {
  const lower = address.toLowerCase()
  if (lower.startsWith("http://") || lower.startsWith("https://")) return true
  if (lower.includes("://")) return false
  if (validateFileId(address)) return false
  return address.includes("/") || address.includes(".")
}

export type ReceiveTarget =
  | { kind: "http"; url: string }
  | { kind: "peer"; fileId: string; offer?: string }

export function resolveReceiveTarget(address: string): ReceiveTarget {
  const trimmed = address.trim()
  if (!trimmed) {
    throw new Error("Address must not be empty")
  }

  // Classify on what precedes a "|" so a pasted offer's base64 never reads as a path
  const separator = trimmed.indexOf("|")
  const head = separator === -1 ? trimmed : trimmed.slice(0, separator)

  if (isHttpAddress(head)) {
    const url = /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`
    return { kind: "http", url }
  }

  if (separator !== -1) {
    return { kind: "peer", fileId: head, offer: trimmed.slice(separator + 1) }
  }
  return { kind: "peer", fileId: trimmed }
}
