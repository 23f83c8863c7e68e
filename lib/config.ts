import type { IceSettings } from "./ice-servers"
import { SIGNALING_PATH } from "./signaling-types"

export const DEFAULT_SIGNALING_PORT = 37851

export interface AppConfig {
  port: number
  host: string
  /** null when descriptions are exchanged by hand */
  signalingUrl: string | null
  ice: IceSettings
  debug: boolean
}

type Env = Record<string, string | undefined>

function parsePort(value: string, name: string): number {
  const port = Number(value)
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`${name} must be a port number between 1 and 65535, got "${value}"`)
  }
  return port
}

function parseFlag(value: string | undefined): boolean {
  if (!value) return false
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase())
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export function loadConfig(env: Env = process.env): AppConfig {
  const portVariable = optional(env.SIGNALING_PORT) ? "SIGNALING_PORT" : "PORT"
  const rawPort = optional(env[portVariable])
  const port = rawPort ? parsePort(rawPort, portVariable) : DEFAULT_SIGNALING_PORT

  const rawUrl = optional(env.SIGNALING_URL)
  const signalingUrl =
    rawUrl?.toLowerCase() === "manual" ? null : (rawUrl ?? `ws://localhost:${port}${SIGNALING_PATH}`)

  return {
    port,
    host: optional(env.HOST) ?? "0.0.0.0",
    signalingUrl,
    ice: {
      stunServer: optional(env.STUN_SERVER),
      turnServer: optional(env.TURN_SERVER),
      turnUsername: optional(env.TURN_USERNAME),
      turnCredential: optional(env.TURN_CREDENTIAL),
    },
    debug: parseFlag(env.DEBUG),
  }
}
