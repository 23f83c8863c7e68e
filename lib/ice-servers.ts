import type { IceServer } from "./transport-engine"

export const DEFAULT_STUN_URLS = ["stun:stun.l.google.com:19302"]

export interface IceSettings {
  stunServer?: string
  turnServer?: string
  turnUsername?: string
  turnCredential?: string
}

function withScheme(address: string, scheme: "stun" | "turn"): string {
  if (address.startsWith(`${scheme}:`) || address.startsWith(`${scheme}s:`)) return address
  return `${scheme}:${address}`
}

export function buildIceServers(settings: IceSettings = {}): IceServer[] {
  const servers: IceServer[] = [
    { urls: settings.stunServer ? [withScheme(settings.stunServer, "stun")] : [...DEFAULT_STUN_URLS] },
  ]

  if (settings.turnServer) {
    servers.push({
      urls: [withScheme(settings.turnServer, "turn")],
      username: settings.turnUsername,
      credential: settings.turnCredential,
    })
  }
  return servers
}
