export * from "./errors"
export * from "./event-queue"
export * from "./signaling-types"
export * from "./room-registry"
export * from "./signaling-broker"
export * from "./signaling-client"
export * from "./description-exchange"
export * from "./transport-engine"
export * from "./session-negotiator"
export * from "./transfer-codec"
export * from "./file-sink"
export * from "./peer-client"
export * from "./ice-servers"
export * from "./config"
export * from "./utils"
