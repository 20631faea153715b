export type {
  Availability,
  Protocol,
  ResolvedConfig,
  ServiceDefinition,
  ServiceDescriptor,
  ServiceStatus,
  StatusServerConfig,
  WakeProxyConfig,
} from "./config/types.js";

export {
  loadConfig,
  parseConfig,
  findConfigFile,
  findService,
  toServiceDescriptors,
  type LoadConfigOptions,
} from "./config/loader.js";
export { ServiceDefinitionSchema, WakeProxyConfigSchema } from "./config/schema.js";

export {
  ServiceSupervisor,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  type StartReport,
  type StartFailure,
  type SupervisorOptions,
} from "./core/supervisor.js";
export { startProxy, runUntilSignal, type RunningProxy, type RunOptions } from "./core/run.js";

export { probe, type Prober } from "./health/checkers.js";
export { HealthMonitor, type HealthMonitorOptions } from "./health/monitor.js";

export { WakeCoordinator, type WakeCoordinatorOptions } from "./wake/coordinator.js";
export {
  buildMagicPacket,
  normalizeMac,
  sendMagicPacket,
  MAGIC_PACKET_SIZE,
  type WakeDelivery,
  type WakeSender,
} from "./wake/magic-packet.js";

export {
  createRelay,
  relayTcp,
  pipeSockets,
  TcpProxy,
  UdpRelay,
  type ConnectionGate,
  type ProxyRelay,
  type RelayStats,
  type TcpRelayResult,
  type UdpRelayOptions,
} from "./relay/index.js";

export { createStatusServer, startStatusServer, stopStatusServer } from "./status/server.js";
export { ConfigError, ListenerBindError } from "./utils/errors.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./utils/logger.js";
