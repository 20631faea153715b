import type { ServiceDescriptor } from "../config/types.js";
import type { Logger } from "../utils/logger.js";
import { TcpProxy, type ConnectionGate } from "./tcp.js";
import { UdpRelay } from "./udp.js";
import type { ProxyRelay } from "./types.js";

export interface CreateRelayOptions {
	/** Only TCP connections are gated; UDP forwards unconditionally. */
	gate?: ConnectionGate;
	logger?: Logger;
}

export function createRelay(service: ServiceDescriptor, options: CreateRelayOptions = {}): ProxyRelay {
	switch (service.protocol) {
		case "tcp":
			return new TcpProxy({
				targetHost: service.targetHost,
				targetPort: service.targetPort,
				connectTimeoutMs: service.connectionTimeoutMs,
				gate: options.gate,
				logger: options.logger,
			});
		case "udp":
			return new UdpRelay({
				targetHost: service.targetHost,
				targetPort: service.targetPort,
				maxSessions: service.maxUdpSessions,
				logger: options.logger,
			});
	}
}

export { TcpProxy, relayTcp, pipeSockets, type ConnectionGate, type TcpRelayResult } from "./tcp.js";
export { UdpRelay, type UdpRelayOptions, type UdpSessionInfo } from "./udp.js";
export type { ProxyRelay, RelayStats } from "./types.js";
