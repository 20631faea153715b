import type { z } from "zod";
import type { ServiceDefinitionSchema, WakeProxyConfigSchema } from "./schema.js";
import type { LogLevel } from "../utils/logger.js";

export type Protocol = "tcp" | "udp";

/** Service entry as written in the config file, after defaults are applied. */
export type ServiceDefinition = z.output<typeof ServiceDefinitionSchema>;

export type WakeProxyConfig = z.output<typeof WakeProxyConfigSchema>;

export interface StatusServerConfig {
	port: number;
	host: string;
}

/**
 * One proxied service, resolved from the config file. Durations are in
 * milliseconds; the file itself uses seconds.
 */
export interface ServiceDescriptor {
	readonly name: string;
	readonly targetHost: string;
	readonly targetPort: number;
	readonly proxyPort: number;
	/** Lower-case, colon separated. */
	readonly macAddress: string;
	readonly protocol: Protocol;
	readonly wakeTimeoutMs: number;
	readonly healthCheckIntervalMs: number;
	readonly connectionTimeoutMs: number;
	readonly maxUdpSessions: number;
	readonly wakeAddress: string;
	readonly wakePort: number;
}

export interface ResolvedConfig {
	configPath: string;
	logLevel: LogLevel;
	shutdownTimeoutMs: number;
	status?: StatusServerConfig;
	services: readonly ServiceDescriptor[];
}

export type Availability = "unknown" | "up" | "down";

export interface ServiceStatus {
	name: string;
	protocol: Protocol;
	proxyPort: number;
	target: string;
	availability: Availability;
	lastCheckedAt: string | null;
	startedAt: string;
	activeConnections: number;
}
