import type { Protocol } from "../config/types.js";

export interface RelayStats {
	/** Open TCP connections or live UDP sessions. */
	active: number;
	/** Total accepted connections or created sessions since start. */
	total: number;
}

/** A proxy listener for one service, selected once by protocol at start-up. */
export interface ProxyRelay {
	readonly protocol: Protocol;
	start(port: number, host?: string): Promise<void>;
	/**
	 * Stops accepting traffic and releases every socket. Waits up to
	 * `deadlineMs` for in-flight work before force-closing it. Safe to call
	 * more than once.
	 */
	stop(deadlineMs?: number): Promise<void>;
	/** Bound port, or null before start and after stop. */
	port(): number | null;
	stats(): RelayStats;
}
