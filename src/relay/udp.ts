import { createSocket, type RemoteInfo, type Socket, type SocketType } from "node:dgram";
import { isIPv6 } from "node:net";
import { formatAddress } from "../utils/net.js";
import { formatError, silentLogger, type Logger } from "../utils/logger.js";
import type { ProxyRelay, RelayStats } from "./types.js";

export const DEFAULT_MAX_UDP_SESSIONS = 100;
export const DEFAULT_SESSION_IDLE_MS = 5 * 60 * 1000;
export const DEFAULT_SWEEP_INTERVAL_MS = 60 * 1000;

interface UdpSession {
	key: string;
	client: RemoteInfo;
	upstream: Socket;
	/** Local port of the upstream socket, once it is connected. */
	upstreamPort: number | null;
	/** Datagrams received before the upstream socket finished connecting. */
	pending: Buffer[] | null;
	lastActivity: number;
	closed: boolean;
}

export interface UdpSessionInfo {
	client: string;
	upstreamPort: number | null;
	lastActivity: number;
}

export interface UdpRelayOptions {
	targetHost: string;
	targetPort: number;
	maxSessions?: number;
	/** Sessions with no client traffic for longer than this are evicted. */
	sessionIdleMs?: number;
	sweepIntervalMs?: number;
	logger?: Logger;
	now?: () => number;
}

/**
 * Relays datagrams between clients and a single target. Each client address
 * gets its own upstream socket, so the target's replies can be routed back.
 */
export class UdpRelay implements ProxyRelay {
	readonly protocol = "udp" as const;
	private listener: Socket | null = null;
	private sessions = new Map<string, UdpSession>();
	private sweepTimer: NodeJS.Timeout | null = null;
	private total = 0;
	private stopping: Promise<void> | null = null;
	private readonly targetHost: string;
	private readonly targetPort: number;
	private readonly maxSessions: number;
	private readonly sessionIdleMs: number;
	private readonly sweepIntervalMs: number;
	private readonly logger: Logger;
	private readonly now: () => number;

	constructor(options: UdpRelayOptions) {
		this.targetHost = options.targetHost;
		this.targetPort = options.targetPort;
		this.maxSessions = options.maxSessions ?? DEFAULT_MAX_UDP_SESSIONS;
		this.sessionIdleMs = options.sessionIdleMs ?? DEFAULT_SESSION_IDLE_MS;
		this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
		this.logger = options.logger ?? silentLogger;
		this.now = options.now ?? Date.now;
	}

	start(port: number, host = "0.0.0.0"): Promise<void> {
		if (this.listener) return Promise.reject(new Error("UDP relay already started"));

		const listener = createSocket(isIPv6(host) ? "udp6" : "udp4");

		return new Promise((resolve, reject) => {
			const onError = (err: Error) => {
				listener.removeListener("listening", onListening);
				try {
					listener.close();
				} catch (closeErr) {
					this.logger.debug(`Unbound listener could not be closed: ${formatError(closeErr)}`);
				}
				reject(err);
			};
			const onListening = () => {
				listener.removeListener("error", onError);
				listener.on("error", (err) => this.logger.error(`Listener error: ${formatError(err)}`));
				listener.on("message", (msg, rinfo) => this.handleDatagram(msg, rinfo));

				this.listener = listener;
				this.stopping = null;
				this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
				this.sweepTimer.unref();

				this.logger.info(
					`UDP relay listening on ${formatAddress(host, this.port() ?? port)} -> ${formatAddress(this.targetHost, this.targetPort)}`,
				);
				resolve();
			};
			listener.once("error", onError);
			listener.once("listening", onListening);
			listener.bind(port, host);
		});
	}

	port(): number | null {
		if (!this.listener) return null;
		return this.listener.address().port;
	}

	stats(): RelayStats {
		return { active: this.sessions.size, total: this.total };
	}

	listSessions(): UdpSessionInfo[] {
		return [...this.sessions.values()].map((s) => ({
			client: s.key,
			upstreamPort: s.upstreamPort,
			lastActivity: s.lastActivity,
		}));
	}

	hasSession(address: string, port: number): boolean {
		return this.sessions.has(formatAddress(address, port));
	}

	/** Evicts idle sessions. Runs on a timer; exposed for callers that want to sweep now. */
	sweep(now: number = this.now()): number {
		let evicted = 0;
		for (const session of [...this.sessions.values()]) {
			if (now - session.lastActivity > this.sessionIdleMs) {
				this.closeSession(session, "idle");
				evicted++;
			}
		}
		return evicted;
	}

	stop(): Promise<void> {
		if (!this.stopping) {
			this.stopping = this.shutdown();
		}
		return this.stopping;
	}

	private async shutdown(): Promise<void> {
		const listener = this.listener;
		if (!listener) return;

		if (this.sweepTimer) {
			clearInterval(this.sweepTimer);
			this.sweepTimer = null;
		}

		// Stop accepting first so no datagram can recreate a session we are tearing down.
		listener.removeAllListeners("message");
		await new Promise<void>((resolve) => listener.close(() => resolve()));
		this.listener = null;

		for (const session of [...this.sessions.values()]) {
			this.closeSession(session, "shutdown");
		}
		this.sessions.clear();
		this.logger.info("UDP relay stopped");
	}

	private handleDatagram(msg: Buffer, rinfo: RemoteInfo): void {
		const key = formatAddress(rinfo.address, rinfo.port);
		let session = this.sessions.get(key);

		if (!session) {
			if (this.sessions.size >= this.maxSessions) {
				this.logger.warn(`UDP session limit reached (${this.maxSessions}), dropping packet from ${key}`);
				return;
			}
			session = this.openSession(key, rinfo);
		}

		session.lastActivity = this.now();
		if (session.pending) {
			session.pending.push(msg);
		} else {
			this.sendUpstream(session, msg);
		}
	}

	private sendUpstream(session: UdpSession, msg: Buffer): void {
		session.upstream.send(msg, (err) => {
			if (err) {
				this.logger.debug(`Failed to forward datagram from ${session.key}: ${formatError(err)}`);
			} else {
				this.logger.debug(`Forwarded ${msg.length} bytes from ${session.key}`);
			}
		});
	}

	private openSession(key: string, client: RemoteInfo): UdpSession {
		const type: SocketType = isIPv6(this.targetHost) ? "udp6" : "udp4";
		const upstream = createSocket(type);
		const session: UdpSession = {
			key,
			client,
			upstream,
			upstreamPort: null,
			pending: [],
			lastActivity: this.now(),
			closed: false,
		};
		this.sessions.set(key, session);
		this.total++;

		// Connected, so the kernel only delivers datagrams sent by the target.
		upstream.connect(this.targetPort, this.targetHost, () => {
			if (session.closed) return;
			session.upstreamPort = upstream.address().port;
			const queued = session.pending ?? [];
			session.pending = null;
			for (const msg of queued) {
				this.sendUpstream(session, msg);
			}
		});

		upstream.on("message", (reply) => {
			const listener = this.listener;
			if (!listener || session.closed) return;
			listener.send(reply, client.port, client.address, (err) => {
				if (err) this.logger.debug(`Failed to return datagram to ${key}: ${formatError(err)}`);
			});
		});
		upstream.on("error", (err) => {
			this.logger.debug(`Upstream socket for ${key} failed: ${formatError(err)}`);
			this.closeSession(session, "error");
		});
		upstream.on("close", () => {
			this.removeSession(session);
		});

		this.logger.debug(`Opened UDP session for ${key}`);
		return session;
	}

	private closeSession(session: UdpSession, reason: string): void {
		if (session.closed) return;
		session.closed = true;
		this.removeSession(session);
		try {
			session.upstream.close();
		} catch (err) {
			this.logger.debug(`Upstream socket for ${session.key} already closed: ${formatError(err)}`);
		}
		this.logger.debug(`Closed UDP session for ${session.key} (${reason})`);
	}

	private removeSession(session: UdpSession): void {
		if (this.sessions.get(session.key) === session) {
			this.sessions.delete(session.key);
		}
	}
}
