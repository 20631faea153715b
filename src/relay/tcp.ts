import { createServer, type Server, type Socket } from "node:net";
import { connectWithTimeout, formatAddress } from "../utils/net.js";
import { formatError, silentLogger, type Logger } from "../utils/logger.js";
import type { ProxyRelay, RelayStats } from "./types.js";

export interface TcpRelayResult {
	connected: boolean;
	bytesToTarget: number;
	bytesToClient: number;
}

function describePeer(socket: Socket): string {
	return socket.remoteAddress ? formatAddress(socket.remoteAddress, socket.remotePort ?? 0) : "unknown";
}

/** Largest write handed to either socket; also its buffering bound. */
export const RELAY_CHUNK_SIZE = 8 * 1024;

/**
 * Copies `source` into `sink` in slices of at most RELAY_CHUNK_SIZE. The
 * source stays paused until the sink has flushed the previous slice, so each
 * direction holds at most one chunk in flight.
 */
function forward(source: Socket, sink: Socket, onBytes: (count: number) => void): void {
	source.on("data", (chunk: Buffer) => {
		onBytes(chunk.length);
		source.pause();

		const writeFrom = (offset: number) => {
			const slice = chunk.subarray(offset, offset + RELAY_CHUNK_SIZE);
			const next = offset + slice.length;
			sink.write(slice, (err) => {
				if (err) return;
				if (next < chunk.length) {
					writeFrom(next);
				} else {
					source.resume();
				}
			});
		};
		writeFrom(0);
	});
	// Paused streams do not emit "end", so this only runs after the last slice is written.
	source.once("end", () => sink.end());
}

/**
 * Pumps bytes between two connected sockets until both are closed. End of
 * stream on one side half-closes the other; an error on either side destroys
 * both.
 */
export function pipeSockets(
	client: Socket,
	target: Socket,
	logger: Logger = silentLogger,
): Promise<Omit<TcpRelayResult, "connected">> {
	let bytesToTarget = 0;
	let bytesToClient = 0;

	return new Promise((resolve) => {
		let open = 2;
		// A side closing without having read to end-of-stream was aborted, so the other side goes too.
		const onClose = (closed: Socket, other: Socket) => () => {
			if (!closed.readableEnded) other.destroy();
			open--;
			if (open === 0) resolve({ bytesToTarget, bytesToClient });
		};

		const teardown = (side: string) => (err: Error) => {
			logger.debug(`Relay ${side} error: ${formatError(err)}`);
			client.destroy();
			target.destroy();
		};

		client.once("close", onClose(client, target));
		target.once("close", onClose(target, client));
		client.on("error", teardown("client"));
		target.on("error", teardown("target"));

		forward(client, target, (n) => {
			bytesToTarget += n;
		});
		forward(target, client, (n) => {
			bytesToClient += n;
		});

		// A side that is already gone must not leave the other one hanging.
		if (client.destroyed) target.destroy();
		if (target.destroyed) client.destroy();
	});
}

/**
 * Connects to the target and relays the client connection through it. If the
 * target cannot be reached the client is closed without forwarding anything.
 */
export async function relayTcp(
	client: Socket,
	targetHost: string,
	targetPort: number,
	connectTimeoutMs: number,
	logger: Logger = silentLogger,
): Promise<TcpRelayResult> {
	let target: Socket;
	try {
		target = await connectWithTimeout(targetHost, targetPort, connectTimeoutMs, { allowHalfOpen: true });
	} catch (err) {
		logger.warn(`Cannot reach ${formatAddress(targetHost, targetPort)}: ${formatError(err)}`);
		client.destroy();
		return { connected: false, bytesToTarget: 0, bytesToClient: 0 };
	}

	if (client.destroyed) {
		target.destroy();
		return { connected: true, bytesToTarget: 0, bytesToClient: 0 };
	}

	target.setNoDelay(true);
	const counts = await pipeSockets(client, target, logger);
	return { connected: true, ...counts };
}

/** Decides whether an accepted connection may be relayed. */
export type ConnectionGate = (client: Socket) => Promise<boolean>;

export interface TcpProxyOptions {
	targetHost: string;
	targetPort: number;
	connectTimeoutMs: number;
	gate?: ConnectionGate;
	logger?: Logger;
}

export class TcpProxy implements ProxyRelay {
	readonly protocol = "tcp" as const;
	private server: Server | null = null;
	private connections = new Map<Socket, Promise<void>>();
	private total = 0;
	private stopping: Promise<void> | null = null;
	private options: TcpProxyOptions;
	private logger: Logger;

	constructor(options: TcpProxyOptions) {
		this.options = options;
		this.logger = options.logger ?? silentLogger;
	}

	start(port: number, host = "0.0.0.0"): Promise<void> {
		if (this.server) return Promise.reject(new Error("TCP proxy already started"));

		const server = createServer({ allowHalfOpen: true, highWaterMark: RELAY_CHUNK_SIZE }, (client) => {
			this.accept(client);
		});

		return new Promise((resolve, reject) => {
			const onError = (err: Error) => {
				server.removeListener("listening", onListening);
				reject(err);
			};
			const onListening = () => {
				server.removeListener("error", onError);
				server.on("error", (err) => this.logger.error(`Listener error: ${formatError(err)}`));
				this.server = server;
				this.stopping = null;
				this.logger.info(
					`TCP proxy listening on ${formatAddress(host, this.port() ?? port)} -> ${formatAddress(this.options.targetHost, this.options.targetPort)}`,
				);
				resolve();
			};
			server.once("error", onError);
			server.once("listening", onListening);
			server.listen(port, host);
		});
	}

	port(): number | null {
		const address = this.server?.address();
		return address && typeof address === "object" ? address.port : null;
	}

	stats(): RelayStats {
		return { active: this.connections.size, total: this.total };
	}

	stop(deadlineMs = 10_000): Promise<void> {
		if (!this.stopping) {
			this.stopping = this.shutdown(deadlineMs);
		}
		return this.stopping;
	}

	private async shutdown(deadlineMs: number): Promise<void> {
		const server = this.server;
		if (!server) return;

		const closed = new Promise<void>((resolve) => server.close(() => resolve()));

		if (this.connections.size > 0) {
			this.logger.debug(`Waiting for ${this.connections.size} connection(s) to drain`);
			let timer: NodeJS.Timeout | undefined;
			const deadline = new Promise<"timeout">((resolve) => {
				timer = setTimeout(() => resolve("timeout"), deadlineMs);
			});
			const outcome = await Promise.race([Promise.all(this.connections.values()), deadline]);
			clearTimeout(timer);

			if (outcome === "timeout") {
				this.logger.warn(`Force-closing ${this.connections.size} connection(s) after ${deadlineMs}ms`);
				for (const socket of this.connections.keys()) {
					socket.destroy();
				}
			}
		}

		await closed;
		this.server = null;
		this.logger.info("TCP proxy stopped");
	}

	private accept(client: Socket): void {
		this.total++;
		const peer = describePeer(client);
		this.logger.info(`New connection from ${peer}`);

		// Errors before the relay takes over (e.g. a reset during gating) must not crash the process.
		const onEarlyError = (err: Error) => this.logger.debug(`Client ${peer} error: ${formatError(err)}`);
		client.on("error", onEarlyError);

		const handled = this.handle(client, peer)
			.catch((err: unknown) => {
				this.logger.error(`Error handling connection from ${peer}: ${formatError(err)}`);
				client.destroy();
			})
			.finally(() => {
				this.connections.delete(client);
			});
		this.connections.set(client, handled);
	}

	private async handle(client: Socket, peer: string): Promise<void> {
		const { targetHost, targetPort, connectTimeoutMs, gate } = this.options;

		if (gate && !(await gate(client))) {
			this.logger.warn(`Target ${formatAddress(targetHost, targetPort)} is not available, closing ${peer}`);
			client.destroy();
			return;
		}

		if (client.destroyed) return;

		const result = await relayTcp(client, targetHost, targetPort, connectTimeoutMs, this.logger);
		if (result.connected) {
			this.logger.debug(
				`Closed connection from ${peer} (${result.bytesToTarget} bytes in, ${result.bytesToClient} bytes out)`,
			);
		}
	}
}
