import { createConnection, type Socket } from "node:net";

export class ConnectTimeoutError extends Error {
	code = "ETIMEDOUT";
	constructor(host: string, port: number, timeoutMs: number) {
		super(`Connect to ${host}:${port} timed out after ${timeoutMs}ms`);
		this.name = "ConnectTimeoutError";
	}
}

export interface ConnectOptions {
	allowHalfOpen?: boolean;
}

/**
 * Opens a TCP connection, failing after `timeoutMs`. The socket is destroyed on
 * every failure path, so callers never own a half-open attempt.
 */
export function connectWithTimeout(
	host: string,
	port: number,
	timeoutMs: number,
	options: ConnectOptions = {},
): Promise<Socket> {
	return new Promise((resolve, reject) => {
		const socket = createConnection({ host, port, allowHalfOpen: options.allowHalfOpen ?? false });

		const cleanup = () => {
			clearTimeout(timer);
			socket.removeListener("connect", onConnect);
			socket.removeListener("error", onError);
		};
		const onConnect = () => {
			cleanup();
			resolve(socket);
		};
		const onError = (err: Error) => {
			cleanup();
			socket.destroy();
			reject(err);
		};
		const timer = setTimeout(() => {
			onError(new ConnectTimeoutError(host, port, timeoutMs));
		}, timeoutMs);

		socket.once("connect", onConnect);
		socket.once("error", onError);
	});
}

export function formatAddress(host: string, port: number): string {
	return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}
