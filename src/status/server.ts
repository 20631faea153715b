import { createServer, type Server, type ServerResponse } from "node:http";
import type { ServiceStatus } from "../config/types.js";
import { formatError, silentLogger, type Logger } from "../utils/logger.js";

export interface StatusServerOptions {
	getStatus: () => ServiceStatus[];
	logger?: Logger;
}

export interface StatusServerResult {
	server: Server;
	port: number;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
	res.writeHead(status, {
		"Content-Type": "application/json",
		"Cache-Control": "no-cache",
	});
	res.end(JSON.stringify(body));
}

export function createStatusServer(options: StatusServerOptions): Server {
	const { getStatus, logger = silentLogger } = options;

	return createServer((req, res) => {
		if (req.method !== "GET") {
			sendJson(res, 405, { error: "Method not allowed" });
			return;
		}

		const path = (req.url ?? "/").split("?")[0];
		if (path === "/healthz") {
			sendJson(res, 200, { ok: true });
			return;
		}

		if (path === "/api/status") {
			try {
				sendJson(res, 200, { services: getStatus() });
			} catch (err) {
				logger.error(`Failed to collect status: ${formatError(err)}`);
				sendJson(res, 500, { error: "Failed to fetch status" });
			}
			return;
		}

		sendJson(res, 404, { error: "Not found" });
	});
}

export function startStatusServer(
	options: StatusServerOptions & { port: number; host?: string },
): Promise<StatusServerResult> {
	const server = createStatusServer(options);
	const host = options.host ?? "127.0.0.1";

	return new Promise((resolve, reject) => {
		const onError = (err: Error) => {
			server.removeListener("listening", onListening);
			reject(err);
		};
		const onListening = () => {
			server.removeListener("error", onError);
			const address = server.address();
			const port = address && typeof address === "object" ? address.port : options.port;
			options.logger?.info(`Status endpoint on http://${host}:${port}/api/status`);
			resolve({ server, port });
		};
		server.once("error", onError);
		server.once("listening", onListening);
		server.listen(options.port, host);
	});
}

export function stopStatusServer(server: Server): Promise<void> {
	return new Promise((resolve) => {
		server.close(() => resolve());
		server.closeAllConnections();
	});
}
