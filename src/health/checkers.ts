import { connectWithTimeout } from "../utils/net.js";

export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

/** Reports whether `host:port` accepts a TCP connection. Never rejects. */
export type Prober = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export const probe: Prober = async (host, port, timeoutMs = DEFAULT_PROBE_TIMEOUT_MS) => {
	try {
		const socket = await connectWithTimeout(host, port, timeoutMs);
		socket.destroy();
		return true;
	} catch {
		return false;
	}
};
