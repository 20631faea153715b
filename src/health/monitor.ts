import { setTimeout as sleep } from "node:timers/promises";
import type { Availability } from "../config/types.js";
import { formatAddress } from "../utils/net.js";
import { formatError, silentLogger, type Logger } from "../utils/logger.js";
import { probe as defaultProbe, type Prober } from "./checkers.js";

export interface HealthMonitorOptions {
	host: string;
	port: number;
	intervalMs: number;
	probeTimeoutMs: number;
	probe?: Prober;
	logger?: Logger;
	/** Called when the target moves between "up" and "down". */
	onChange?: (current: Availability, previous: Availability) => void;
}

/**
 * Periodically probes one target and records whether it is reachable. The
 * loop never blocks traffic; it only feeds status reporting.
 */
export class HealthMonitor {
	private availability: Availability = "unknown";
	private checkedAt: Date | null = null;
	private controller: AbortController | null = null;
	private loop: Promise<void> | null = null;
	private options: HealthMonitorOptions;
	private probe: Prober;
	private logger: Logger;

	constructor(options: HealthMonitorOptions) {
		this.options = options;
		this.probe = options.probe ?? defaultProbe;
		this.logger = options.logger ?? silentLogger;
	}

	get status(): Availability {
		return this.availability;
	}

	get lastCheckedAt(): Date | null {
		return this.checkedAt;
	}

	get running(): boolean {
		return this.loop !== null;
	}

	start(): void {
		if (this.loop) return;
		const controller = new AbortController();
		this.controller = controller;
		this.logger.info(`Starting health check for ${formatAddress(this.options.host, this.options.port)}`);
		this.loop = this.run(controller.signal);
	}

	async stop(): Promise<void> {
		const loop = this.loop;
		if (!loop) return;
		this.controller?.abort();
		await loop;
		this.loop = null;
		this.controller = null;
	}

	/** Probes once and records the result. */
	async check(): Promise<Availability> {
		const { host, port, probeTimeoutMs } = this.options;
		const reachable = await this.probe(host, port, probeTimeoutMs);
		const next: Availability = reachable ? "up" : "down";
		const previous = this.availability;

		this.availability = next;
		this.checkedAt = new Date();

		if (previous !== "unknown" && previous !== next) {
			this.logger.info(`Target ${formatAddress(host, port)} is now ${next === "up" ? "available" : "unavailable"}`);
			this.options.onChange?.(next, previous);
		}
		return next;
	}

	private async run(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			try {
				await this.check();
			} catch (err) {
				this.logger.error(
					`Error in health check for ${formatAddress(this.options.host, this.options.port)}: ${formatError(err)}`,
				);
			}

			try {
				await sleep(this.options.intervalMs, undefined, { signal });
			} catch {
				break;
			}
		}
		this.logger.debug(`Health check stopped for ${formatAddress(this.options.host, this.options.port)}`);
	}
}
