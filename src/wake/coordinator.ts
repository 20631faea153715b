import { setTimeout as sleep } from "node:timers/promises";
import { probe as defaultProbe, DEFAULT_PROBE_TIMEOUT_MS, type Prober } from "../health/checkers.js";
import { formatAddress } from "../utils/net.js";
import { formatError, silentLogger, type Logger } from "../utils/logger.js";
import { sendMagicPacket, type WakeDelivery, type WakeSender } from "./magic-packet.js";

export const DEFAULT_WAKE_POLL_INTERVAL_MS = 2000;

export interface WakeCoordinatorOptions {
	probe?: Prober;
	sendWake?: WakeSender;
	/** Time between availability probes while waiting for a target to boot. */
	pollIntervalMs?: number;
	probeTimeoutMs?: number;
	logger?: Logger;
}

interface WakeAttempt {
	outcome: Promise<boolean>;
	controller: AbortController;
}

/**
 * Wakes targets and waits for them to accept connections. At most one wake
 * sequence runs per `host:port`; callers that arrive while one is in flight
 * share its outcome instead of sending another packet.
 */
export class WakeCoordinator {
	private attempts = new Map<string, WakeAttempt>();
	private probe: Prober;
	private sendWake: WakeSender;
	private pollIntervalMs: number;
	private probeTimeoutMs: number;
	private logger: Logger;

	constructor(options: WakeCoordinatorOptions = {}) {
		this.probe = options.probe ?? defaultProbe;
		this.sendWake = options.sendWake ?? sendMagicPacket;
		this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_WAKE_POLL_INTERVAL_MS;
		this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
		this.logger = options.logger ?? silentLogger;
	}

	isWaking(host: string, port: number): boolean {
		return this.attempts.has(formatAddress(host, port));
	}

	activeAttempts(): string[] {
		return [...this.attempts.keys()];
	}

	async ensureAwake(
		mac: string,
		host: string,
		port: number,
		timeoutMs: number,
		delivery?: WakeDelivery,
	): Promise<boolean> {
		const key = formatAddress(host, port);

		const inFlight = this.attempts.get(key);
		if (inFlight) {
			this.logger.info(`Already waking ${key}, waiting for the same attempt`);
			return inFlight.outcome;
		}

		if (await this.probe(host, port, this.probeTimeoutMs)) {
			this.logger.debug(`${key} is already awake`);
			return true;
		}

		// Another caller may have registered an attempt while we were probing.
		const joined = this.attempts.get(key);
		if (joined) return joined.outcome;

		const controller = new AbortController();
		const outcome = this.runAttempt(key, mac, host, port, timeoutMs, delivery, controller.signal).finally(() => {
			this.attempts.delete(key);
		});
		this.attempts.set(key, { outcome, controller });
		return outcome;
	}

	/**
	 * Aborts every running attempt. Their callers receive `false`. Resolves once
	 * all of them have settled, after which no further probes are issued.
	 */
	async cancelAll(): Promise<void> {
		const running = [...this.attempts.values()];
		if (running.length === 0) return;

		this.logger.info(`Cancelling ${running.length} wake attempt(s)`);
		for (const attempt of running) {
			attempt.controller.abort();
		}
		await Promise.allSettled(running.map((attempt) => attempt.outcome));
	}

	private async runAttempt(
		key: string,
		mac: string,
		host: string,
		port: number,
		timeoutMs: number,
		delivery: WakeDelivery | undefined,
		signal: AbortSignal,
	): Promise<boolean> {
		try {
			this.logger.info(`Sending wake packet to ${mac} for ${key}`);
			await this.sendWake(mac, delivery);
		} catch (err) {
			this.logger.error(`Failed to send wake packet to ${mac}: ${formatError(err)}`);
			return false;
		}

		this.logger.info(`Waiting for ${key} to become available (timeout: ${Math.round(timeoutMs / 1000)}s)`);
		try {
			const awake = await this.waitForTarget(host, port, timeoutMs, signal);
			if (signal.aborted) {
				this.logger.info(`Wake attempt for ${key} cancelled`);
			} else if (awake) {
				this.logger.info(`${key} is awake`);
			} else {
				this.logger.warn(`${key} did not wake within ${Math.round(timeoutMs / 1000)}s`);
			}
			return awake;
		} catch (err) {
			this.logger.error(`Error while waiting for ${key}: ${formatError(err)}`);
			return false;
		}
	}

	private async waitForTarget(host: string, port: number, timeoutMs: number, signal: AbortSignal): Promise<boolean> {
		const deadline = Date.now() + timeoutMs;

		while (!signal.aborted) {
			const remaining = deadline - Date.now();
			if (remaining <= 0) return false;

			const reachable = await this.probe(host, port, Math.min(this.probeTimeoutMs, remaining));
			if (signal.aborted) return false;
			if (reachable) return true;

			const left = deadline - Date.now();
			if (left <= 0) return false;
			try {
				await sleep(Math.min(this.pollIntervalMs, left), undefined, { signal });
			} catch (err) {
				if (signal.aborted) return false;
				throw err;
			}
		}
		return false;
	}
}
