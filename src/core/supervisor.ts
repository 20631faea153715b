import { findService } from "../config/loader.js";
import type { Availability, ServiceDescriptor, ServiceStatus } from "../config/types.js";
import { probe as defaultProbe, type Prober } from "../health/checkers.js";
import { HealthMonitor } from "../health/monitor.js";
import { createRelay } from "../relay/index.js";
import type { ProxyRelay } from "../relay/types.js";
import { WakeCoordinator } from "../wake/coordinator.js";
import { ListenerBindError } from "../utils/errors.js";
import { formatAddress } from "../utils/net.js";
import { formatError, silentLogger, type Logger } from "../utils/logger.js";

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10_000;

interface ServiceRuntime {
	service: ServiceDescriptor;
	relay: ProxyRelay;
	monitor: HealthMonitor;
	startedAt: Date;
}

export interface StartFailure {
	name: string;
	port: number;
	error: ListenerBindError;
}

export interface StartReport {
	started: string[];
	failed: StartFailure[];
}

export interface SupervisorOptions {
	logger?: Logger;
	probe?: Prober;
	wakeCoordinator?: WakeCoordinator;
	/** Address every proxy listener binds to. */
	bindHost?: string;
	shutdownTimeoutMs?: number;
	onStatusChange?: (service: ServiceDescriptor, current: Availability, previous: Availability) => void;
}

/**
 * Owns every configured service: opens its listener, runs its health loop,
 * and gates TCP connections on the target being awake.
 */
export class ServiceSupervisor {
	private runtimes = new Map<string, ServiceRuntime>();
	private services: readonly ServiceDescriptor[];
	private logger: Logger;
	private probe: Prober;
	private wake: WakeCoordinator;
	private bindHost: string;
	private shutdownTimeoutMs: number;
	private onStatusChange: SupervisorOptions["onStatusChange"];
	private stopping: Promise<void> | null = null;
	private shuttingDown = false;

	constructor(services: readonly ServiceDescriptor[], options: SupervisorOptions = {}) {
		this.services = services;
		this.logger = options.logger ?? silentLogger;
		this.probe = options.probe ?? defaultProbe;
		this.wake =
			options.wakeCoordinator ?? new WakeCoordinator({ probe: this.probe, logger: this.logger.child("wake") });
		this.bindHost = options.bindHost ?? "0.0.0.0";
		this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
		this.onStatusChange = options.onStatusChange;
	}

	async start(): Promise<StartReport> {
		this.stopping = null;
		this.shuttingDown = false;
		const report: StartReport = { started: [], failed: [] };
		this.logger.info("Starting proxy services");

		for (const service of this.services) {
			if (this.runtimes.has(service.name)) continue;
			try {
				await this.startService(service);
				report.started.push(service.name);
			} catch (err) {
				const error = err instanceof ListenerBindError ? err : new ListenerBindError(service.name, service.proxyPort, err);
				this.logger.error(error.message);
				report.failed.push({ name: service.name, port: service.proxyPort, error });
			}
		}

		this.logger.info(`Started ${report.started.length} of ${this.services.length} proxy services`);
		return report;
	}

	/** Resolves once every service is stopped. Repeated calls share the same shutdown. */
	stop(): Promise<void> {
		if (!this.stopping) {
			this.stopping = this.shutdown();
		}
		return this.stopping;
	}

	/**
	 * Makes sure the service's target accepts connections, waking it if needed.
	 * Resolves false when the target could not be woken.
	 */
	async ensureAvailable(service: ServiceDescriptor): Promise<boolean> {
		if (this.shuttingDown) return false;
		if (await this.probe(service.targetHost, service.targetPort, service.connectionTimeoutMs)) {
			return true;
		}
		if (this.shuttingDown) return false;

		this.logger.info(`Target ${formatAddress(service.targetHost, service.targetPort)} is not available, attempting wake`);
		return this.wake.ensureAwake(service.macAddress, service.targetHost, service.targetPort, service.wakeTimeoutMs, {
			address: service.wakeAddress,
			port: service.wakePort,
		});
	}

	getService(nameOrPort: string | number): ServiceDescriptor | undefined {
		return findService(this.services, nameOrPort);
	}

	getRelay(name: string): ProxyRelay | undefined {
		return this.runtimes.get(name)?.relay;
	}

	getStatus(): ServiceStatus[] {
		return [...this.runtimes.values()].map(({ service, relay, monitor, startedAt }) => ({
			name: service.name,
			protocol: service.protocol,
			proxyPort: relay.port() ?? service.proxyPort,
			target: formatAddress(service.targetHost, service.targetPort),
			availability: monitor.status,
			lastCheckedAt: monitor.lastCheckedAt?.toISOString() ?? null,
			startedAt: startedAt.toISOString(),
			activeConnections: relay.stats().active,
		}));
	}

	private async startService(service: ServiceDescriptor): Promise<void> {
		const logger = this.logger.child(service.name);
		logger.info(
			`Starting ${service.protocol.toUpperCase()} proxy on port ${service.proxyPort} -> ${formatAddress(service.targetHost, service.targetPort)}`,
		);

		const relay = createRelay(service, {
			gate: () => this.ensureAvailable(service),
			logger,
		});

		try {
			await relay.start(service.proxyPort, this.bindHost);
		} catch (err) {
			throw new ListenerBindError(service.name, service.proxyPort, err);
		}

		const monitor = new HealthMonitor({
			host: service.targetHost,
			port: service.targetPort,
			intervalMs: service.healthCheckIntervalMs,
			probeTimeoutMs: service.connectionTimeoutMs,
			probe: this.probe,
			logger,
			onChange: (current, previous) => this.onStatusChange?.(service, current, previous),
		});
		monitor.start();

		this.runtimes.set(service.name, { service, relay, monitor, startedAt: new Date() });
	}

	private async shutdown(): Promise<void> {
		if (this.runtimes.size === 0) return;
		this.shuttingDown = true;
		this.logger.info("Stopping proxy services");
		const runtimes = [...this.runtimes.values()];

		// Gated connections waiting on a wake resolve false, so the relays can drain.
		await this.withinDeadline(
			Promise.allSettled([...runtimes.map(({ monitor }) => monitor.stop()), this.wake.cancelAll()]),
			"health checks and wake attempts",
		);

		const results = await Promise.allSettled(
			runtimes.map(async ({ service, relay }) => {
				await relay.stop(this.shutdownTimeoutMs);
				this.logger.info(`Stopped ${service.protocol.toUpperCase()} proxy on port ${service.proxyPort}`);
			}),
		);
		results.forEach((result, i) => {
			if (result.status === "rejected") {
				this.logger.error(`Failed to stop service ${runtimes[i].service.name}: ${formatError(result.reason)}`);
			}
		});

		// A gate that was mid-probe during the first cancel may have started an attempt since.
		await this.withinDeadline(this.wake.cancelAll(), "wake attempts");
		this.runtimes.clear();
	}

	private async withinDeadline(work: Promise<unknown>, what: string): Promise<void> {
		let timer: NodeJS.Timeout | undefined;
		const deadline = new Promise<"timeout">((resolve) => {
			timer = setTimeout(() => resolve("timeout"), this.shutdownTimeoutMs);
		});
		const outcome = await Promise.race([work.then(() => "done" as const), deadline]);
		clearTimeout(timer);

		if (outcome === "timeout") {
			this.logger.warn(`Stopped waiting for ${what} after ${this.shutdownTimeoutMs}ms`);
		}
	}
}
