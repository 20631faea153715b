import type { Server } from "node:http";
import type { ResolvedConfig } from "../config/types.js";
import { startStatusServer, stopStatusServer } from "../status/server.js";
import { formatError, type Logger } from "../utils/logger.js";
import { ServiceSupervisor, type StartReport, type SupervisorOptions } from "./supervisor.js";

export interface RunningProxy {
	supervisor: ServiceSupervisor;
	report: StartReport;
	statusServer: Server | null;
	stop(): Promise<void>;
}

export interface RunOptions extends Omit<SupervisorOptions, "logger" | "shutdownTimeoutMs"> {
	logger: Logger;
}

export async function startProxy(config: ResolvedConfig, options: RunOptions): Promise<RunningProxy> {
	const { logger, ...supervisorOptions } = options;
	const supervisor = new ServiceSupervisor(config.services, {
		...supervisorOptions,
		logger,
		shutdownTimeoutMs: config.shutdownTimeoutMs,
	});

	const report = await supervisor.start();

	let statusServer: Server | null = null;
	if (config.status && report.started.length > 0) {
		try {
			const result = await startStatusServer({
				port: config.status.port,
				host: config.status.host,
				getStatus: () => supervisor.getStatus(),
				logger: logger.child("status"),
			});
			statusServer = result.server;
		} catch (err) {
			logger.error(`Status endpoint could not start: ${formatError(err)}`);
		}
	}

	let stopping: Promise<void> | null = null;
	const stop = () => {
		stopping ??= (async () => {
			if (statusServer) await stopStatusServer(statusServer);
			await supervisor.stop();
		})();
		return stopping;
	};

	return { supervisor, report, statusServer, stop };
}

/**
 * Runs the proxy in the foreground until SIGINT or SIGTERM. Resolves with the
 * process exit code.
 */
export async function runUntilSignal(config: ResolvedConfig, logger: Logger): Promise<number> {
	logger.info(`Loaded ${config.services.length} service(s) from ${config.configPath}`);
	const proxy = await startProxy(config, { logger });

	if (proxy.report.started.length === 0) {
		logger.error("No proxy service could be started");
		await proxy.stop();
		return 1;
	}
	for (const failure of proxy.report.failed) {
		logger.warn(`Service "${failure.name}" is not running (port ${failure.port})`);
	}

	logger.info("wakeproxy started");

	await new Promise<void>((resolve) => {
		const onSignal = (signal: NodeJS.Signals) => {
			logger.info(`Received ${signal}, shutting down`);
			process.removeListener("SIGINT", onSignal);
			process.removeListener("SIGTERM", onSignal);
			resolve();
		};
		process.on("SIGINT", onSignal);
		process.on("SIGTERM", onSignal);
	});

	await proxy.stop();
	logger.info("wakeproxy stopped");
	return 0;
}
