import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { ZodError } from "zod";
import { normalizeMac } from "../wake/magic-packet.js";
import { ConfigError } from "../utils/errors.js";
import { WakeProxyConfigSchema } from "./schema.js";
import type { ResolvedConfig, ServiceDescriptor, WakeProxyConfig } from "./types.js";

export const CONFIG_NAMES = ["wakeproxy.config.json", ".wakeproxyrc.json", ".wakeproxyrc"];
export const CONFIG_ENV_VAR = "WAKEPROXY_CONFIG";

function hasPackageField(pkgPath: string): boolean {
	try {
		const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
		return typeof pkg === "object" && pkg !== null && "wakeproxy" in pkg;
	} catch {
		return false;
	}
}

export function findConfigFile(startDir: string): string | null {
	let dir = resolve(startDir);

	while (true) {
		for (const name of CONFIG_NAMES) {
			const configPath = resolve(dir, name);
			if (existsSync(configPath)) {
				return configPath;
			}
		}

		const pkgPath = resolve(dir, "package.json");
		if (existsSync(pkgPath) && hasPackageField(pkgPath)) {
			return pkgPath;
		}

		const parent = dirname(dir);
		if (parent === dir) return null;
		dir = parent;
	}
}

function readConfigFile(configPath: string): unknown {
	let content: string;
	try {
		content = readFileSync(configPath, "utf-8");
	} catch (err) {
		throw new ConfigError(`Cannot read config file ${configPath}: ${err instanceof Error ? err.message : err}`);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (err) {
		throw new ConfigError(`Config file ${configPath} is not valid JSON: ${err instanceof Error ? err.message : err}`);
	}

	if (configPath.endsWith("package.json")) {
		if (typeof parsed === "object" && parsed !== null && "wakeproxy" in parsed) {
			return parsed.wakeproxy;
		}
		throw new ConfigError(`No "wakeproxy" key in ${configPath}`);
	}
	return parsed;
}

function formatIssues(error: ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.join(".");
		return path ? `${path}: ${issue.message}` : issue.message;
	});
}

export function toServiceDescriptors(config: WakeProxyConfig): ServiceDescriptor[] {
	return Object.entries(config.services).map(([name, service]) =>
		Object.freeze({
			name,
			targetHost: service.targetHost,
			targetPort: service.targetPort,
			proxyPort: service.proxyPort,
			macAddress: normalizeMac(service.macAddress),
			protocol: service.protocol,
			wakeTimeoutMs: service.wakeTimeout * 1000,
			healthCheckIntervalMs: service.healthCheckInterval * 1000,
			connectionTimeoutMs: service.connectionTimeout * 1000,
			maxUdpSessions: service.maxUdpSessions,
			wakeAddress: service.wakeAddress,
			wakePort: service.wakePort,
		}),
	);
}

/** Validates raw config data. `source` only labels error messages. */
export function parseConfig(data: unknown, source = "<inline>"): ResolvedConfig {
	const result = WakeProxyConfigSchema.safeParse(data);
	if (!result.success) {
		throw new ConfigError(`Invalid wakeproxy config in ${source}`, formatIssues(result.error));
	}

	const config = result.data;
	return {
		configPath: source,
		logLevel: config.logLevel,
		shutdownTimeoutMs: config.shutdownTimeout * 1000,
		status: config.status,
		services: Object.freeze(toServiceDescriptors(config)),
	};
}

export interface LoadConfigOptions {
	configPath?: string;
	cwd?: string;
	env?: NodeJS.ProcessEnv;
}

export function resolveConfigPath(options: LoadConfigOptions = {}): string {
	const cwd = options.cwd ?? process.cwd();
	const env = options.env ?? process.env;

	const explicit = options.configPath ?? env[CONFIG_ENV_VAR];
	if (explicit) {
		const configPath = resolve(cwd, explicit);
		if (!existsSync(configPath)) {
			throw new ConfigError(`Config file not found: ${configPath}`);
		}
		return configPath;
	}

	const found = findConfigFile(cwd);
	if (!found) {
		throw new ConfigError(
			"No wakeproxy config found. Create wakeproxy.config.json or add 'wakeproxy' to package.json",
		);
	}
	return found;
}

export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
	const configPath = resolveConfigPath(options);
	return parseConfig(readConfigFile(configPath), configPath);
}

export function findService(
	services: readonly ServiceDescriptor[],
	nameOrPort: string | number,
): ServiceDescriptor | undefined {
	return services.find((s) => (typeof nameOrPort === "number" ? s.proxyPort === nameOrPort : s.name === nameOrPort));
}
