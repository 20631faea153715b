export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

export interface Logger {
	readonly level: LogLevel;
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	child(scope: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
	const threshold = LEVEL_RANK[level];

	const write = (messageLevel: Exclude<LogLevel, "silent">, message: string) => {
		if (LEVEL_RANK[messageLevel] < threshold) return;
		const line = `${new Date().toISOString()} ${messageLevel.toUpperCase().padEnd(5)} [${scope}] ${message}`;
		if (messageLevel === "error") {
			console.error(line);
		} else if (messageLevel === "warn") {
			console.warn(line);
		} else {
			console.log(line);
		}
	};

	return {
		level,
		debug: (message) => write("debug", message),
		info: (message) => write("info", message),
		warn: (message) => write("warn", message),
		error: (message) => write("error", message),
		child: (childScope) => createLogger(`${scope}:${childScope}`, level),
	};
}

export const silentLogger: Logger = createLogger("silent", "silent");

/** Single-line rendering of an unknown error, with the errno code when there is one. */
export function formatError(err: unknown): string {
	if (err instanceof Error) {
		const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
		const message = err.message.replace(/\s+/g, " ").trim() || err.name;
		return code && !message.includes(code) ? `${message} (${code})` : message;
	}
	return String(err);
}
