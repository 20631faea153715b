export class ConfigError extends Error {
	issues: string[];
	constructor(message: string, issues: string[] = []) {
		super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join("\n")}` : message);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

export class ListenerBindError extends Error {
	serviceName: string;
	port: number;
	constructor(serviceName: string, port: number, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`Service "${serviceName}" could not listen on port ${port}: ${reason}`, { cause });
		this.name = "ListenerBindError";
		this.serviceName = serviceName;
		this.port = port;
	}
}
