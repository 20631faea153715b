import { z } from "zod";
import { LOG_LEVELS } from "../utils/logger.js";

const MAC_PATTERN = /^[0-9a-fA-F]{2}([:-]?[0-9a-fA-F]{2}){5}$/;
const IPV4_PATTERN = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/;

const PortSchema = z.number().int().min(1).max(65535);

export const ServiceDefinitionSchema = z.object({
	targetHost: z.string().trim().min(1, "targetHost is required"),
	targetPort: PortSchema,
	proxyPort: PortSchema,
	macAddress: z.string().regex(MAC_PATTERN, "Invalid MAC address format"),
	protocol: z.enum(["tcp", "udp"]).default("tcp"),
	/** Seconds */
	wakeTimeout: z.number().int().min(30).max(300).default(60),
	/** Seconds */
	healthCheckInterval: z.number().int().min(5).max(60).default(10),
	/** Seconds */
	connectionTimeout: z.number().int().positive().default(5),
	maxUdpSessions: z.number().int().positive().default(100),
	wakeAddress: z.string().regex(IPV4_PATTERN, "wakeAddress must be an IPv4 address").default("255.255.255.255"),
	wakePort: PortSchema.default(9),
});

const StatusServerSchema = z.object({
	port: PortSchema,
	host: z.string().min(1).default("127.0.0.1"),
});

export const WakeProxyConfigSchema = z
	.object({
		version: z.literal(1),
		logLevel: z.enum(LOG_LEVELS).default("info"),
		/** Seconds */
		shutdownTimeout: z.number().int().min(1).max(300).default(10),
		status: StatusServerSchema.optional(),
		services: z
			.record(z.string().min(1), ServiceDefinitionSchema)
			.refine((services) => Object.keys(services).length > 0, {
				message: "At least one service must be configured",
			}),
	})
	.superRefine((config, ctx) => {
		const owners = new Map<number, string>();
		if (config.status) owners.set(config.status.port, "status server");

		for (const [name, service] of Object.entries(config.services)) {
			const owner = owners.get(service.proxyPort);
			if (owner) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["services", name, "proxyPort"],
					message: `proxyPort ${service.proxyPort} is already used by ${owner}`,
				});
				continue;
			}
			owners.set(service.proxyPort, `service "${name}"`);
		}
	});
