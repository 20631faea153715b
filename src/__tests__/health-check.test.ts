import { describe, it, expect, afterEach } from "vitest";
import { createServer, type Server, type Socket } from "node:net";
import { probe } from "../health/checkers.js";
import { HealthMonitor } from "../health/monitor.js";
import type { Availability } from "../config/types.js";

let servers: Server[] = [];

function listen(server: Server, port: number, host: string): Promise<void> {
	return new Promise((resolve) => {
		server.listen(port, host, () => resolve());
	});
}

function closeAll(): Promise<void> {
	return Promise.all(
		servers.map(
			(s) => new Promise<void>((resolve) => s.close(() => resolve())),
		),
	).then(() => {
		servers = [];
	});
}

async function freePort(): Promise<number> {
	const server = createServer();
	await listen(server, 0, "127.0.0.1");
	const { port } = server.address() as { port: number };
	await new Promise<void>((resolve) => server.close(() => resolve()));
	return port;
}

afterEach(() => closeAll());

describe("probe", () => {
	it("reports a listening target as reachable", async () => {
		const server = createServer();
		servers.push(server);
		await listen(server, 0, "127.0.0.1");
		const port = (server.address() as { port: number }).port;

		expect(await probe("127.0.0.1", port, 1000)).toBe(true);
	});

	it("closes the probe connection right after connecting", async () => {
		const closed = new Promise<void>((resolve) => {
			const server = createServer((socket: Socket) => {
				socket.on("error", () => {});
				socket.on("close", () => resolve());
			});
			servers.push(server);
		});
		await listen(servers[0], 0, "127.0.0.1");
		const port = (servers[0].address() as { port: number }).port;

		expect(await probe("127.0.0.1", port, 1000)).toBe(true);
		await closed;
	});

	it("reports a refused connection as unreachable", async () => {
		const port = await freePort();
		expect(await probe("127.0.0.1", port, 1000)).toBe(false);
	});

	it("reports an unresolvable host as unreachable instead of throwing", async () => {
		expect(await probe("does-not-exist.invalid", 80, 1000)).toBe(false);
	});
});

describe("HealthMonitor", () => {
	it("starts unknown and records the first result without reporting a change", async () => {
		const changes: Array<[Availability, Availability]> = [];
		const monitor = new HealthMonitor({
			host: "10.0.0.5",
			port: 22,
			intervalMs: 1000,
			probeTimeoutMs: 100,
			probe: async () => true,
			onChange: (current, previous) => changes.push([current, previous]),
		});

		expect(monitor.status).toBe("unknown");
		expect(await monitor.check()).toBe("up");
		expect(monitor.status).toBe("up");
		expect(monitor.lastCheckedAt).toBeInstanceOf(Date);
		expect(changes).toEqual([]);
	});

	it("reports transitions between known states only", async () => {
		const results = [true, true, false, false, true];
		const changes: Array<[Availability, Availability]> = [];
		const monitor = new HealthMonitor({
			host: "10.0.0.5",
			port: 22,
			intervalMs: 1000,
			probeTimeoutMs: 100,
			probe: async () => results.shift() ?? false,
			onChange: (current, previous) => changes.push([current, previous]),
		});

		for (let i = 0; i < 5; i++) await monitor.check();

		expect(changes).toEqual([
			["down", "up"],
			["up", "down"],
		]);
	});

	it("keeps looping after a probe throws", async () => {
		let calls = 0;
		const monitor = new HealthMonitor({
			host: "10.0.0.5",
			port: 22,
			intervalMs: 5,
			probeTimeoutMs: 100,
			probe: async () => {
				calls++;
				if (calls === 1) throw new Error("boom");
				return true;
			},
		});

		monitor.start();
		await expect.poll(() => monitor.status).toBe("up");
		await monitor.stop();
		expect(calls).toBeGreaterThanOrEqual(2);
	});

	it("stops promptly while sleeping", async () => {
		const monitor = new HealthMonitor({
			host: "10.0.0.5",
			port: 22,
			intervalMs: 60_000,
			probeTimeoutMs: 100,
			probe: async () => false,
		});

		monitor.start();
		await expect.poll(() => monitor.status).toBe("down");

		const startedAt = Date.now();
		await monitor.stop();
		expect(Date.now() - startedAt).toBeLessThan(1000);
		expect(monitor.running).toBe(false);
	});

	it("treats stop on an idle monitor as a no-op", async () => {
		const monitor = new HealthMonitor({ host: "10.0.0.5", port: 22, intervalMs: 10, probeTimeoutMs: 10 });
		await monitor.stop();
		await monitor.stop();
		expect(monitor.running).toBe(false);
	});
});
