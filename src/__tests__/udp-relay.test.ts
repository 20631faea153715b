import { describe, it, expect, afterEach } from "vitest";
import { createSocket, type Socket } from "node:dgram";
import { UdpRelay, DEFAULT_SESSION_IDLE_MS } from "../relay/udp.js";

let sockets: Socket[] = [];
let relays: UdpRelay[] = [];

async function bindSocket(): Promise<Socket> {
	const socket = createSocket("udp4");
	sockets.push(socket);
	await new Promise<void>((resolve) => socket.bind(0, "127.0.0.1", () => resolve()));
	return socket;
}

async function echoTarget(): Promise<number> {
	const target = await bindSocket();
	target.on("message", (msg, rinfo) => {
		target.send(Buffer.concat([Buffer.from("echo:"), msg]), rinfo.port, rinfo.address);
	});
	return target.address().port;
}

async function startRelay(relay: UdpRelay): Promise<number> {
	relays.push(relay);
	await relay.start(0, "127.0.0.1");
	const port = relay.port();
	if (port === null) throw new Error("relay did not bind");
	return port;
}

/** Sends one datagram and resolves with the first reply, or null if none arrives in time. */
function request(client: Socket, port: number, payload: string, waitMs = 500): Promise<string | null> {
	return new Promise((resolve) => {
		const onMessage = (msg: Buffer) => {
			clearTimeout(timer);
			resolve(msg.toString());
		};
		const timer = setTimeout(() => {
			client.removeListener("message", onMessage);
			resolve(null);
		}, waitMs);
		client.once("message", onMessage);
		client.send(payload, port, "127.0.0.1");
	});
}

/** Whether a fresh socket can take `port`, i.e. nothing else holds it. */
function canBind(port: number): Promise<boolean> {
	return new Promise((resolve) => {
		const socket = createSocket("udp4");
		socket.once("error", () => {
			try {
				socket.close();
			} catch {
				// never bound
			}
			resolve(false);
		});
		socket.bind(port, () => {
			socket.close();
			resolve(true);
		});
	});
}

function upstreamPortOf(relay: UdpRelay): number {
	const [session] = relay.listSessions();
	if (!session || session.upstreamPort === null) throw new Error("no connected session");
	return session.upstreamPort;
}

afterEach(async () => {
	await Promise.all(relays.map((r) => r.stop()));
	for (const s of sockets) s.close();
	relays = [];
	sockets = [];
});

describe("UdpRelay", () => {
	it("forwards datagrams to the target and routes replies back to the sender", async () => {
		const targetPort = await echoTarget();
		const relay = new UdpRelay({ targetHost: "127.0.0.1", targetPort });
		const relayPort = await startRelay(relay);

		const alice = await bindSocket();
		const bob = await bindSocket();

		expect(await request(alice, relayPort, "from alice")).toBe("echo:from alice");
		expect(await request(bob, relayPort, "from bob")).toBe("echo:from bob");
		expect(await request(alice, relayPort, "again")).toBe("echo:again");

		expect(relay.hasSession("127.0.0.1", alice.address().port)).toBe(true);
		expect(relay.hasSession("127.0.0.1", bob.address().port)).toBe(true);
		expect(relay.stats()).toEqual({ active: 2, total: 2 });
	});

	it("drops packets from new clients once the session table is full", async () => {
		const targetPort = await echoTarget();
		const relay = new UdpRelay({ targetHost: "127.0.0.1", targetPort, maxSessions: 2 });
		const relayPort = await startRelay(relay);

		const first = await bindSocket();
		const second = await bindSocket();
		const third = await bindSocket();

		expect(await request(first, relayPort, "1")).toBe("echo:1");
		expect(await request(second, relayPort, "2")).toBe("echo:2");
		expect(await request(third, relayPort, "3", 150)).toBeNull();

		expect(relay.hasSession("127.0.0.1", third.address().port)).toBe(false);
		expect(relay.stats().active).toBe(2);

		// Existing sessions keep working while the table is full.
		expect(await request(first, relayPort, "still here")).toBe("echo:still here");
	});

	it("evicts sessions idle past the threshold and frees their slot", async () => {
		let clock = 0;
		const targetPort = await echoTarget();
		const relay = new UdpRelay({ targetHost: "127.0.0.1", targetPort, maxSessions: 1, now: () => clock });
		const relayPort = await startRelay(relay);

		const first = await bindSocket();
		const second = await bindSocket();
		expect(await request(first, relayPort, "hi")).toBe("echo:hi");

		clock = DEFAULT_SESSION_IDLE_MS;
		expect(relay.sweep()).toBe(0);

		clock = DEFAULT_SESSION_IDLE_MS + 1;
		expect(relay.sweep()).toBe(1);
		expect(relay.hasSession("127.0.0.1", first.address().port)).toBe(false);

		expect(await request(second, relayPort, "my turn")).toBe("echo:my turn");
		expect(relay.stats()).toEqual({ active: 1, total: 2 });
	});

	it("closes the upstream socket of an evicted session", async () => {
		let clock = 0;
		const targetPort = await echoTarget();
		const relay = new UdpRelay({ targetHost: "127.0.0.1", targetPort, now: () => clock });
		const relayPort = await startRelay(relay);
		const client = await bindSocket();
		expect(await request(client, relayPort, "hi")).toBe("echo:hi");

		const upstreamPort = upstreamPortOf(relay);
		expect(await canBind(upstreamPort)).toBe(false);

		clock = DEFAULT_SESSION_IDLE_MS + 1;
		expect(relay.sweep()).toBe(1);

		await expect.poll(() => canBind(upstreamPort)).toBe(true);
	});

	it("removes a session whose upstream socket fails", async () => {
		const closedTarget = await bindSocket();
		const targetPort = closedTarget.address().port;
		sockets = sockets.filter((s) => s !== closedTarget);
		await new Promise<void>((resolve) => closedTarget.close(() => resolve()));

		const relay = new UdpRelay({ targetHost: "127.0.0.1", targetPort });
		const relayPort = await startRelay(relay);
		const client = await bindSocket();
		client.send("anyone?", relayPort, "127.0.0.1");

		// The target's port-unreachable reply surfaces as an error on the connected upstream socket.
		await expect.poll(() => relay.stats()).toEqual({ active: 0, total: 1 });
	});

	it("ignores datagrams reaching the upstream socket from anyone but the target", async () => {
		const targetPort = await echoTarget();
		const relay = new UdpRelay({ targetHost: "127.0.0.1", targetPort });
		const relayPort = await startRelay(relay);
		const client = await bindSocket();
		expect(await request(client, relayPort, "hi")).toBe("echo:hi");

		const received: string[] = [];
		client.on("message", (msg) => received.push(msg.toString()));
		const stranger = await bindSocket();
		stranger.send("injected", upstreamPortOf(relay), "127.0.0.1");
		await new Promise((resolve) => setTimeout(resolve, 100));

		expect(received).toEqual([]);
		expect(await request(client, relayPort, "still fine")).toBe("echo:still fine");
	});

	it("refreshes activity only on client traffic", async () => {
		let clock = 0;
		const targetPort = await echoTarget();
		const relay = new UdpRelay({ targetHost: "127.0.0.1", targetPort, now: () => clock });
		const relayPort = await startRelay(relay);
		const client = await bindSocket();

		await request(client, relayPort, "a");
		clock = 200_000;
		await request(client, relayPort, "b");

		clock = DEFAULT_SESSION_IDLE_MS + 1;
		expect(relay.sweep()).toBe(0);
		expect(relay.listSessions()).toEqual([
			{ client: `127.0.0.1:${client.address().port}`, upstreamPort: expect.any(Number), lastActivity: 200_000 },
		]);
	});

	it("clears every session and releases the port on stop", async () => {
		const targetPort = await echoTarget();
		const relay = new UdpRelay({ targetHost: "127.0.0.1", targetPort });
		const relayPort = await startRelay(relay);
		const client = await bindSocket();
		await request(client, relayPort, "x");

		await relay.stop();
		await relay.stop();

		expect(relay.port()).toBeNull();
		expect(relay.stats().active).toBe(0);

		const again = await bindSocket();
		expect(await request(again, relayPort, "after stop", 100)).toBeNull();
	});

	it("rejects start when the port is taken", async () => {
		const blocker = await bindSocket();
		const relay = new UdpRelay({ targetHost: "127.0.0.1", targetPort: 9 });

		await expect(relay.start(blocker.address().port, "127.0.0.1")).rejects.toMatchObject({ code: "EADDRINUSE" });
	});
});
