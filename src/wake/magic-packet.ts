import { createSocket } from "node:dgram";

export const MAGIC_PACKET_SIZE = 102;
export const DEFAULT_WAKE_ADDRESS = "255.255.255.255";
export const DEFAULT_WAKE_PORT = 9;

const MAC_REPETITIONS = 16;

export interface WakeDelivery {
	address: string;
	port: number;
}

/** Sends one wake signal for `mac`. Resolves once the datagram is handed to the OS. */
export type WakeSender = (mac: string, delivery?: WakeDelivery) => Promise<void>;

function macDigits(mac: string): string {
	const digits = mac.replace(/[:-]/g, "");
	if (!/^[0-9a-fA-F]{12}$/.test(digits)) {
		throw new Error(`Invalid MAC address: ${mac}`);
	}
	return digits.toLowerCase();
}

/** `AA-BB-CC-DD-EE-FF`, `aabbccddeeff` → `aa:bb:cc:dd:ee:ff` */
export function normalizeMac(mac: string): string {
	return macDigits(mac).match(/../g)?.join(":") ?? "";
}

export function buildMagicPacket(mac: string): Buffer {
	const macBytes = Buffer.from(macDigits(mac), "hex");
	const packet = Buffer.alloc(MAGIC_PACKET_SIZE, 0xff);
	for (let i = 0; i < MAC_REPETITIONS; i++) {
		macBytes.copy(packet, 6 + i * macBytes.length);
	}
	return packet;
}

export async function sendMagicPacket(
	mac: string,
	delivery: WakeDelivery = { address: DEFAULT_WAKE_ADDRESS, port: DEFAULT_WAKE_PORT },
): Promise<void> {
	const packet = buildMagicPacket(mac);

	return new Promise((resolve, reject) => {
		const socket = createSocket("udp4");
		let settled = false;

		const finish = (err?: Error | null) => {
			if (settled) return;
			settled = true;
			socket.close();
			if (err) reject(err);
			else resolve();
		};

		socket.once("error", finish);
		socket.bind(() => {
			try {
				socket.setBroadcast(true);
			} catch (err) {
				finish(err instanceof Error ? err : new Error(String(err)));
				return;
			}
			socket.send(packet, delivery.port, delivery.address, (err) => finish(err));
		});
	});
}
