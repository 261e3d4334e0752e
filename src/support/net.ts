import * as os from "node:os";

function ipv4Parts(ip: string): number[] | null {
	const parts = ip.split(".");
	if (parts.length !== 4) return null;
	const numbers: number[] = [];
	for (const part of parts) {
		if (!/^\d{1,3}$/.test(part)) return null;
		const value = Number(part);
		if (value > 255) return null;
		numbers.push(value);
	}
	return numbers;
}

export function isIpv4(ip: string): boolean {
	return ipv4Parts(ip) !== null;
}

/** True for addresses in 224.0.0.0/4. */
export function isMulticastIpv4(ip: string): boolean {
	const parts = ipv4Parts(ip);
	return parts !== null && parts[0] >= 224 && parts[0] <= 239;
}

function isPrivateIpv4(ip: string): boolean {
	const parts = ip.split(".").map(Number);
	if (parts[0] === 10) return true;
	if (parts[0] === 172 && parts[1] >= 16 && parts[1] <= 31) return true;
	if (parts[0] === 192 && parts[1] === 168) return true;
	if (parts[0] === 127) return true;
	return false;
}

export function getPrivateAddresses(includeLoopback = true): string[] {
	const addresses: string[] = [];
	const interfaces = os.networkInterfaces();
	for (const iface of Object.values(interfaces)) {
		if (!iface) continue;
		for (const addr of iface) {
			if (addr.family !== "IPv4") continue;
			if (addr.internal && !includeLoopback) continue;
			if (addr.internal || isPrivateIpv4(addr.address)) {
				addresses.push(addr.address);
			}
		}
	}
	return addresses;
}
