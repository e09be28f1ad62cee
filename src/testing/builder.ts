import { Vint } from "../vint/index.js";

/** Helpers that assemble EBML streams in memory for tests. */

export function concat(...parts: Uint8Array[]): Uint8Array {
	const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
	let offset = 0;
	for (const part of parts) {
		out.set(part, offset);
		offset += part.length;
	}
	return out;
}

/** Big-endian octets of an id, marker bits included. */
export function idBytes(id: number): Uint8Array {
	const out: number[] = [];
	let rest = id;
	do {
		out.unshift(rest % 256);
		rest = Math.floor(rest / 256);
	} while (rest > 0);
	return Uint8Array.from(out);
}

/** Shortest size vint that is not the all-ones unknown-size marker. */
export function sizeBytes(size: number): Uint8Array {
	let length = 1;
	while (size >= 2 ** (7 * length) - 1) {
		length++;
	}
	return Vint.fromNumber(size, length).bytes;
}

export function element(id: number, ...payload: Uint8Array[]): Uint8Array {
	const body = concat(...payload);
	return concat(idBytes(id), sizeBytes(body.length), body);
}

export function uintBytes(value: number | bigint): Uint8Array {
	const out: number[] = [];
	let rest = BigInt(value);
	do {
		out.unshift(Number(rest & 0xffn));
		rest >>= 8n;
	} while (rest > 0n);
	return Uint8Array.from(out);
}

export function intBytes(value: number | bigint): Uint8Array {
	const n = BigInt(value);
	let width = 1;
	while (width < 8 && BigInt.asIntN(width * 8, n) !== n) {
		width++;
	}
	let rest = BigInt.asUintN(width * 8, n);
	const out = new Uint8Array(width);
	for (let i = width - 1; i >= 0; i--) {
		out[i] = Number(rest & 0xffn);
		rest >>= 8n;
	}
	return out;
}

export function uint(id: number, value: number | bigint): Uint8Array {
	return element(id, uintBytes(value));
}

export function int(id: number, value: number | bigint): Uint8Array {
	return element(id, intBytes(value));
}

export function float(id: number, value: number, width: 4 | 8 = 8): Uint8Array {
	const view = new DataView(new ArrayBuffer(width));
	if (width === 4) {
		view.setFloat32(0, value);
	} else {
		view.setFloat64(0, value);
	}
	return element(id, new Uint8Array(view.buffer));
}

export function text(id: number, value: string): Uint8Array {
	return element(id, new TextEncoder().encode(value));
}

export function binary(id: number, bytes: readonly number[]): Uint8Array {
	return element(id, Uint8Array.from(bytes));
}

/** A complete EBML header element with the given doc type. */
export function ebmlHeader(docType = "webm"): Uint8Array {
	return element(
		0x1a45dfa3,
		uint(0x4286, 1),
		uint(0x42f7, 1),
		uint(0x42f2, 4),
		uint(0x42f3, 8),
		text(0x4282, docType),
		uint(0x4287, 4),
		uint(0x4285, 2),
	);
}
