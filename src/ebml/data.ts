import { EbmlError, type ErrorContext } from "./errors.js";

/** Milliseconds from the Unix epoch to 2001-01-01T00:00:00Z, the origin of EBML dates. */
export const EBML_EPOCH_MS = Date.UTC(2001, 0, 1);

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export function bytesToUnsignedInt(bytes: Uint8Array): bigint {
	let n = 0n;
	for (const b of bytes) {
		n = (n << 8n) | BigInt(b);
	}
	return n;
}

/** Two's complement, sign-extended from the payload width. */
export function bytesToSignedInt(bytes: Uint8Array): bigint {
	if (bytes.length === 0) {
		return 0n;
	}
	return BigInt.asIntN(bytes.length * 8, bytesToUnsignedInt(bytes));
}

/**
 * Payloads longer than 4 bytes are read as a 64-bit IEEE754 value, shorter ones as 32-bit.
 * The bit pattern is the big-endian accumulation of the payload.
 */
export function bytesToFloat(bytes: Uint8Array): number {
	const bits = bytesToUnsignedInt(bytes);
	const view = new DataView(new ArrayBuffer(8));
	if (bytes.length > 4) {
		view.setBigUint64(0, BigInt.asUintN(64, bits));
		return view.getFloat64(0);
	}
	view.setUint32(0, Number(bits));
	return view.getFloat32(0);
}

export function bytesToUtf8String(bytes: Uint8Array, context?: ErrorContext): string {
	try {
		return utf8Decoder.decode(bytes);
	} catch (err) {
		if (err instanceof TypeError) {
			throw new EbmlError("invalid-encoding", "decode", "payload is not valid UTF-8", context);
		}
		throw err;
	}
}

function toSafeNumber(value: bigint, context?: ErrorContext): number {
	if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
		throw new EbmlError("out-of-range", "decode", `${value} cannot be represented exactly as a number`, context);
	}
	return Number(value);
}

/**
 * Read-only view of an element payload. Every conversion can be repeated and leaves
 * the bytes untouched.
 */
export class ElementData {
	private readonly bytes: Uint8Array;

	constructor(bytes: Uint8Array, private readonly context: ErrorContext = {}) {
		this.bytes = bytes;
	}

	public static readonly empty = new ElementData(new Uint8Array(0));

	public get size(): number {
		return this.bytes.length;
	}

	public toBigInt(): bigint {
		return bytesToUnsignedInt(this.bytes);
	}

	public toNumber(): number {
		return toSafeNumber(this.toBigInt(), this.context);
	}

	public toSignedBigInt(): bigint {
		return bytesToSignedInt(this.bytes);
	}

	public toSignedNumber(): number {
		return toSafeNumber(this.toSignedBigInt(), this.context);
	}

	public toFloat(): number {
		return bytesToFloat(this.bytes);
	}

	/** Strict UTF-8; trailing NUL padding is dropped. */
	public toText(): string {
		return bytesToUtf8String(this.bytes, this.context).replace(/\0+$/, "");
	}

	/** True only when the unsigned value is exactly 1. */
	public toBoolean(): boolean {
		return this.toBigInt() === 1n;
	}

	/** Signed nanoseconds since 2001-01-01T00:00:00Z, truncated to milliseconds. */
	public toDate(): Date {
		return new Date(EBML_EPOCH_MS + Number(this.toSignedBigInt() / 1_000_000n));
	}

	public toBytes(): Uint8Array {
		return this.bytes.slice();
	}

	public toHex(limit?: number): string {
		const shown = limit === undefined ? this.bytes : this.bytes.subarray(0, limit);
		const hex = Array.from(shown, (byte) => byte.toString(16).padStart(2, "0")).join(" ");
		return shown.length < this.bytes.length ? `${hex} ...` : hex;
	}
}
