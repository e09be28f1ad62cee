import { EbmlError } from "../ebml/errors.js";
import type { Reader } from "../source/reader.js";

/**
 * Zero bits before the first set bit of `byte`; 8 for 0x00.
 */
export function leadingZeroRunLength(byte: number): number {
	return Math.clz32(byte & 0xff) - 24;
}

/**
 * Octet count announced by the first byte of a vint. 0x00 carries no marker bit
 * and is read as the longest (8 octet) form.
 */
export function vintLength(firstByte: number): number {
	return Math.min(leadingZeroRunLength(firstByte) + 1, 8);
}

export class Vint {
	public readonly bytes: Uint8Array;

	constructor(bytes: Uint8Array | ArrayBuffer) {
		this.bytes = new Uint8Array(bytes);
	}

	public get size(): number {
		return this.bytes.length;
	}

	public static fromBytes(input: Uint8Array | ArrayBuffer): Vint {
		const bytes = new Uint8Array(input);
		if (bytes.length === 0) {
			throw new EbmlError("truncated-input", "vint", "vint cannot be empty");
		}
		const length = vintLength(bytes[0]);
		if (bytes.length < length) {
			throw new EbmlError("truncated-input", "vint", `vint needs ${length} bytes, only ${bytes.length} available`);
		}
		return new Vint(bytes.slice(0, length));
	}

	public static read(reader: Reader): Vint {
		const first = reader.readExact(1, "vint");
		const length = vintLength(first[0]);
		if (length === 1) {
			return new Vint(first);
		}
		const rest = reader.readExact(length - 1, "vint");
		const bytes = new Uint8Array(length);
		bytes[0] = first[0];
		bytes.set(rest, 1);
		return new Vint(bytes);
	}

	private get mask(): number {
		return (1 << (8 - this.size)) - 1;
	}

	public toBigInt(): bigint {
		let i = BigInt(this.bytes[0] & this.mask);
		for (let o = 1; o < this.bytes.length; o++) {
			i = (i << 8n) | BigInt(this.bytes[o]);
		}
		return i;
	}

	public get bigint(): bigint {
		return this.toBigInt();
	}

	/**
	 * Exact up to 53 value bits, which covers every vint of 7 octets or fewer.
	 */
	public toNumber(): number {
		let i = this.bytes[0] & this.mask;
		for (let o = 1; o < this.bytes.length; o++) {
			i = i * 256 + this.bytes[o];
		}
		return i;
	}

	public get number(): number {
		return this.toNumber();
	}

	/**
	 * Signed reading used by EBML lacing: the unsigned value minus 2^(7n-1) - 1.
	 */
	public toSignedNumber(): number {
		return this.toNumber() - (2 ** (7 * this.size - 1) - 1);
	}

	/** The raw octets, marker bits included, as used for element ids. */
	public get id(): number {
		let i = 0;
		for (const b of this.bytes) {
			i = i * 256 + b;
		}
		return i;
	}

	public toString(): string {
		return `0x${this.bytes.reduce((str, byte) => str + byte.toString(16).padStart(2, "0"), "")}`;
	}

	public toJSON(): string {
		return this.toString();
	}

	public get valid(): boolean {
		if (this.bytes.length === 0 || this.bytes[0] === 0) {
			return false;
		}
		return this.bytes.length === vintLength(this.bytes[0]);
	}

	/** All value bits set: the reserved unknown-size marker. */
	public get unknown(): boolean {
		if (this.bytes[0] !== (0xff >> (this.size - 1))) {
			return false;
		}
		for (const b of this.bytes.slice(1)) {
			if (b !== 0xff) {
				return false;
			}
		}
		return true;
	}

	/**
	 * Encodes `i` in `length` octets, or in the fewest that hold it.
	 */
	public static fromBigInt(i: bigint, length?: number): Vint {
		if (i < 0n) {
			throw new RangeError("Vint cannot be negative");
		}
		const minLength = Math.max(1, Math.ceil(Vint.bitLength(i) / 7));
		const byteLen = length ?? minLength;
		if (byteLen < minLength || byteLen > 8) {
			throw new RangeError(`${i} does not fit in a ${byteLen} octet vint`);
		}
		const bytes = new Uint8Array(byteLen);
		for (let cur = byteLen - 1; i > 0n; cur--) {
			bytes[cur] = Number(i & 0xffn);
			i >>= 8n;
		}
		bytes[0] |= 0x80 >> (byteLen - 1);
		return new Vint(bytes);
	}

	public static fromNumber(i: number, length?: number): Vint {
		if (!Number.isSafeInteger(i)) {
			throw new RangeError(`${i} is not a safe integer`);
		}
		return Vint.fromBigInt(BigInt(i), length);
	}

	private static bitLength(i: bigint): number {
		return i.toString(2).length;
	}
}

/** Reads one size-style vint: the length marker is masked off. */
export function readVint(reader: Reader): bigint {
	return Vint.read(reader).toBigInt();
}

/** Reads one signed vint, as used for EBML lace size differences. */
export function readSignedVint(reader: Reader): number {
	return Vint.read(reader).toSignedNumber();
}

/** Reads one element id: the length marker is kept as part of the value. */
export function readId(reader: Reader): number {
	return Vint.read(reader).id;
}
