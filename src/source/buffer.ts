import type { ByteSource } from "./base.js";

export class BufferSource implements ByteSource {
	private readonly bytes: Uint8Array;

	constructor(bytes: Uint8Array | ArrayBuffer) {
		this.bytes = bytes instanceof ArrayBuffer ? new Uint8Array(bytes) : bytes;
	}

	public get size(): number {
		return this.bytes.length;
	}

	public read(offset: number, length: number): Uint8Array {
		if (offset < 0) {
			throw new RangeError("Offset must be non-negative");
		}
		return this.bytes.slice(offset, offset + length);
	}
}
