import { EbmlError, type EbmlStage } from "../ebml/errors.js";
import type { ByteSource } from "./base.js";

/**
 * A cursor over a byte source. Every read asks for an exact byte count and fails
 * with a truncated-input error when the source cannot supply it.
 */
export class Reader {
	private offset = 0;

	constructor(public readonly source: ByteSource) {}

	public get position(): number {
		return this.offset;
	}

	public get size(): number {
		return this.source.size;
	}

	public get remaining(): number {
		return Math.max(0, this.source.size - this.offset);
	}

	public seek(offset: number): void {
		if (offset < 0 || offset > this.source.size) {
			throw new RangeError(`Cannot seek to ${offset} in a source of ${this.source.size} bytes`);
		}
		this.offset = offset;
	}

	public readExact(length: number, stage: EbmlStage, elementId?: number): Uint8Array {
		const start = this.offset;
		const bytes = length === 0 ? new Uint8Array(0) : this.source.read(start, length);
		if (bytes.length < length) {
			throw new EbmlError(
				"truncated-input",
				stage,
				`expected ${length} bytes, only ${bytes.length} available`,
				{ offset: start, elementId },
			);
		}
		this.offset = start + length;
		return bytes;
	}
}
