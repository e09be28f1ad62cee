import { closeSync, fstatSync, openSync, readSync } from "node:fs";

import type { ByteSource } from "./base.js";

export class FileSource implements ByteSource {
	private closed = false;

	private constructor(public readonly path: string, private readonly fd: number, public readonly size: number) {}

	public static open(path: string): FileSource {
		const fd = openSync(path, "r");
		try {
			return new FileSource(path, fd, fstatSync(fd).size);
		} catch (err) {
			closeSync(fd);
			throw err;
		}
	}

	public read(offset: number, length: number): Uint8Array {
		if (this.closed) {
			throw new Error(`${this.path} is closed`);
		}
		if (offset < 0) {
			throw new RangeError("Offset must be non-negative");
		}
		const wanted = Math.max(0, Math.min(length, this.size - offset));
		const buffer = new Uint8Array(wanted);
		let filled = 0;
		while (filled < wanted) {
			const n = readSync(this.fd, buffer, filled, wanted - filled, offset + filled);
			if (n === 0) {
				break;
			}
			filled += n;
		}
		return filled === wanted ? buffer : buffer.slice(0, filled);
	}

	public close(): void {
		if (!this.closed) {
			this.closed = true;
			closeSync(this.fd);
		}
	}
}
