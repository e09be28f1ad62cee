import { LRUCache } from "lru-cache";

import { cacheSourceOptionsSchema, type CacheSourceOptions } from "../config.js";
import { debugLog } from "../debug.js";
import type { ByteSource } from "./base.js";

/**
 * Serves reads from fixed-size blocks of `raw`, keeping recently used blocks in an LRU cache
 * bounded by total bytes.
 */
export class CacheSource implements ByteSource {
	private readonly cache: LRUCache<number, Uint8Array>;
	public readonly blockSize: number;

	constructor(private readonly raw: ByteSource, options: CacheSourceOptions = {}) {
		const { blockSize, maxCacheSize } = cacheSourceOptionsSchema.parse(options);
		this.blockSize = blockSize;
		this.cache = new LRUCache({
			maxSize: maxCacheSize,
			sizeCalculation: (block) => block.byteLength,
		});
	}

	public get size(): number {
		return this.raw.size;
	}

	private block(index: number): Uint8Array {
		const cached = this.cache.get(index);
		if (cached !== undefined) {
			return cached;
		}
		const start = index * this.blockSize;
		const end = Math.min(start + this.blockSize, this.raw.size);
		debugLog("source", `loading block ${index} [${start}, ${end})`);
		const block = this.raw.read(start, end - start);
		if (block.byteLength > 0) {
			this.cache.set(index, block);
		}
		return block;
	}

	public read(offset: number, length: number): Uint8Array {
		if (offset < 0) {
			throw new RangeError("Offset must be non-negative");
		}
		const size = Math.max(0, Math.min(length, this.size - offset));
		const buffer = new Uint8Array(size);
		let inOffset = offset;
		let outOffset = 0;
		while (outOffset < size) {
			const blockIndex = Math.floor(inOffset / this.blockSize);
			const blockOffset = inOffset % this.blockSize;
			const block = this.block(blockIndex);
			const blockLength = Math.min(size - outOffset, block.byteLength - blockOffset);
			if (blockLength <= 0) {
				break;
			}
			buffer.set(block.subarray(blockOffset, blockOffset + blockLength), outOffset);
			inOffset += blockLength;
			outOffset += blockLength;
		}
		return outOffset === size ? buffer : buffer.slice(0, outOffset);
	}
}
