import * as ebml from "../../ebml/index.js";
import { BufferSource, Reader } from "../../source/index.js";
import { Vint, readSignedVint } from "../../vint/index.js";

const ids = {
	Timestamp: 0xe7,
	Position: 0xa7,
	PrevSize: 0xab,
	SimpleBlock: 0xa3,
	Block: 0xa1,
	BlockDuration: 0x9b,
	ReferenceBlock: 0xfb,
	DiscardPadding: 0x75a2,
	LaceNumber: 0xcc,
} as const;

const lacings = ["none", "xiph", "fixed", "ebml"] as const;
export type Lacing = typeof lacings[number];

interface BlockLayout {
	trackNumber: number;
	timecode: number;
	flags: number;
	lacing: Lacing;
	frameSizes: number[];
	payload: Uint8Array;
	framesOffset: number;
}

function laceError(reason: string, offset: number): ebml.EbmlError {
	return new ebml.EbmlError("span-mismatch", "block", reason, { offset });
}

function readFrameSizes(reader: Reader, lacing: Lacing): number[] {
	if (lacing === "none") {
		return [reader.remaining];
	}
	const count = reader.readExact(1, "block")[0] + 1;
	if (lacing === "fixed") {
		if (reader.remaining % count !== 0) {
			throw laceError(`${reader.remaining} bytes cannot be split into ${count} equal frames`, reader.position);
		}
		return new Array<number>(count).fill(reader.remaining / count);
	}

	const sizes: number[] = [];
	if (lacing === "xiph") {
		for (let i = 0; i < count - 1; i++) {
			let size = 0;
			let octet: number;
			do {
				octet = reader.readExact(1, "block")[0];
				size += octet;
			} while (octet === 0xff);
			sizes.push(size);
		}
	} else if (count > 1) {
		// first size is absolute, the rest are signed differences from the previous one
		let size = Vint.read(reader).toNumber();
		sizes.push(size);
		for (let i = 1; i < count - 1; i++) {
			size += readSignedVint(reader);
			if (size < 0) {
				throw laceError(`frame ${i} has a negative size`, reader.position);
			}
			sizes.push(size);
		}
	}

	const used = sizes.reduce((sum, size) => sum + size, 0);
	if (used > reader.remaining) {
		throw laceError(`laced frames need ${used} bytes, only ${reader.remaining} remain`, reader.position);
	}
	sizes.push(reader.remaining - used);
	return sizes;
}

/**
 * Header of a SimpleBlock or Block payload. Frame data is only sliced, never decoded.
 * see: https://www.matroska.org/technical/notes.html
 */
export class Block {
	private cachedLayout?: BlockLayout;

	constructor(public readonly node: ebml.Node) {}

	public get simple(): boolean {
		return this.node.id === ids.SimpleBlock;
	}

	private layout(): BlockLayout {
		if (this.cachedLayout !== undefined) {
			return this.cachedLayout;
		}
		const payload = this.node.data.toBytes();
		const reader = new Reader(new BufferSource(payload));
		try {
			const trackNumber = Vint.read(reader).toNumber();
			const [hi, lo] = reader.readExact(2, "block");
			const flags = reader.readExact(1, "block")[0];
			const lacing = lacings[(flags >> 1) & 0x3];
			const frameSizes = readFrameSizes(reader, lacing);
			this.cachedLayout = {
				trackNumber,
				timecode: (((hi << 8) | lo) << 16) >> 16,
				flags,
				lacing,
				frameSizes,
				payload,
				framesOffset: reader.position,
			};
			return this.cachedLayout;
		} catch (err) {
			if (err instanceof ebml.EbmlError) {
				throw new ebml.EbmlError(err.kind, "block", err.reason, {
					offset: this.node.dataOffset + (err.offset ?? 0),
					elementId: this.node.id,
				});
			}
			throw err;
		}
	}

	public trackNumber(): number {
		return this.layout().trackNumber;
	}

	/** Signed, in timestamp ticks relative to the cluster timestamp. */
	public timecode(): number {
		return this.layout().timecode;
	}

	public flags(): number {
		return this.layout().flags;
	}

	/** SimpleBlock only; undefined for a Block, where the bit is reserved. */
	public keyframe(): boolean | undefined {
		return this.simple ? (this.flags() & 0x80) !== 0 : undefined;
	}

	public invisible(): boolean {
		return (this.flags() & 0x08) !== 0;
	}

	public lacing(): Lacing {
		return this.layout().lacing;
	}

	/** SimpleBlock only; undefined for a Block, where the bit is reserved. */
	public discardable(): boolean | undefined {
		return this.simple ? (this.flags() & 0x01) !== 0 : undefined;
	}

	public frameSizes(): number[] {
		return [...this.layout().frameSizes];
	}

	public frames(): Uint8Array[] {
		const { payload, frameSizes, framesOffset } = this.layout();
		const frames: Uint8Array[] = [];
		let offset = framesOffset;
		for (const size of frameSizes) {
			frames.push(payload.slice(offset, offset + size));
			offset += size;
		}
		return frames;
	}
}

export class TimeSlice extends ebml.View {
	public static readonly id = 0xe8;

	public laceNumber(): number | undefined {
		return this.maybeOne(ids.LaceNumber, ebml.decode.uint);
	}
}

export class Slices extends ebml.View {
	public static readonly id = 0x8e;

	public timeSlices(): TimeSlice[] {
		return this.children(TimeSlice);
	}
}

export class BlockGroup extends ebml.View {
	public static readonly id = 0xa0;

	public block(): Block {
		return new Block(this.requireNode(ids.Block));
	}

	public blockDuration(): number | undefined {
		return this.maybeOne(ids.BlockDuration, ebml.decode.uint);
	}

	/** Relative timestamps of referenced frames; empty for a keyframe. */
	public referenceBlocks(): number[] {
		return this.many(ids.ReferenceBlock, ebml.decode.int);
	}

	/** Nanoseconds of padding to drop, negative to drop from the start. */
	public discardPadding(): number | undefined {
		return this.maybeOne(ids.DiscardPadding, ebml.decode.int);
	}

	public slices(): Slices | undefined {
		return this.maybeChild(Slices);
	}
}

export class Cluster extends ebml.View {
	public static readonly id = 0x1f43b675;

	public timestamp(): number {
		return this.one(ids.Timestamp, ebml.decode.uint);
	}

	public position(): number | undefined {
		return this.maybeOne(ids.Position, ebml.decode.uint);
	}

	public prevSize(): number | undefined {
		return this.maybeOne(ids.PrevSize, ebml.decode.uint);
	}

	public simpleBlocks(): Block[] {
		return this.node.filter(ids.SimpleBlock).map((node) => new Block(node));
	}

	public blockGroups(): BlockGroup[] {
		return this.children(BlockGroup);
	}
}
