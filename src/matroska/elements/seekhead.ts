import * as ebml from "../../ebml/index.js";

const ids = {
	SeekID: 0x53ab,
	SeekPosition: 0x53ac,
} as const;

export class Seek extends ebml.View {
	public static readonly id = 0x4dbb;

	/** The referenced element's id, as the raw bytes stored in the file. */
	public seekId(): Uint8Array {
		return this.one(ids.SeekID, ebml.decode.bytes);
	}

	/** The referenced element's id as a number, marker bits included. */
	public seekTarget(): number {
		return this.one(ids.SeekID, ebml.decode.uint);
	}

	/** Offset of the referenced element from the first byte of the Segment payload. */
	public seekPosition(): number {
		return this.one(ids.SeekPosition, ebml.decode.uint);
	}
}

export class SeekHead extends ebml.View {
	public static readonly id = 0x114d9b74;

	public seeks(): Seek[] {
		return this.children(Seek);
	}
}
