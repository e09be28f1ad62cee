import * as ebml from "../../ebml/index.js";

const ids = {
	SegmentUID: 0x73a4,
	TimestampScale: 0x2ad7b1,
	Duration: 0x4489,
	DateUTC: 0x4461,
	Title: 0x7ba9,
	MuxingApp: 0x4d80,
	WritingApp: 0x5741,
} as const;

export class Info extends ebml.View {
	public static readonly id = 0x1549a966;

	/** Nanoseconds per timestamp tick. */
	public timestampScale(): number {
		return this.one(ids.TimestampScale, ebml.decode.uint);
	}

	/** In timestamp ticks. */
	public duration(): number | undefined {
		return this.maybeOne(ids.Duration, ebml.decode.float);
	}

	/** Truncated to milliseconds; see `dateCreatedNs` for the exact value. */
	public dateCreated(): Date | undefined {
		return this.maybeOne(ids.DateUTC, ebml.decode.date);
	}

	/** Signed nanoseconds since 2001-01-01T00:00:00Z. */
	public dateCreatedNs(): bigint | undefined {
		return this.maybeOne(ids.DateUTC, ebml.decode.int64);
	}

	public muxingApp(): string {
		return this.one(ids.MuxingApp, ebml.decode.text);
	}

	public writingApp(): string {
		return this.one(ids.WritingApp, ebml.decode.text);
	}

	public segmentUid(): Uint8Array | undefined {
		return this.maybeOne(ids.SegmentUID, ebml.decode.bytes);
	}

	public title(): string | undefined {
		return this.maybeOne(ids.Title, ebml.decode.text);
	}
}
