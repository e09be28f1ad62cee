import * as ebml from "../../ebml/index.js";

const ids = {
	TargetTypeValue: 0x68ca,
	TargetType: 0x63ca,
	TagTrackUID: 0x63c5,
	TagName: 0x45a3,
	TagLanguage: 0x447a,
	TagDefault: 0x4484,
	TagString: 0x4487,
	TagBinary: 0x4485,
} as const;

export class Targets extends ebml.View {
	public static readonly id = 0x63c0;

	/** 50 for an album or movie, 30 for a track or chapter, and so on. */
	public typeValue(): number | undefined {
		return this.maybeOne(ids.TargetTypeValue, ebml.decode.uint);
	}

	public type(): string | undefined {
		return this.maybeOne(ids.TargetType, ebml.decode.text);
	}

	public trackUids(): bigint[] {
		return this.many(ids.TagTrackUID, ebml.decode.uint64);
	}
}

export class SimpleTag extends ebml.View {
	public static readonly id = 0x67c8;

	public name(): string {
		return this.one(ids.TagName, ebml.decode.text);
	}

	public language(): string {
		return this.one(ids.TagLanguage, ebml.decode.text);
	}

	public default(): boolean {
		return this.one(ids.TagDefault, ebml.decode.flag);
	}

	public string(): string | undefined {
		return this.maybeOne(ids.TagString, ebml.decode.text);
	}

	public binary(): Uint8Array | undefined {
		return this.maybeOne(ids.TagBinary, ebml.decode.bytes);
	}

	public simpleTags(): SimpleTag[] {
		return this.children(SimpleTag);
	}
}

export class Tag extends ebml.View {
	public static readonly id = 0x7373;

	public targets(): Targets {
		return this.child(Targets);
	}

	public simpleTags(): SimpleTag[] {
		return this.children(SimpleTag);
	}
}

export class Tags extends ebml.View {
	public static readonly id = 0x1254c367;

	public tags(): Tag[] {
		return this.children(Tag);
	}
}
