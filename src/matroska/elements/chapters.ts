import * as ebml from "../../ebml/index.js";

const ids = {
	ChapterUID: 0x73c4,
	ChapterStringUID: 0x5654,
	ChapterTimeStart: 0x91,
	ChapterTimeEnd: 0x92,
	ChapString: 0x85,
	ChapLanguage: 0x437c,
} as const;

export class ChapterDisplay extends ebml.View {
	public static readonly id = 0x80;

	public string(): string {
		return this.one(ids.ChapString, ebml.decode.text);
	}

	public languages(): string[] {
		return this.many(ids.ChapLanguage, ebml.decode.text);
	}
}

export class ChapterAtom extends ebml.View {
	public static readonly id = 0xb6;

	public uid(): bigint {
		return this.one(ids.ChapterUID, ebml.decode.uint64);
	}

	public stringUid(): string | undefined {
		return this.maybeOne(ids.ChapterStringUID, ebml.decode.text);
	}

	/** Nanoseconds, unscaled. */
	public timeStart(): number {
		return this.one(ids.ChapterTimeStart, ebml.decode.uint);
	}

	public timeEnd(): number | undefined {
		return this.maybeOne(ids.ChapterTimeEnd, ebml.decode.uint);
	}

	public displays(): ChapterDisplay[] {
		return this.children(ChapterDisplay);
	}

	public chapterAtoms(): ChapterAtom[] {
		return this.children(ChapterAtom);
	}
}

export class EditionEntry extends ebml.View {
	public static readonly id = 0x45b9;

	public chapterAtoms(): ChapterAtom[] {
		return this.children(ChapterAtom);
	}
}

export class Chapters extends ebml.View {
	public static readonly id = 0x1043a770;

	public editionEntries(): EditionEntry[] {
		return this.children(EditionEntry);
	}
}
