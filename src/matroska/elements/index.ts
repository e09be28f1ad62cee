import * as ebml from "../../ebml/index.js";

import { Chapters } from "./chapters.js";
import { Cluster } from "./cluster.js";
import { Cues } from "./cues.js";
import { Info } from "./info.js";
import { SeekHead } from "./seekhead.js";
import { SignatureSlot } from "./signature.js";
import { Tags } from "./tags.js";
import { Tracks } from "./tracks.js";

export * from "./chapters.js";
export * from "./cluster.js";
export * from "./cues.js";
export * from "./info.js";
export * from "./seekhead.js";
export * from "./signature.js";
export * from "./tags.js";
export * from "./tracks.js";

/*
+-------------+
| EBML Header |
+---------------------------+
| Segment     | SeekHead    |
|             |-------------|
|             | Info        |
|             |-------------|
|             | Tracks      |
|             |-------------|
|             | Chapters    |
|             |-------------|
|             | Cluster     |
|             |-------------|
|             | Cues        |
|             |-------------|
|             | Tags        |
+---------------------------+

See https://www.matroska.org/technical/elements.html for details.
*/

const ids = {
	EBMLVersion: 0x4286,
	EBMLReadVersion: 0x42f7,
	EBMLMaxIDLength: 0x42f2,
	EBMLMaxSizeLength: 0x42f3,
	DocType: 0x4282,
	DocTypeVersion: 0x4287,
	DocTypeReadVersion: 0x4285,
} as const;

export class EBMLHead extends ebml.View {
	public static readonly id = 0x1a45dfa3;

	public version(): number {
		return this.one(ids.EBMLVersion, ebml.decode.uint);
	}

	public readVersion(): number {
		return this.one(ids.EBMLReadVersion, ebml.decode.uint);
	}

	public maxIdLength(): number {
		return this.one(ids.EBMLMaxIDLength, ebml.decode.uint);
	}

	public maxSizeLength(): number {
		return this.one(ids.EBMLMaxSizeLength, ebml.decode.uint);
	}

	/** "matroska" or "webm". */
	public docType(): string {
		return this.one(ids.DocType, ebml.decode.text);
	}

	public docTypeVersion(): number {
		return this.one(ids.DocTypeVersion, ebml.decode.uint);
	}

	public docTypeReadVersion(): number {
		return this.one(ids.DocTypeReadVersion, ebml.decode.uint);
	}
}

export class Segment extends ebml.View {
	public static readonly id = 0x18538067;

	public seekHeads(): SeekHead[] {
		return this.children(SeekHead);
	}

	public infos(): Info[] {
		return this.children(Info);
	}

	public clusters(): Cluster[] {
		return this.children(Cluster);
	}

	public tracks(): Tracks[] {
		return this.children(Tracks);
	}

	public cues(): Cues[] {
		return this.children(Cues);
	}

	public chapters(): Chapters[] {
		return this.children(Chapters);
	}

	public tags(): Tags[] {
		return this.children(Tags);
	}

	public signatureSlots(): SignatureSlot[] {
		return this.children(SignatureSlot);
	}

	/**
	 * Follows the SeekHead entries to the top-level element with the given id.
	 * Entries whose position does not land on such an element are skipped.
	 */
	public seek(id: number): ebml.Node | undefined {
		for (const seekHead of this.seekHeads()) {
			for (const entry of seekHead.seeks()) {
				if (entry.seekTarget() !== id) {
					continue;
				}
				const offset = this.node.dataOffset + entry.seekPosition();
				const target = this.node.children.find((child) => child.element.offset === offset);
				if (target !== undefined && target.id === id) {
					return target;
				}
			}
		}
		return undefined;
	}
}
