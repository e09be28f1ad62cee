import type { RenderOptions } from "../config.js";
import * as ebml from "../ebml/index.js";
import type { ByteSource } from "../source/index.js";
import * as elements from "./elements/index.js";

export * from "./elements/index.js";
export * from "./summary.js";

export type FileParseResult =
	| { success: true; file: File }
	| { success: false; error: ebml.EbmlError };

/**
 * A parsed Matroska or WebM stream: the EBML header and the Segment after it.
 */
export class File {
	public readonly header: elements.EBMLHead;
	public readonly root: elements.Segment;

	constructor(public readonly document: ebml.Document) {
		this.header = new elements.EBMLHead(document.header);
		this.root = new elements.Segment(document.root);
	}

	public static parse(source: ByteSource): File {
		return new File(ebml.parseDocument(source));
	}

	public static safeParse(source: ByteSource): FileParseResult {
		const result = ebml.safeParseDocument(source);
		if (!result.success) {
			return result;
		}
		return { success: true, file: new File(result.document) };
	}

	public toXML(options?: RenderOptions): string {
		return this.header.toXML(options) + this.root.toXML(options);
	}
}
