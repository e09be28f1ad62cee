import { debugLog } from "../debug.js";
import type { ByteSource } from "../source/base.js";
import { Reader } from "../source/reader.js";
import { Vint } from "../vint/index.js";
import { ElementData } from "./data.js";
import { Node, type Element } from "./element.js";
import { EbmlError } from "./errors.js";
import { SIGNATURE, kindOf, nameOf } from "./registry.js";

export interface ElementHeader {
	readonly id: number;
	readonly idLength: number;
	readonly declaredSize: number;
	readonly sizeLength: number;
	readonly offset: number;
}

/** The two top-level elements of an EBML stream. */
export interface Document {
	readonly header: Node;
	readonly root: Node;
}

export type ParseResult =
	| { success: true; document: Document }
	| { success: false; error: EbmlError };

function dataOffset(header: ElementHeader): number {
	return header.offset + header.idLength + header.sizeLength;
}

/**
 * Reads an element id (marker bits kept) and its declared size (marker bits masked).
 */
export function parseElementHeader(reader: Reader): ElementHeader {
	const offset = reader.position;
	const id = Vint.read(reader);
	let size: Vint;
	try {
		size = Vint.read(reader);
	} catch (err) {
		throw err instanceof EbmlError ? err.withContext({ elementId: id.id }) : err;
	}
	if (size.unknown) {
		throw new EbmlError("unsupported-size", "vint", "unknown-size elements are not supported", {
			offset,
			elementId: id.id,
		});
	}
	const header = {
		id: id.id,
		idLength: id.size,
		declaredSize: Number(size.toBigInt()),
		sizeLength: size.size,
		offset,
	};
	debugLog("parser", `${nameOf(header.id) ?? "Unknown"} 0x${header.id.toString(16)} at ${offset}, size ${header.declaredSize}`);
	return header;
}

function readBody(reader: Reader, header: ElementHeader): Element {
	const kind = kindOf(header.id);
	const context = { offset: header.offset, elementId: header.id };
	if (header.declaredSize > reader.remaining) {
		throw new EbmlError(
			"truncated-input",
			"element",
			`declares ${header.declaredSize} bytes, only ${reader.remaining} available`,
			context,
		);
	}
	const data = kind === "container"
		? ElementData.empty
		: new ElementData(reader.readExact(header.declaredSize, "element", header.id), context);
	return Object.freeze({ ...header, kind, data });
}

/**
 * Reads one element. Containers come back with an empty payload and the cursor at
 * their first child.
 */
export function parseElement(reader: Reader): Element {
	return readBody(reader, parseElementHeader(reader));
}

// Containers are checked against the source size before their children are read, so
// a child header cut short by the end of input has also crossed its parent's end.
function readChildHeader(reader: Reader, parentEnd: number): ElementHeader {
	const offset = reader.position;
	try {
		return parseElementHeader(reader);
	} catch (err) {
		if (err instanceof EbmlError && err.kind === "truncated-input") {
			throw new EbmlError(
				"span-mismatch",
				"element",
				`child header runs past the end of its parent at ${parentEnd}`,
				{ offset, elementId: err.elementId },
			);
		}
		throw err;
	}
}

interface Frame {
	element: Element;
	children: Node[];
	end: number;
}

/**
 * Builds one element and, for containers, its whole subtree. Children must fill the
 * parent's declared span exactly. Uses an explicit stack, so nesting depth is bounded
 * by memory rather than the call stack.
 */
export function buildTree(reader: Reader): Node {
	const first = parseElement(reader);
	if (first.kind !== "container") {
		return new Node(first);
	}
	const stack: Frame[] = [{ element: first, children: [], end: reader.position + first.declaredSize }];

	for (;;) {
		const top = stack[stack.length - 1];
		if (reader.position === top.end) {
			stack.pop();
			const node = new Node(top.element, top.children);
			const parent = stack[stack.length - 1];
			if (parent === undefined) {
				return node;
			}
			parent.children.push(node);
			continue;
		}

		const header = readChildHeader(reader, top.end);
		const childEnd = dataOffset(header) + header.declaredSize;
		if (childEnd > top.end) {
			throw new EbmlError(
				"span-mismatch",
				"element",
				`child ends at ${childEnd}, past the end of its parent at ${top.end}`,
				{ offset: header.offset, elementId: header.id },
			);
		}
		const element = readBody(reader, header);
		if (element.kind === "container") {
			stack.push({ element, children: [], end: childEnd });
		} else {
			top.children.push(new Node(element));
		}
	}
}

function checkSignature(reader: Reader): void {
	const head = reader.source.read(0, SIGNATURE.length);
	const matches = head.length === SIGNATURE.length && SIGNATURE.every((byte, i) => head[i] === byte);
	if (!matches) {
		throw new EbmlError("bad-signature", "signature", "stream does not start with the EBML signature 1a 45 df a3", {
			offset: 0,
		});
	}
}

/**
 * Parses the EBML header and the single root element that follows it. Bytes after
 * the root are ignored.
 */
export function parseDocument(source: ByteSource): Document {
	const reader = new Reader(source);
	checkSignature(reader);
	reader.seek(0);
	const header = buildTree(reader);
	const root = buildTree(reader);
	return Object.freeze({ header, root });
}

export function safeParseDocument(source: ByteSource): ParseResult {
	try {
		return { success: true, document: parseDocument(source) };
	} catch (err) {
		if (err instanceof EbmlError) {
			return { success: false, error: err };
		}
		throw err;
	}
}
