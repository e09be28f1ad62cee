import { renderOptionsSchema, type RenderOptions } from "../config.js";
import type { Element, Node } from "./element.js";
import { EbmlError } from "./errors.js";

function escapeXML(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;");
}

interface FormattedValue {
	text: string | undefined;
	/** Set when a text payload failed to decode and `text` holds its hex dump. */
	invalid?: "utf8";
}

function formatPayload(element: Element, hexLimit?: number): FormattedValue {
	const data = element.data;
	switch (element.kind) {
		case "container":
			return { text: undefined };
		case "string":
		case "utf8":
			try {
				return { text: data.toText() };
			} catch (err) {
				if (err instanceof EbmlError && err.kind === "invalid-encoding") {
					return { text: data.toHex(hexLimit), invalid: "utf8" };
				}
				throw err;
			}
		case "unsigned":
			return { text: data.toBigInt().toString() };
		case "signed":
		case "date":
			return { text: data.toSignedBigInt().toString() };
		case "float":
			return { text: String(data.toFloat()) };
		case "binary":
		case "unknown":
			return { text: data.toHex(hexLimit) };
	}
}

/**
 * Decoded payload as text. Undefined for containers, whose content is their children.
 * Text payloads that are not valid UTF-8 come back as hex.
 */
export function formatValue(element: Element, hexLimit?: number): string | undefined {
	return formatPayload(element, hexLimit).text;
}

function renderParts(node: Node, depth: number, indent: string, curIndent: string, maxDepth: number | undefined, hexLimit: number): string[] {
	const { element } = node;
	const attrs = `id="0x${element.id.toString(16)}" size="${element.declaredSize}"`;
	const name = node.name;

	if (element.kind !== "container") {
		const { text, invalid } = formatPayload(element, hexLimit);
		const flag = invalid === undefined ? "" : ` invalid="${invalid}"`;
		return [`${curIndent}<${name} ${attrs}${flag}>${escapeXML(text ?? "")}</${name}>\n`];
	}
	if (node.children.length === 0 || (maxDepth !== undefined && depth >= maxDepth)) {
		return [`${curIndent}<${name} ${attrs} />\n`];
	}
	const parts = [`${curIndent}<${name} ${attrs}>\n`];
	for (const child of node.children) {
		parts.push(...renderParts(child, depth + 1, indent, curIndent + indent, maxDepth, hexLimit));
	}
	parts.push(`${curIndent}</${name}>\n`);
	return parts;
}

/**
 * XML-like dump of a node and its descendants: hex id, registry name, declared size,
 * and the decoded value of every non-container element.
 */
export function renderNode(node: Node, options: RenderOptions = {}): string {
	const { maxDepth, indent, hexLimit } = renderOptionsSchema.parse(options);
	const indentStr = typeof indent === "number" ? " ".repeat(indent) : indent;
	return renderParts(node, 0, indentStr, "", maxDepth, hexLimit).join("");
}
