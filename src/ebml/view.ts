import type { RenderOptions } from "../config.js";
import type { ElementData } from "./data.js";
import type { Node } from "./element.js";
import { EbmlError } from "./errors.js";
import { nameOf } from "./registry.js";
import { renderNode } from "./render.js";

export type Decoder<T> = (data: ElementData) => T;

/** Payload decoders shared by the schema views. */
export const decode = {
	uint: (data: ElementData) => data.toNumber(),
	uint64: (data: ElementData) => data.toBigInt(),
	int: (data: ElementData) => data.toSignedNumber(),
	int64: (data: ElementData) => data.toSignedBigInt(),
	float: (data: ElementData) => data.toFloat(),
	text: (data: ElementData) => data.toText(),
	bytes: (data: ElementData) => data.toBytes(),
	flag: (data: ElementData) => data.toBoolean(),
	date: (data: ElementData) => data.toDate(),
} satisfies Record<string, Decoder<unknown>>;

export interface ViewClass<V extends View> {
	readonly id: number;
	new (node: Node): V;
}

/**
 * Read-only facade over a container node. Lookups only ever see direct children.
 */
export abstract class View {
	public static readonly id: number;

	constructor(public readonly node: Node) {}

	protected requireNode(id: number): Node {
		const found = this.node.find(id);
		if (found === undefined) {
			const field = nameOf(id) ?? `0x${id.toString(16)}`;
			throw new EbmlError("missing-field", "field", `${this.node.name} has no ${field}`, {
				offset: this.node.element.offset,
				elementId: id,
			});
		}
		return found;
	}

	protected one<T>(id: number, decoder: Decoder<T>): T {
		return decoder(this.requireNode(id).data);
	}

	protected maybeOne<T>(id: number, decoder: Decoder<T>): T | undefined {
		const found = this.node.find(id);
		return found === undefined ? undefined : decoder(found.data);
	}

	protected many<T>(id: number, decoder: Decoder<T>): T[] {
		return this.node.filter(id).map((child) => decoder(child.data));
	}

	protected child<V extends View>(cls: ViewClass<V>): V {
		return new cls(this.requireNode(cls.id));
	}

	protected maybeChild<V extends View>(cls: ViewClass<V>): V | undefined {
		const found = this.node.find(cls.id);
		return found === undefined ? undefined : new cls(found);
	}

	protected children<V extends View>(cls: ViewClass<V>): V[] {
		return this.node.filter(cls.id).map((child) => new cls(child));
	}

	public toXML(options?: RenderOptions): string {
		return renderNode(this.node, options);
	}

	public toString(): string {
		return this.node.toString();
	}
}
