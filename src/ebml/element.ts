import { ElementData } from "./data.js";
import { nameOf, type ElementKind } from "./registry.js";
import { formatValue } from "./render.js";

export interface Element {
	readonly id: number;
	readonly declaredSize: number;
	readonly kind: ElementKind;
	/** Empty for containers: their content lives in the node's children. */
	readonly data: ElementData;
	/** Absolute offset of the element's id. */
	readonly offset: number;
	readonly idLength: number;
	readonly sizeLength: number;
}

export class Node {
	constructor(public readonly element: Element, public readonly children: readonly Node[] = []) {
		Object.freeze(this.children);
		Object.freeze(this);
	}

	public get id(): number {
		return this.element.id;
	}

	/** Registry name, or "Unknown" for unregistered ids. */
	public get name(): string {
		return nameOf(this.element.id) ?? "Unknown";
	}

	public get kind(): ElementKind {
		return this.element.kind;
	}

	public get data(): ElementData {
		return this.element.data;
	}

	/** Fully encoded length: id, size field and payload. */
	public get size(): number {
		return this.element.idLength + this.element.sizeLength + this.element.declaredSize;
	}

	public get dataOffset(): number {
		return this.element.offset + this.element.idLength + this.element.sizeLength;
	}

	public find(id: number): Node | undefined {
		return this.children.find((child) => child.id === id);
	}

	public filter(id: number): Node[] {
		return this.children.filter((child) => child.id === id);
	}

	public toString(): string {
		const head = `${this.name}(0x${this.id.toString(16)}, ${this.element.declaredSize}`;
		if (this.kind === "container") {
			return `${head}, ${this.children.length} children)`;
		}
		return `${head}, ${formatValue(this.element, 16)})`;
	}

	public toJSON(): string {
		return this.toString();
	}
}
