import { readFileSync } from "node:fs";
import * as z from "zod";

export const elementKinds = [
	"container",
	"unsigned",
	"signed",
	"float",
	"string",
	"utf8",
	"date",
	"binary",
] as const;

/**
 * How an element payload is interpreted. "unknown" is reserved for ids absent from the
 * registry; those are kept as opaque binary and never descended into.
 */
export type ElementKind = typeof elementKinds[number] | "unknown";

export interface ElementInfo {
	readonly id: number;
	readonly name: string;
	readonly kind: ElementKind;
}

const registrySchema = z.object({
	elements: z.array(z.object({
		id: z.string().regex(/^0x[0-9a-f]{1,8}$/).transform((hex) => Number.parseInt(hex, 16)),
		name: z.string().min(1),
		kind: z.enum(elementKinds),
	})),
});

function loadRegistry(): ReadonlyMap<number, ElementInfo> {
	const url = new URL("../../data/registry.json", import.meta.url);
	const { elements } = registrySchema.parse(JSON.parse(readFileSync(url, "utf8")));
	const map = new Map<number, ElementInfo>();
	for (const element of elements) {
		if (map.has(element.id)) {
			throw new Error(`Duplicate registry entry for 0x${element.id.toString(16)}`);
		}
		map.set(element.id, Object.freeze(element));
	}
	return map;
}

const registry = loadRegistry();

export function lookup(id: number): ElementInfo | undefined {
	return registry.get(id);
}

export function kindOf(id: number): ElementKind {
	return registry.get(id)?.kind ?? "unknown";
}

export function nameOf(id: number): string | undefined {
	return registry.get(id)?.name;
}

export function isContainer(id: number): boolean {
	return kindOf(id) === "container";
}

export function registeredElements(): IterableIterator<ElementInfo> {
	return registry.values();
}

/** The EBML header id; its four octets double as the file signature. */
export const EBML_HEADER_ID = 0x1a45dfa3;
export const SIGNATURE = Uint8Array.of(0x1a, 0x45, 0xdf, 0xa3);
