import { debugCategories, debugCategoriesFromEnv, type DebugCategory } from "./config.js";

export { debugCategories, type DebugCategory };
export type DebugLogger = (category: DebugCategory, ...args: unknown[]) => void;

const state: {
	enabled: Set<DebugCategory>;
	logger: DebugLogger | null;
} = {
	enabled: new Set(debugCategoriesFromEnv(process.env.EBML_DEBUG)),
	logger: null,
};

export function enableDebug(categories: readonly DebugCategory[] | "*"): void {
	state.enabled = new Set(categories === "*" ? debugCategories : categories);
}

export function disableDebug(): void {
	state.enabled.clear();
}

/**
 * Routes debug output to `logger` instead of console.debug. Pass null to restore the default.
 */
export function setDebugLogger(logger: DebugLogger | null): void {
	state.logger = logger;
}

export function isDebugEnabled(category: DebugCategory): boolean {
	return state.enabled.has(category);
}

export function debugLog(category: DebugCategory, ...args: unknown[]): void {
	if (!state.enabled.has(category)) {
		return;
	}
	if (state.logger) {
		state.logger(category, ...args);
	} else {
		console.debug(`[${category}]`, ...args);
	}
}
