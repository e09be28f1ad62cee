export type EbmlErrorKind =
	| "truncated-input"
	| "bad-signature"
	| "invalid-encoding"
	| "missing-field"
	| "span-mismatch"
	| "unsupported-size"
	| "out-of-range";

/** Where in the pipeline the failure happened. */
export type EbmlStage = "signature" | "vint" | "element" | "decode" | "field" | "block";

export interface ErrorContext {
	offset?: number;
	elementId?: number;
}

export class EbmlError extends Error {
	public readonly offset?: number;
	public readonly elementId?: number;

	constructor(
		public readonly kind: EbmlErrorKind,
		public readonly stage: EbmlStage,
		public readonly reason: string,
		context: ErrorContext = {},
	) {
		super(EbmlError.format(stage, reason, context));
		this.name = "EbmlError";
		this.offset = context.offset;
		this.elementId = context.elementId;
	}

	/**
	 * Returns a copy carrying the given offset and element id where this error has none.
	 */
	public withContext(context: ErrorContext): EbmlError {
		return new EbmlError(this.kind, this.stage, this.reason, {
			offset: this.offset ?? context.offset,
			elementId: this.elementId ?? context.elementId,
		});
	}

	private static format(stage: EbmlStage, reason: string, context: ErrorContext): string {
		let message = `${stage}: ${reason}`;
		if (context.elementId !== undefined) {
			message += ` (element 0x${context.elementId.toString(16)})`;
		}
		if (context.offset !== undefined) {
			message += ` at offset ${context.offset}`;
		}
		return message;
	}
}
