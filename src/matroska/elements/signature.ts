import * as ebml from "../../ebml/index.js";

const ids = {
	SignatureAlgo: 0x7e8a,
	SignatureHash: 0x7e9a,
	SignaturePublicKey: 0x7ea5,
	Signature: 0x7eb5,
	SignedElement: 0x6532,
} as const;

export class SignatureElementList extends ebml.View {
	public static readonly id = 0x7e7b;

	/** Ids of the signed elements, as raw id bytes. */
	public signedElements(): Uint8Array[] {
		return this.many(ids.SignedElement, ebml.decode.bytes);
	}
}

export class SignatureElements extends ebml.View {
	public static readonly id = 0x7e5b;

	public lists(): SignatureElementList[] {
		return this.children(SignatureElementList);
	}
}

export class SignatureSlot extends ebml.View {
	public static readonly id = 0x1b538667;

	public algo(): number | undefined {
		return this.maybeOne(ids.SignatureAlgo, ebml.decode.uint);
	}

	public hash(): number | undefined {
		return this.maybeOne(ids.SignatureHash, ebml.decode.uint);
	}

	public publicKey(): Uint8Array | undefined {
		return this.maybeOne(ids.SignaturePublicKey, ebml.decode.bytes);
	}

	public signature(): Uint8Array | undefined {
		return this.maybeOne(ids.Signature, ebml.decode.bytes);
	}

	public elements(): SignatureElements | undefined {
		return this.maybeChild(SignatureElements);
	}
}
