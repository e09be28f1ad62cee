import { describe, expect, test } from "vitest";

import { ElementData, bytesToFloat, bytesToSignedInt, bytesToUnsignedInt, bytesToUtf8String } from "./data.js";
import { EbmlError } from "./errors.js";

const data = (...bytes: number[]) => new ElementData(Uint8Array.from(bytes), { offset: 12, elementId: 0x4d80 });

describe("integer decoding", () => {
	test("unsigned is big-endian", () => {
		expect(bytesToUnsignedInt(Uint8Array.of())).toBe(0n);
		expect(bytesToUnsignedInt(Uint8Array.of(0xff))).toBe(255n);
		expect(bytesToUnsignedInt(Uint8Array.of(0x0f, 0x42, 0x40))).toBe(1_000_000n);
		expect(bytesToUnsignedInt(Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff))).toBe(2n ** 64n - 1n);
	});

	test("signed is sign-extended from the payload width", () => {
		expect(bytesToSignedInt(Uint8Array.of())).toBe(0n);
		expect(bytesToSignedInt(Uint8Array.of(0xff))).toBe(-1n);
		expect(bytesToSignedInt(Uint8Array.of(0x7f))).toBe(127n);
		expect(bytesToSignedInt(Uint8Array.of(0xfe))).toBe(-2n);
		expect(bytesToSignedInt(Uint8Array.of(0x00, 0x05))).toBe(5n);
		expect(bytesToSignedInt(Uint8Array.of(0xff, 0x38))).toBe(-200n);
		expect(bytesToSignedInt(Uint8Array.of(0x00, 0xff))).toBe(255n);
	});

	test("numbers beyond the safe range fail", () => {
		expect(data(0x01, 0x00).toNumber()).toBe(256);
		expect(data(0xff, 0xfe).toSignedNumber()).toBe(-2);
		expect(() => data(0x20, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00).toNumber()).toThrow(EbmlError);
		expect(data(0x20, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00).toBigInt()).toBe(2n ** 53n);
		try {
			data(0x7f, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff).toNumber();
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(EbmlError);
			if (err instanceof EbmlError) {
				expect(err.kind).toBe("out-of-range");
				expect(err.stage).toBe("decode");
				expect(err.elementId).toBe(0x4d80);
			}
		}
	});
});

describe("float decoding", () => {
	test("four bytes are single precision", () => {
		expect(bytesToFloat(Uint8Array.of(0x3f, 0x80, 0x00, 0x00))).toBe(1);
		expect(bytesToFloat(Uint8Array.of(0xc0, 0x20, 0x00, 0x00))).toBe(-2.5);
		expect(bytesToFloat(Uint8Array.of(0x47, 0xae, 0x88, 0x80))).toBe(89361);
	});

	test("eight bytes are double precision", () => {
		expect(bytesToFloat(Uint8Array.of(0x40, 0x29, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00))).toBe(12.5);
		expect(bytesToFloat(Uint8Array.of(0x40, 0x09, 0x21, 0xfb, 0x54, 0x44, 0x2d, 0x18))).toBe(Math.PI);
		expect(bytesToFloat(Uint8Array.of(0x40, 0xbf, 0x40, 0x00, 0x00, 0x00, 0x00, 0x00))).toBe(8000);
	});

	test("an empty payload is zero", () => {
		expect(bytesToFloat(Uint8Array.of())).toBe(0);
	});
});

describe("text decoding", () => {
	test("decodes UTF-8 and drops trailing NUL padding", () => {
		expect(bytesToUtf8String(Uint8Array.of(0x41, 0x42, 0x43))).toBe("ABC");
		expect(bytesToUtf8String(Uint8Array.of(0xe4, 0xbd, 0x95))).toBe("\u4f55");
		expect(data(0x74, 0x65, 0x73, 0x74).toText()).toBe("test");
		expect(data(0x63, 0x61, 0x66, 0xc3, 0xa9).toText()).toBe("café");
		expect(data(0x65, 0x6e, 0x67, 0x00, 0x00).toText()).toBe("eng");
	});

	test("invalid UTF-8 fails with invalid-encoding", () => {
		expect(() => bytesToUtf8String(Uint8Array.of(0xc3, 0x28))).toThrow(EbmlError);
		try {
			data(0xff, 0xfe).toText();
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(EbmlError);
			if (err instanceof EbmlError) {
				expect(err.kind).toBe("invalid-encoding");
				expect(err.stage).toBe("decode");
				expect(err.offset).toBe(12);
				expect(err.message).toBe("decode: payload is not valid UTF-8 (element 0x4d80) at offset 12");
			}
		}
	});
});

describe("ElementData", () => {
	test("booleans are true only for exactly 1", () => {
		expect(data(0x01).toBoolean()).toBe(true);
		expect(data(0x00, 0x01).toBoolean()).toBe(true);
		expect(data(0x00).toBoolean()).toBe(false);
		expect(data(0x02).toBoolean()).toBe(false);
		expect(data().toBoolean()).toBe(false);
	});

	test("dates count nanoseconds from 2001-01-01", () => {
		expect(data(0x00).toDate().toISOString()).toBe("2001-01-01T00:00:00.000Z");
		// 1.5 s
		expect(data(0x59, 0x68, 0x2f, 0x00).toDate().toISOString()).toBe("2001-01-01T00:00:01.500Z");
		// -1 s
		expect(data(0xc4, 0x65, 0x36, 0x00).toDate().toISOString()).toBe("2000-12-31T23:59:59.000Z");
	});

	test("bytes are copied out", () => {
		const d = data(1, 2, 3);
		const bytes = d.toBytes();
		bytes[0] = 9;
		expect(Array.from(d.toBytes())).toEqual([1, 2, 3]);
	});

	test("hex dump is truncated at the limit", () => {
		expect(data(0xde, 0xad, 0xbe, 0xef).toHex()).toBe("de ad be ef");
		expect(data(0xde, 0xad, 0xbe, 0xef).toHex(2)).toBe("de ad ...");
		expect(data(0x0a).toHex(2)).toBe("0a");
	});
});
