import { describe, expect, test } from "vitest";

import * as ebml from "../../ebml/index.js";
import { BufferSource } from "../../source/index.js";
import { binary, concat, ebmlHeader, element, float, text, uint } from "../../testing/builder.js";
import * as matroska from "../index.js";

function trackEntries(...entries: Uint8Array[]): matroska.TrackEntry[] {
	const source = new BufferSource(concat(ebmlHeader(), element(0x18538067, element(0x1654ae6b, ...entries))));
	return matroska.File.parse(source).root.tracks()[0].trackEntries();
}

const mandatory = [
	uint(0xd7, 1),
	uint(0x73c5, 2n ** 63n + 5n),
	uint(0x83, matroska.TrackType.Video),
	uint(0xb9, 1),
	uint(0x88, 0),
	uint(0x55aa, 2),
	uint(0x9c, 1),
	text(0x86, "V_AV1"),
	uint(0x56bb, 0),
];

describe("TrackEntry", () => {
	test("mandatory fields", () => {
		const [entry] = trackEntries(element(0xae, ...mandatory));
		expect(entry.trackNumber()).toBe(1);
		expect(entry.trackUid()).toBe(2n ** 63n + 5n);
		expect(entry.trackType()).toBe(1);
		expect(entry.enabled()).toBe(true);
		expect(entry.default()).toBe(false);
		// only exactly 1 counts as set
		expect(entry.forced()).toBe(false);
		expect(entry.laced()).toBe(true);
		expect(entry.codecId()).toBe("V_AV1");
		expect(entry.seekPreRoll()).toBe(0);
	});

	test("optional fields are undefined when absent", () => {
		const [entry] = trackEntries(element(0xae, ...mandatory));
		expect(entry.defaultDuration()).toBeUndefined();
		expect(entry.name()).toBeUndefined();
		expect(entry.language()).toBeUndefined();
		expect(entry.codecPrivate()).toBeUndefined();
		expect(entry.codecName()).toBeUndefined();
		expect(entry.codecDelay()).toBeUndefined();
		expect(entry.trackTimestampScale()).toBeUndefined();
		expect(entry.video()).toBeUndefined();
		expect(entry.audio()).toBeUndefined();
		expect(entry.contentEncodings()).toBeUndefined();
	});

	test("optional fields are decoded when present", () => {
		const [entry] = trackEntries(element(
			0xae,
			...mandatory,
			uint(0x23e383, 33_366_667),
			text(0x536e, "Main"),
			text(0x22b59c, "und"),
			binary(0x63a2, [0x81, 0x00]),
			text(0x258688, "AV1"),
			uint(0x56aa, 6_500_000),
			float(0x23314f, 1, 4),
		));
		expect(entry.defaultDuration()).toBe(33_366_667);
		expect(entry.name()).toBe("Main");
		expect(entry.language()).toBe("und");
		expect(Array.from(entry.codecPrivate() ?? [])).toEqual([0x81, 0x00]);
		expect(entry.codecName()).toBe("AV1");
		expect(entry.codecDelay()).toBe(6_500_000);
		expect(entry.trackTimestampScale()).toBe(1);
	});

	test("a missing mandatory field names the field", () => {
		const [entry] = trackEntries(element(0xae, uint(0xd7, 1)));
		expect(() => entry.codecId()).toThrow(ebml.EbmlError);
		expect(() => entry.codecId()).toThrow("field: TrackEntry has no CodecID");
		expect(entry.trackNumber()).toBe(1);
	});

	test("track type names", () => {
		expect(matroska.trackTypeName(1)).toBe("video");
		expect(matroska.trackTypeName(0x11)).toBe("subtitle");
		expect(matroska.trackTypeName(99)).toBe("unknown(99)");
	});
});

describe("Video", () => {
	test("picture fields and projection", () => {
		const [entry] = trackEntries(element(
			0xae,
			...mandatory,
			element(
				0xe0,
				uint(0x9a, 2),
				uint(0xb0, 1920),
				uint(0xba, 1080),
				uint(0x53b8, 1),
				uint(0x54aa, 8),
				uint(0x54b0, 16),
				uint(0x54ba, 9),
				uint(0x54b2, 3),
				element(0x7670, uint(0x7671, 1), float(0x7673, 0), float(0x7674, 90, 4), float(0x7675, -45.5)),
			),
		));
		const video = entry.video();
		expect(video?.interlacingFlag()).toBe(2);
		expect(video?.pixelWidth()).toBe(1920);
		expect(video?.pixelHeight()).toBe(1080);
		expect(video?.stereoMode()).toBe(1);
		expect(video?.alphaMode()).toBeUndefined();
		expect(video?.pixelCropBottom()).toBe(8);
		expect(video?.pixelCropTop()).toBeUndefined();
		expect(video?.displayWidth()).toBe(16);
		expect(video?.displayHeight()).toBe(9);
		expect(video?.displayUnit()).toBe(3);
		expect(video?.aspectRatioType()).toBeUndefined();

		const projection = video?.projection();
		expect(projection?.type()).toBe(1);
		expect(projection?.private()).toBeUndefined();
		expect(projection?.poseYaw()).toBe(0);
		expect(projection?.posePitch()).toBe(90);
		expect(projection?.poseRoll()).toBe(-45.5);
	});
});

describe("Audio", () => {
	test("sampling fields", () => {
		const [entry] = trackEntries(element(
			0xae,
			...mandatory,
			element(0xe1, float(0xb5, 44100, 4), float(0x78b5, 88200), uint(0x9f, 6), uint(0x6264, 24)),
		));
		const audio = entry.audio();
		expect(audio?.samplingFrequency()).toBe(44100);
		expect(audio?.outputSamplingFrequency()).toBe(88200);
		expect(audio?.numChannels()).toBe(6);
		expect(audio?.bitDepth()).toBe(24);
	});
});

describe("ContentEncodings", () => {
	test("encryption settings", () => {
		const [entry] = trackEntries(element(
			0xae,
			...mandatory,
			element(0x6d80, element(
				0x6240,
				uint(0x5031, 0),
				uint(0x5032, 1),
				uint(0x5033, 1),
				element(0x5035, uint(0x47e1, 5), binary(0x47e2, [0xab, 0xcd]), element(0x47e7, uint(0x47e8, 1))),
			)),
		));
		const [encoding] = entry.contentEncodings()?.encodings() ?? [];
		expect(encoding.order()).toBe(0);
		expect(encoding.scope()).toBe(1);
		expect(encoding.type()).toBe(1);
		const encryption = encoding.encryption();
		expect(encryption.algorithmType()).toBe(5);
		expect(Array.from(encryption.keyId() ?? [])).toEqual([0xab, 0xcd]);
		expect(encryption.aesSettings()?.cipherMode()).toBe(1);
	});

	test("an encoding without encryption fails on access", () => {
		const [entry] = trackEntries(element(
			0xae,
			...mandatory,
			element(0x6d80, element(0x6240, uint(0x5031, 0), uint(0x5032, 1), uint(0x5033, 0))),
		));
		const [encoding] = entry.contentEncodings()?.encodings() ?? [];
		expect(() => encoding.encryption()).toThrow("field: ContentEncoding has no ContentEncryption");
	});
});
