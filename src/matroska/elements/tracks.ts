import * as ebml from "../../ebml/index.js";

const ids = {
	TrackNumber: 0xd7,
	TrackUID: 0x73c5,
	TrackType: 0x83,
	FlagEnabled: 0xb9,
	FlagDefault: 0x88,
	FlagForced: 0x55aa,
	FlagLacing: 0x9c,
	DefaultDuration: 0x23e383,
	TrackTimestampScale: 0x23314f,
	Name: 0x536e,
	Language: 0x22b59c,
	CodecID: 0x86,
	CodecPrivate: 0x63a2,
	CodecName: 0x258688,
	CodecDelay: 0x56aa,
	SeekPreRoll: 0x56bb,

	FlagInterlaced: 0x9a,
	StereoMode: 0x53b8,
	AlphaMode: 0x53c0,
	PixelWidth: 0xb0,
	PixelHeight: 0xba,
	PixelCropBottom: 0x54aa,
	PixelCropTop: 0x54bb,
	PixelCropLeft: 0x54cc,
	PixelCropRight: 0x54dd,
	DisplayWidth: 0x54b0,
	DisplayHeight: 0x54ba,
	DisplayUnit: 0x54b2,
	AspectRatioType: 0x54b3,

	ProjectionType: 0x7671,
	ProjectionPrivate: 0x7672,
	ProjectionPoseYaw: 0x7673,
	ProjectionPosePitch: 0x7674,
	ProjectionPoseRoll: 0x7675,

	SamplingFrequency: 0xb5,
	OutputSamplingFrequency: 0x78b5,
	Channels: 0x9f,
	BitDepth: 0x6264,

	ContentEncodingOrder: 0x5031,
	ContentEncodingScope: 0x5032,
	ContentEncodingType: 0x5033,
	ContentEncAlgo: 0x47e1,
	ContentEncKeyID: 0x47e2,
	AESSettingsCipherMode: 0x47e8,
} as const;

export const TrackType = {
	Video: 1,
	Audio: 2,
	Complex: 3,
	Logo: 0x10,
	Subtitle: 0x11,
	Buttons: 0x12,
	Control: 0x20,
	Metadata: 0x21,
} as const;

export function trackTypeName(type: number): string {
	for (const [name, value] of Object.entries(TrackType)) {
		if (value === type) {
			return name.toLowerCase();
		}
	}
	return `unknown(${type})`;
}

export class Projection extends ebml.View {
	public static readonly id = 0x7670;

	/** 0 rectangular, 1 equirectangular, 2 cubemap, 3 mesh. */
	public type(): number {
		return this.one(ids.ProjectionType, ebml.decode.uint);
	}

	public private(): Uint8Array | undefined {
		return this.maybeOne(ids.ProjectionPrivate, ebml.decode.bytes);
	}

	public poseYaw(): number {
		return this.one(ids.ProjectionPoseYaw, ebml.decode.float);
	}

	public posePitch(): number {
		return this.one(ids.ProjectionPosePitch, ebml.decode.float);
	}

	public poseRoll(): number {
		return this.one(ids.ProjectionPoseRoll, ebml.decode.float);
	}
}

export class Video extends ebml.View {
	public static readonly id = 0xe0;

	public interlacingFlag(): number {
		return this.one(ids.FlagInterlaced, ebml.decode.uint);
	}

	public stereoMode(): number | undefined {
		return this.maybeOne(ids.StereoMode, ebml.decode.uint);
	}

	public alphaMode(): number | undefined {
		return this.maybeOne(ids.AlphaMode, ebml.decode.uint);
	}

	public pixelWidth(): number {
		return this.one(ids.PixelWidth, ebml.decode.uint);
	}

	public pixelHeight(): number {
		return this.one(ids.PixelHeight, ebml.decode.uint);
	}

	public pixelCropBottom(): number | undefined {
		return this.maybeOne(ids.PixelCropBottom, ebml.decode.uint);
	}

	public pixelCropTop(): number | undefined {
		return this.maybeOne(ids.PixelCropTop, ebml.decode.uint);
	}

	public pixelCropLeft(): number | undefined {
		return this.maybeOne(ids.PixelCropLeft, ebml.decode.uint);
	}

	public pixelCropRight(): number | undefined {
		return this.maybeOne(ids.PixelCropRight, ebml.decode.uint);
	}

	public displayWidth(): number | undefined {
		return this.maybeOne(ids.DisplayWidth, ebml.decode.uint);
	}

	public displayHeight(): number | undefined {
		return this.maybeOne(ids.DisplayHeight, ebml.decode.uint);
	}

	public displayUnit(): number | undefined {
		return this.maybeOne(ids.DisplayUnit, ebml.decode.uint);
	}

	public aspectRatioType(): number | undefined {
		return this.maybeOne(ids.AspectRatioType, ebml.decode.uint);
	}

	public projection(): Projection | undefined {
		return this.maybeChild(Projection);
	}
}

export class Audio extends ebml.View {
	public static readonly id = 0xe1;

	/** Hz. */
	public samplingFrequency(): number {
		return this.one(ids.SamplingFrequency, ebml.decode.float);
	}

	public outputSamplingFrequency(): number | undefined {
		return this.maybeOne(ids.OutputSamplingFrequency, ebml.decode.float);
	}

	public numChannels(): number {
		return this.one(ids.Channels, ebml.decode.uint);
	}

	public bitDepth(): number | undefined {
		return this.maybeOne(ids.BitDepth, ebml.decode.uint);
	}
}

export class ContentEncAESSettings extends ebml.View {
	public static readonly id = 0x47e7;

	public cipherMode(): number {
		return this.one(ids.AESSettingsCipherMode, ebml.decode.uint);
	}
}

export class ContentEncryption extends ebml.View {
	public static readonly id = 0x5035;

	public algorithmType(): number {
		return this.one(ids.ContentEncAlgo, ebml.decode.uint);
	}

	public keyId(): Uint8Array | undefined {
		return this.maybeOne(ids.ContentEncKeyID, ebml.decode.bytes);
	}

	public aesSettings(): ContentEncAESSettings | undefined {
		return this.maybeChild(ContentEncAESSettings);
	}
}

export class ContentEncoding extends ebml.View {
	public static readonly id = 0x6240;

	public order(): number {
		return this.one(ids.ContentEncodingOrder, ebml.decode.uint);
	}

	public scope(): number {
		return this.one(ids.ContentEncodingScope, ebml.decode.uint);
	}

	public type(): number {
		return this.one(ids.ContentEncodingType, ebml.decode.uint);
	}

	public encryption(): ContentEncryption {
		return this.child(ContentEncryption);
	}
}

export class ContentEncodings extends ebml.View {
	public static readonly id = 0x6d80;

	public encodings(): ContentEncoding[] {
		return this.children(ContentEncoding);
	}
}

export class TrackEntry extends ebml.View {
	public static readonly id = 0xae;

	public trackNumber(): number {
		return this.one(ids.TrackNumber, ebml.decode.uint);
	}

	public trackUid(): bigint {
		return this.one(ids.TrackUID, ebml.decode.uint64);
	}

	/** One of the TrackType values. */
	public trackType(): number {
		return this.one(ids.TrackType, ebml.decode.uint);
	}

	public enabled(): boolean {
		return this.one(ids.FlagEnabled, ebml.decode.flag);
	}

	public default(): boolean {
		return this.one(ids.FlagDefault, ebml.decode.flag);
	}

	public forced(): boolean {
		return this.one(ids.FlagForced, ebml.decode.flag);
	}

	public laced(): boolean {
		return this.one(ids.FlagLacing, ebml.decode.flag);
	}

	/** Nanoseconds per frame. */
	public defaultDuration(): number | undefined {
		return this.maybeOne(ids.DefaultDuration, ebml.decode.uint);
	}

	public trackTimestampScale(): number | undefined {
		return this.maybeOne(ids.TrackTimestampScale, ebml.decode.float);
	}

	public name(): string | undefined {
		return this.maybeOne(ids.Name, ebml.decode.text);
	}

	public language(): string | undefined {
		return this.maybeOne(ids.Language, ebml.decode.text);
	}

	public codecId(): string {
		return this.one(ids.CodecID, ebml.decode.text);
	}

	public codecPrivate(): Uint8Array | undefined {
		return this.maybeOne(ids.CodecPrivate, ebml.decode.bytes);
	}

	public codecName(): string | undefined {
		return this.maybeOne(ids.CodecName, ebml.decode.text);
	}

	public codecDelay(): number | undefined {
		return this.maybeOne(ids.CodecDelay, ebml.decode.uint);
	}

	public seekPreRoll(): number {
		return this.one(ids.SeekPreRoll, ebml.decode.uint);
	}

	public video(): Video | undefined {
		return this.maybeChild(Video);
	}

	public audio(): Audio | undefined {
		return this.maybeChild(Audio);
	}

	public contentEncodings(): ContentEncodings | undefined {
		return this.maybeChild(ContentEncodings);
	}
}

export class Tracks extends ebml.View {
	public static readonly id = 0x1654ae6b;

	public trackEntries(): TrackEntry[] {
		return this.children(TrackEntry);
	}
}
