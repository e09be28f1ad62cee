import * as ebml from "../../ebml/index.js";

const ids = {
	CueTime: 0xb3,
	CueTrack: 0xf7,
	CueClusterPosition: 0xf1,
	CueRelativePosition: 0xf0,
	CueDuration: 0xb2,
	CueBlockNumber: 0x5378,
} as const;

export class CueTrackPositions extends ebml.View {
	public static readonly id = 0xb7;

	public track(): number {
		return this.one(ids.CueTrack, ebml.decode.uint);
	}

	/** Relative to the first byte of the segment payload. */
	public clusterPosition(): number {
		return this.one(ids.CueClusterPosition, ebml.decode.uint);
	}

	public relativePosition(): number | undefined {
		return this.maybeOne(ids.CueRelativePosition, ebml.decode.uint);
	}

	public duration(): number | undefined {
		return this.maybeOne(ids.CueDuration, ebml.decode.uint);
	}

	public blockNumber(): number | undefined {
		return this.maybeOne(ids.CueBlockNumber, ebml.decode.uint);
	}
}

export class CuePoint extends ebml.View {
	public static readonly id = 0xbb;

	public time(): number {
		return this.one(ids.CueTime, ebml.decode.uint);
	}

	public trackPositions(): CueTrackPositions[] {
		return this.children(CueTrackPositions);
	}
}

export class Cues extends ebml.View {
	public static readonly id = 0x1c53bb6b;

	public cuePoints(): CuePoint[] {
		return this.children(CuePoint);
	}
}
