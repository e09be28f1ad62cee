import type { File } from "./index.js";
import { TrackType, trackTypeName, type TrackEntry } from "./elements/tracks.js";

export interface TrackSummary {
	number: number;
	type: string;
	codecId: string;
	language?: string;
	/** Frame size for video, sampling rate and channels for audio. */
	detail?: string;
}

export interface FileSummary {
	docType: string;
	docTypeVersion: number;
	title?: string;
	durationMs?: number;
	clusters: number;
	tracks: TrackSummary[];
}

function trackDetail(entry: TrackEntry): string | undefined {
	const type = entry.trackType();
	if (type === TrackType.Video) {
		const video = entry.video();
		return video && `${video.pixelWidth()}x${video.pixelHeight()}`;
	}
	if (type === TrackType.Audio) {
		const audio = entry.audio();
		return audio && `${audio.samplingFrequency()} Hz, ${audio.numChannels()} ch`;
	}
	return undefined;
}

export function summarize(file: File): FileSummary {
	const info = file.root.infos().at(0);
	const duration = info?.duration();
	const title = info?.title();
	const summary: FileSummary = {
		docType: file.header.docType(),
		docTypeVersion: file.header.docTypeVersion(),
		clusters: file.root.clusters().length,
		tracks: file.root.tracks().flatMap((tracks) => tracks.trackEntries()).map((entry) => {
			const track: TrackSummary = {
				number: entry.trackNumber(),
				type: trackTypeName(entry.trackType()),
				codecId: entry.codecId(),
			};
			const language = entry.language();
			if (language !== undefined) {
				track.language = language;
			}
			const detail = trackDetail(entry);
			if (detail !== undefined) {
				track.detail = detail;
			}
			return track;
		}),
	};
	if (title !== undefined) {
		summary.title = title;
	}
	if (info !== undefined && duration !== undefined) {
		summary.durationMs = (duration * info.timestampScale()) / 1e6;
	}
	return summary;
}

export function formatSummary(summary: FileSummary): string {
	const lines = [`doc type: ${summary.docType} v${summary.docTypeVersion}`];
	if (summary.title !== undefined) {
		lines.push(`title: ${summary.title}`);
	}
	if (summary.durationMs !== undefined) {
		lines.push(`duration: ${summary.durationMs} ms`);
	}
	lines.push(`clusters: ${summary.clusters}`);
	for (const track of summary.tracks) {
		let line = `track ${track.number}: ${track.type} ${track.codecId}`;
		if (track.language !== undefined) {
			line += ` (${track.language})`;
		}
		if (track.detail !== undefined) {
			line += ` ${track.detail}`;
		}
		lines.push(line);
	}
	return lines.join("\n") + "\n";
}
