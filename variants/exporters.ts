/**
 * Media exporters - a family of related variants built together.
 *
 * Video and audio codecs live in their own registries. A quality preset
 * ("low", "high", "master") is itself a registry entry whose constructor
 * builds a matching video/audio pair from those two registries.
 */

import { VariantRegistry } from "../core/factory/index.ts";

export type MediaKind = "video" | "audio";

export interface MediaExporter {
	readonly kind: MediaKind;
	readonly format: string;
	/** Returns the log line for the preparation step */
	prepareExport(data: string): string;
	/** Returns the log line for the export step */
	doExport(folder: string): string;
}

export interface ExporterPair {
	video: MediaExporter;
	audio: MediaExporter;
}

export class CodecExporter implements MediaExporter {
	constructor(
		readonly kind: MediaKind,
		readonly format: string,
	) {}

	prepareExport(data: string): string {
		return `Preparing ${this.kind} data (${data.length} chars) for ${this.format} export.`;
	}

	doExport(folder: string): string {
		return `Exporting ${this.kind} data in ${this.format} format to ${folder}.`;
	}
}

export function createVideoExporterRegistry(): VariantRegistry<MediaExporter> {
	const registry = new VariantRegistry<MediaExporter>("VideoExporterRegistry");
	registry.register("lossless", () => new CodecExporter("video", "lossless"));
	registry.register("h264-baseline", () => new CodecExporter("video", "H.264 (Baseline)"));
	registry.register("h264-hi422p", () => new CodecExporter("video", "H.264 (Hi422P)"), {
		description: "10-bit, 4:2:2 chroma sampling",
	});
	return registry;
}

export function createAudioExporterRegistry(): VariantRegistry<MediaExporter> {
	const registry = new VariantRegistry<MediaExporter>("AudioExporterRegistry");
	registry.register("aac", () => new CodecExporter("audio", "AAC"));
	registry.register("wav", () => new CodecExporter("audio", "WAV"), { description: "Lossless" });
	return registry;
}

/**
 * Quality presets. Every create() call builds a fresh pair.
 */
export function createQualityRegistry(
	video: VariantRegistry<MediaExporter> = createVideoExporterRegistry(),
	audio: VariantRegistry<MediaExporter> = createAudioExporterRegistry(),
): VariantRegistry<ExporterPair> {
	const registry = new VariantRegistry<ExporterPair>("ExportQualityRegistry");
	const pair = (videoKey: string, audioKey: string) => (): ExporterPair => ({
		video: video.create(videoKey),
		audio: audio.create(audioKey),
	});

	registry.register("low", pair("h264-baseline", "aac"), { description: "Fast, lower quality" });
	registry.register("high", pair("h264-hi422p", "aac"), { description: "Slower, high quality" });
	registry.register("master", pair("lossless", "wav"), { description: "Lossless video and audio" });
	return registry;
}

export interface ExportInput {
	video: string;
	audio: string;
}

/**
 * Prepare both streams, then export both. Returns the log lines in order.
 */
export function runExport(
	pair: ExporterPair,
	folder: string,
	input: ExportInput = { video: "", audio: "" },
): string[] {
	return [
		pair.video.prepareExport(input.video),
		pair.audio.prepareExport(input.audio),
		pair.video.doExport(folder),
		pair.audio.doExport(folder),
	];
}
