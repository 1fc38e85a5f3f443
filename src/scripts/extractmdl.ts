import prettyJson from "json-stringify-pretty-compact";
import { triConstants } from "../constants";
import { reconstructFrame } from "../3d/framegeometry";
import { writeLbm } from "../3d/lbmimage";
import { FrameRecord, MdlHeader, MdlReader } from "../3d/mdlmodel";
import { writeTriFile } from "../3d/trifile";
import { palettedToImageData, pixelsToImageFile } from "../imgutils";
import { defaultPalette, Palette } from "../palette";
import { ScriptFS, ScriptOutput } from "../scriptrunner";

export type ExtractOpts = {
	palette: Palette | null,
	png: boolean,
	json: boolean,
	lenientFrameCount: boolean,
	texturename: string,
	//name written after the end marker, defaults to the object name
	endname: string | null
}

export function defaultExtractOpts(): ExtractOpts {
	return {
		palette: null,
		png: false,
		json: false,
		lenientFrameCount: false,
		texturename: triConstants.defaulttexturename,
		endname: null
	};
}

export type ExtractedFrame = {
	file: string,
	name: string,
	frameindex: number,
	subindex: number | null
}

export type ExtractSummary = {
	header: MdlHeader,
	skins: string[],
	frames: ExtractedFrame[]
}

export function frameFilename(basename: string, rec: FrameRecord) {
	if (rec.type == "single") {
		return `${basename}_frame${rec.frameindex}.tri`;
	} else {
		return `${basename}_frame${rec.frameindex}_sub${rec.subindex}.tri`;
	}
}

export function skinFilename(basename: string, index: number, ext = "lbm") {
	return `${basename}_skin${index}.${ext}`;
}

export function describeHeader(header: MdlHeader) {
	let vec = (v: number[]) => `(${v.map(q => q.toFixed(4)).join(", ")})`;
	return [
		`version: ${header.version}`,
		`skins: ${header.numskins} (${header.skinwidth}x${header.skinheight})`,
		`vertices: ${header.numverts}`,
		`triangles: ${header.numtris}`,
		`frames: ${header.numframes}`,
		`sync type: ${header.synctype ?? `unknown (${header.rawsynctype})`}`,
		`scale: ${vec(header.scale)}`,
		`scale origin: ${vec(header.scaleorigin)}`
	];
}

/**
 * Converts a model file into one bitmap per skin and one triangle file per
 * frame. Files are written as soon as their part of the model is decoded.
 */
export async function extractMdl(output: ScriptOutput, outdir: ScriptFS, basename: string, data: Buffer, opts: Partial<ExtractOpts> = {}) {
	let { palette, png, json, lenientFrameCount, texturename, endname } = { ...defaultExtractOpts(), ...opts };
	let skinpalette = palette ?? defaultPalette();

	let reader = new MdlReader(data, { lenientFrameCount, warn: msg => output.warn(msg) });
	let header = reader.header;
	output.log("model header:");
	describeHeader(header).forEach(line => output.log(`  ${line}`));

	let summary: ExtractSummary = { header, skins: [], frames: [] };

	for (let skin of reader.readSkins()) {
		let filename = skinFilename(basename, skin.index);
		output.log(`saving skin ${skin.index} to ${filename} (${skin.width}x${skin.height} pixels)`);
		await outdir.writeFile(filename, writeLbm(skin.pixels, skin.width, skin.height, skinpalette));
		summary.skins.push(filename);
		if (png) {
			let img = palettedToImageData(skin.pixels, skin.width, skin.height, skinpalette);
			await outdir.writeFile(skinFilename(basename, skin.index, "png"), await pixelsToImageFile(img, "png", 1));
		}
	}

	//only read to move past them, texture coordinates aren't part of the triangle output
	reader.readTexCoords();
	let triangles = reader.readTriangles();

	for (let rec of reader.readFrames()) {
		let filename = frameFilename(basename, rec);
		let name = rec.frame.name || triConstants.defaultobjectname;
		let tris = reconstructFrame(header, triangles, rec.frame.verts);
		let file = writeTriFile({ name, texture: texturename, triangles: tris }, endname ?? name);
		if (rec.type == "single") {
			output.log(`saving frame ${rec.frameindex} ('${rec.frame.name}') to ${filename}`);
		} else {
			output.log(`saving group frame ${rec.frameindex} (sub-frame ${rec.subindex} '${rec.frame.name}') to ${filename}`);
		}
		await outdir.writeFile(filename, file);
		summary.frames.push({
			file: filename,
			name: rec.frame.name,
			frameindex: rec.frameindex,
			subindex: (rec.type == "group" ? rec.subindex : null)
		});
	}

	if (json) {
		await outdir.writeFile(`${basename}_info.json`, prettyJson(summary));
	}
	output.log(`extracted ${summary.skins.length} skins and ${summary.frames.length} frames`);
	return summary;
}
