import { readLbm } from "../3d/lbmimage";
import { readMdlHeader } from "../3d/mdlmodel";
import { readTriFile } from "../3d/trifile";
import { FormatError } from "../errors";
import { ScriptFS, ScriptOutput } from "../scriptrunner";
import { formatSize, Stream } from "../utils";
import { describeHeader } from "./extractmdl";

export function describeTriFile(data: Buffer) {
	let file = readTriFile(data);
	let lines: string[] = [];
	for (let obj of file.objects) {
		lines.push(`object '${obj.name}': ${obj.triangles.length} triangles, texture '${obj.texture}'`);
		if (obj.triangles.length != 0) {
			let min = [Infinity, Infinity, Infinity];
			let max = [-Infinity, -Infinity, -Infinity];
			for (let tri of obj.triangles) {
				for (let vert of tri.verts) {
					for (let a = 0; a < 3; a++) {
						min[a] = Math.min(min[a], vert.pos[a]);
						max[a] = Math.max(max[a], vert.pos[a]);
					}
				}
			}
			lines.push(`  bounds: (${min.join(", ")}) - (${max.join(", ")})`);
		}
	}
	lines.push(`end markers: ${file.endnames.map(q => `'${q}'`).join(", ")}`);
	return lines;
}

export function describeLbmFile(data: Buffer) {
	let img = readLbm(data);
	let lines = [
		`bitmap ${img.header.width}x${img.header.height}, ${img.header.nplanes} planes, compression ${img.header.compression}`,
		`palette: ${img.palette ? "yes" : "no"}`,
		`FORM length: ${img.formlength}`
	];
	for (let chunk of img.chunks) {
		lines.push(`  ${chunk.tag} ${chunk.length} bytes`);
	}
	return lines;
}

export async function inspectFile(output: ScriptOutput, fs: ScriptFS, filename: string) {
	let data = await fs.readFileBuffer(filename);
	let ext = filename.toLowerCase().match(/\.(\w+)$/)?.[1] ?? "";
	output.log(`${filename} (${formatSize(data.length)})`);
	let lines: string[];
	if (ext == "mdl") {
		lines = describeHeader(readMdlHeader(new Stream(data), msg => output.warn(msg)));
	} else if (ext == "tri") {
		lines = describeTriFile(data);
	} else if (ext == "lbm") {
		lines = describeLbmFile(data);
	} else {
		throw new FormatError(`Don't know how to inspect '.${ext}' files, expected .mdl, .tri or .lbm`);
	}
	lines.forEach(line => output.log(line));
	return lines;
}
