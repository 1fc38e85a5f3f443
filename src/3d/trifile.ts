import { triConstants } from "../constants";
import { FormatError } from "../errors";
import { cStringSize, Encoder, Stream, Vec3 } from "../utils";
import type { ReconstructedTriangle, TriangleCorner } from "./framegeometry";

/*
 * Alias triangle file, all values big endian
 *   int32 magic (123322)
 *   per object:
 *     float32 99999.0, cstring name, int32 trianglecount
 *     if trianglecount > 0: cstring texturename, trianglecount * 3 * [11 x float32]
 *       corner floats: normal xyz, position xyz, color rgb, u, v
 *   float32 -99999.0, cstring name
 */

export type TriObject = {
	name: string,
	texture: string,
	triangles: ReconstructedTriangle[]
}

export type TriFile = {
	objects: TriObject[],
	endnames: string[]
}

const cornerbytes = triConstants.cornerfloats * 4;

function checkName(name: string, what: string) {
	if (name.includes("\0")) {
		throw new FormatError(`${what} "${name.replace(/\0/g, "\\0")}" contains a nul byte`);
	}
	return name;
}

export function triFileSize(obj: TriObject, endname = obj.name) {
	let size = 4 + 4 + cStringSize(obj.name) + 4;
	if (obj.triangles.length > 0) {
		size += cStringSize(obj.texture) + obj.triangles.length * 3 * cornerbytes;
	}
	size += 4 + cStringSize(endname);
	return size;
}

/**
 * Serializes one frame worth of triangles. The name after the end marker
 * repeats the object name unless an explicit end name is given.
 */
export function writeTriFile(obj: TriObject, endname = obj.name) {
	checkName(obj.name, "object name");
	checkName(obj.texture, "texture name");
	checkName(endname, "end name");
	let enc = new Encoder(triFileSize(obj, endname));
	enc.write("intbe", triConstants.magic);
	enc.write("floatbe", triConstants.floatstart);
	enc.writeCString(obj.name);
	enc.write("intbe", obj.triangles.length);
	if (obj.triangles.length > 0) {
		enc.writeCString(obj.texture);
		for (let tri of obj.triangles) {
			for (let vert of tri.verts) {
				writeCorner(enc, vert);
			}
		}
	}
	enc.write("floatbe", triConstants.floatend);
	enc.writeCString(endname);
	return enc.getData();
}

function writeCorner(enc: Encoder, corner: TriangleCorner) {
	for (let v of corner.normal) { enc.write("floatbe", v); }
	for (let v of corner.pos) { enc.write("floatbe", v); }
	for (let v of corner.color) { enc.write("floatbe", v); }
	enc.write("floatbe", corner.uv[0]);
	enc.write("floatbe", corner.uv[1]);
}

function readCorner(stream: Stream): TriangleCorner {
	let normal: Vec3 = stream.readVec3(true);
	let pos: Vec3 = stream.readVec3(true);
	let color: Vec3 = stream.readVec3(true);
	let uv: [number, number] = [stream.readFloat(true), stream.readFloat(true)];
	return { normal, pos, color, uv };
}

export function readTriFile(data: Buffer): TriFile {
	let stream = new Stream(data);
	let magic = stream.readInt(true);
	if (magic != triConstants.magic) {
		throw new FormatError(`Not a triangle file: magic 0x${(magic >>> 0).toString(16)}, expected 0x${triConstants.magic.toString(16)}`, 0);
	}
	let objects: TriObject[] = [];
	let endnames: string[] = [];
	while (!stream.eof()) {
		let markeroffset = stream.scanloc();
		let marker = stream.readFloat(true);
		if (marker == triConstants.floatend) {
			endnames.push(stream.readCString());
		} else if (marker == triConstants.floatstart) {
			let name = stream.readCString();
			let countoffset = stream.scanloc();
			let count = stream.readInt(true);
			if (count < 0 || count > triConstants.maxtriangles) {
				throw new FormatError(`Suspicious triangle count ${count} in object "${name}"`, countoffset);
			}
			let texture = "";
			let triangles: ReconstructedTriangle[] = [];
			if (count > 0) {
				texture = stream.readCString();
				for (let i = 0; i < count; i++) {
					triangles.push({ verts: [readCorner(stream), readCorner(stream), readCorner(stream)] });
				}
			}
			objects.push({ name, texture, triangles });
		} else {
			throw new FormatError(`Unexpected marker ${marker} at offset ${markeroffset}`, markeroffset);
		}
	}
	return { objects, endnames };
}
