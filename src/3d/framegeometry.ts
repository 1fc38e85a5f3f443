import { FormatError } from "../errors";
import { Vec3 } from "../utils";
import type { MdlHeader, PackedVertex, TriangleIndex } from "./mdlmodel";

export type TriangleCorner = {
	normal: Vec3,
	pos: Vec3,
	color: Vec3,
	uv: [number, number]
}

export type ReconstructedTriangle = {
	verts: [TriangleCorner, TriangleCorner, TriangleCorner]
}

export type VertexScale = Pick<MdlHeader, "scale" | "scaleorigin">;

/**
 * Undoes the byte quantization of a packed coordinate, 0 maps to the origin
 * and 255 to origin + 255 * scale. Evaluated in single precision.
 */
export function unpackCoord(byte: number, scale: number, origin: number) {
	return Math.fround(Math.fround(byte * scale) + origin);
}

export function unpackVertex(vert: PackedVertex, { scale, scaleorigin }: VertexScale): Vec3 {
	return [
		unpackCoord(vert.v[0], scale[0], scaleorigin[0]),
		unpackCoord(vert.v[1], scale[1], scaleorigin[1]),
		unpackCoord(vert.v[2], scale[2], scaleorigin[2])
	];
}

function corner(pos: Vec3): TriangleCorner {
	//normals, colors and uvs are not present in the source data
	return { normal: [0, 0, 0], pos, color: [0, 0, 0], uv: [0, 0] };
}

export function reconstructFrame(scale: VertexScale, triangles: TriangleIndex[], verts: PackedVertex[]): ReconstructedTriangle[] {
	let getpos = (tri: number, c: number) => {
		let index = triangles[tri].vertindex[c];
		let vert = verts[index];
		if (!vert) {
			throw new FormatError(`Triangle ${tri} corner ${c} references vertex ${index}, frame only has ${verts.length} vertices`);
		}
		return unpackVertex(vert, scale);
	}
	let res: ReconstructedTriangle[] = new Array(triangles.length);
	for (let t = 0; t < triangles.length; t++) {
		res[t] = { verts: [corner(getpos(t, 0)), corner(getpos(t, 1)), corner(getpos(t, 2))] };
	}
	return res;
}
