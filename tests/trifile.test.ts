import { describe, it, expect } from "vitest";
import { ReconstructedTriangle, TriangleCorner } from "../src/3d/framegeometry";
import { readTriFile, triFileSize, writeTriFile } from "../src/3d/trifile";
import { FormatError } from "../src/errors";
import { Vec3 } from "../src/utils";

function corner(pos: Vec3): TriangleCorner {
	return { normal: [0, 0, 0], pos, color: [0, 0, 0], uv: [0, 0] };
}

function triangle(a: Vec3, b: Vec3, c: Vec3): ReconstructedTriangle {
	return { verts: [corner(a), corner(b), corner(c)] };
}

describe("writeTriFile", () => {
	it("writes an empty object", () => {
		let data = writeTriFile({ name: "a", texture: "t", triangles: [] });
		expect(data.toString("hex")).toBe("0001e1ba" + "47c34f80" + "6100" + "00000000" + "c7c34f80" + "6100");
	});

	it("follows the size law", () => {
		let tris = [triangle([1, 2, 3], [4, 5, 6], [7, 8, 9])];
		let obj = { name: "obj", texture: "skin", triangles: tris };
		expect(triFileSize(obj)).toBe(161);
		expect(writeTriFile(obj).length).toBe(161);
		//name, texture and end name strings plus markers and counts
		let overhead = 4 + 4 + 4 + 4 + 5 + 4 + 4;
		for (let n of [0, 1, 2, 10]) {
			let many = Array.from({ length: n }, () => tris[0]);
			let expected = (n == 0 ? overhead - 5 : overhead + n * 3 * 11 * 4);
			expect(writeTriFile({ ...obj, triangles: many }).length).toBe(expected);
		}
	});

	it("writes corner floats big endian", () => {
		let data = writeTriFile({ name: "obj", texture: "skin", triangles: [triangle([1.5, -2, 3], [0, 0, 0], [0, 0, 0])] });
		//magic, marker, "obj\0", count, "skin\0", then the normal
		let first = 4 + 4 + 4 + 4 + 5;
		expect(data.readInt32BE(12)).toBe(1);
		expect(data.readFloatBE(first + 12)).toBe(1.5);
		expect(data.readFloatBE(first + 16)).toBe(-2);
		expect(data.readFloatBE(first + 20)).toBe(3);
	});

	it("writes a custom end name", () => {
		let data = writeTriFile({ name: "obj", texture: "skin", triangles: [] }, "EndOfFile");
		expect(data.subarray(data.length - 10).toString("latin1")).toBe("EndOfFile\0");
		expect(readTriFile(data).endnames).toEqual(["EndOfFile"]);
	});

	it("rejects names with nul bytes", () => {
		expect(() => writeTriFile({ name: "a\0b", texture: "t", triangles: [] })).toThrow(FormatError);
	});
});

describe("readTriFile", () => {
	it("reads back written objects", () => {
		let tris = [triangle([1, 2, 3], [4, 5, 6], [7, 8, 9.5])];
		let file = readTriFile(writeTriFile({ name: "frame1", texture: "default_skin", triangles: tris }));
		expect(file.objects).toEqual([{ name: "frame1", texture: "default_skin", triangles: tris }]);
		expect(file.endnames).toEqual(["frame1"]);
	});

	it("rejects a wrong magic number", () => {
		let data = writeTriFile({ name: "a", texture: "t", triangles: [] });
		data.writeInt32BE(5, 0);
		expect(() => readTriFile(data)).toThrow("Not a triangle file: magic 0x5, expected 0x1e1ba");
	});

	it("rejects negative triangle counts", () => {
		let data = writeTriFile({ name: "a", texture: "t", triangles: [] });
		data.writeInt32BE(-1, 10);
		expect(() => readTriFile(data)).toThrow(FormatError);
	});

	it("rejects unknown markers", () => {
		let data = writeTriFile({ name: "a", texture: "t", triangles: [] });
		data.writeFloatBE(1, 4);
		expect(() => readTriFile(data)).toThrow("Unexpected marker 1 at offset 4");
	});
});
