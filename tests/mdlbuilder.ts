import { Vec3 } from "../src/utils";

export type TestHeader = {
	ident: number,
	version: number,
	scale: Vec3,
	scaleorigin: Vec3,
	boundingradius: number,
	eyeposition: Vec3,
	numskins: number,
	skinwidth: number,
	skinheight: number,
	numverts: number,
	numtris: number,
	numframes: number,
	synctype: number,
	flags: number,
	size: number
}

export type TestVertex = [number, number, number, number];

export type TestFrame = {
	name: string,
	verts: TestVertex[]
}

export function defaultTestHeader(): TestHeader {
	return {
		ident: 0x4f504449,
		version: 6,
		scale: [1, 1, 1],
		scaleorigin: [0, 0, 0],
		boundingradius: 1,
		eyeposition: [0, 0, 0],
		numskins: 1,
		skinwidth: 4,
		skinheight: 4,
		numverts: 3,
		numtris: 1,
		numframes: 1,
		synctype: 0,
		flags: 0,
		size: 1
	};
}

/**
 * Writes little endian model files piece by piece, nothing is validated so
 * broken files can be built just as easily
 */
export class MdlBuilder {
	private parts: Buffer[] = [];

	int(v: number) {
		let b = Buffer.alloc(4);
		b.writeInt32LE(v);
		this.parts.push(b);
		return this;
	}
	float(v: number) {
		let b = Buffer.alloc(4);
		b.writeFloatLE(v);
		this.parts.push(b);
		return this;
	}
	vec3(v: Vec3) {
		return this.float(v[0]).float(v[1]).float(v[2]);
	}
	bytes(data: Uint8Array | number[]) {
		this.parts.push(Buffer.from(data));
		return this;
	}

	header(overrides: Partial<TestHeader> = {}) {
		let h = { ...defaultTestHeader(), ...overrides };
		this.int(h.ident).int(h.version);
		this.vec3(h.scale).vec3(h.scaleorigin).float(h.boundingradius).vec3(h.eyeposition);
		this.int(h.numskins).int(h.skinwidth).int(h.skinheight);
		this.int(h.numverts).int(h.numtris).int(h.numframes);
		this.int(h.synctype).int(h.flags).float(h.size);
		return this;
	}
	skin(pixels: number[], kind = 0) {
		return this.int(kind).bytes(pixels);
	}
	texcoord(onseam: number, s: number, t: number) {
		return this.int(onseam).int(s).int(t);
	}
	triangle(facesfront: number, a: number, b: number, c: number) {
		return this.int(facesfront).int(a).int(b).int(c);
	}
	vertex(v: TestVertex) {
		return this.bytes(v);
	}
	private frameBody(frame: TestFrame) {
		//bbox is not used by the reader, fill in something recognizable
		this.vertex([0, 0, 0, 0]).vertex([255, 255, 255, 0]);
		let name = Buffer.alloc(16);
		name.write(frame.name, "latin1");
		this.bytes(name);
		frame.verts.forEach(v => this.vertex(v));
		return this;
	}
	singleFrame(frame: TestFrame) {
		this.int(0);
		return this.frameBody(frame);
	}
	groupFrame(frames: TestFrame[], count = frames.length) {
		this.int(1).int(count);
		this.vertex([0, 0, 0, 0]).vertex([255, 255, 255, 0]);
		frames.forEach((f, i) => this.float(0.1 * (i + 1)));
		frames.forEach(f => this.frameBody(f));
		return this;
	}

	build() {
		return Buffer.concat(this.parts);
	}
}

export const testSkinPixels = Array.from({ length: 16 }, (v, i) => i * 3);

/**
 * Header, one 4x4 skin, three texture vertices and one triangle, ready for
 * frames to be added
 */
export function modelPrefix(overrides: Partial<TestHeader> = {}) {
	return new MdlBuilder()
		.header(overrides)
		.skin(testSkinPixels)
		.texcoord(0, 0, 0)
		.texcoord(1, 4, 0)
		.texcoord(0, 0, 4)
		.triangle(1, 0, 1, 2);
}

export function testFrame(name: string, offset = 0): TestFrame {
	return {
		name,
		verts: [[offset, 0, 0, 1], [offset + 2, 0, 0, 2], [offset, 4, 6, 3]]
	};
}
