import { mdlConstants } from "../constants";
import { FormatError } from "../errors";
import { Stream, Vec3 } from "../utils";

export type SyncType = "sync" | "rand";
export type SkinKind = "single" | "group";
export type FrameType = "single" | "group";

export type MdlHeader = {
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
	//null when the stored value has no name, rawsynctype keeps it
	synctype: SyncType | null,
	rawsynctype: number,
	flags: number,
	size: number
}

export type SkinRecord = {
	index: number,
	//advisory only, every skin is read with the single layout
	kind: SkinKind | null,
	rawkind: number,
	width: number,
	height: number,
	pixels: Buffer
}

export type TextureVertex = {
	onseam: boolean,
	s: number,
	t: number
}

export type TriangleIndex = {
	facesfront: boolean,
	vertindex: [number, number, number]
}

export type PackedVertex = {
	v: [number, number, number],
	lightnormalindex: number
}

export type SingleFrame = {
	name: string,
	bboxmin: PackedVertex,
	bboxmax: PackedVertex,
	verts: PackedVertex[]
}

export type FrameGroupInfo = {
	count: number,
	bboxmin: PackedVertex,
	bboxmax: PackedVertex,
	intervals: number[]
}

/**
 * One decoded frame. frameindex is the logical frame counter at the start of
 * the frame stream entry, so all members of a group share it.
 */
export type FrameRecord = {
	type: "single",
	frameindex: number,
	frame: SingleFrame
} | {
	type: "group",
	frameindex: number,
	subindex: number,
	group: FrameGroupInfo,
	frame: SingleFrame
}

export type MdlReadOpts = {
	//stop as soon as the frame counter reaches numframes instead of requiring an exact match
	lenientFrameCount?: boolean,
	warn?: (msg: string) => void
}

type ReadPhase = "skins" | "texcoords" | "triangles" | "frames" | "done";

const phaseOrder: ReadPhase[] = ["skins", "texcoords", "triangles", "frames", "done"];

function enumValue<T extends string>(names: readonly T[], value: number, what: string, offset: number): T {
	let name = names[value];
	if (name === undefined) {
		throw new FormatError(`Unknown ${what}: ${value} at offset ${offset}`, offset);
	}
	return name;
}

function namedValue<T extends string>(names: readonly T[], value: number): T | null {
	return names[value] ?? null;
}

const syncTypes = ["sync", "rand"] as const;
const skinKinds = ["single", "group"] as const;
const frameTypes = ["single", "group"] as const;

/**
 * Reads the header of a model file. The ident and version are checked before
 * anything else is read so a foreign file fails on its first 8 bytes.
 */
export function readMdlHeader(stream: Stream, warn: (msg: string) => void = () => { }): MdlHeader {
	let ident = stream.readInt();
	let version = stream.readInt();
	if (ident != mdlConstants.ident) {
		throw new FormatError(`Invalid model file: ident 0x${(ident >>> 0).toString(16)} does not match IDPO (0x${mdlConstants.ident.toString(16)})`, 0);
	}
	if (version != mdlConstants.version) {
		throw new FormatError(`Invalid model file: version ${version}, expected ${mdlConstants.version}`, 4);
	}
	let scale = stream.readVec3();
	let scaleorigin = stream.readVec3();
	let boundingradius = stream.readFloat();
	let eyeposition = stream.readVec3();

	let countsoffset = stream.scanloc();
	let numskins = stream.readInt();
	let skinwidth = stream.readInt();
	let skinheight = stream.readInt();
	let numverts = stream.readInt();
	let numtris = stream.readInt();
	let numframes = stream.readInt();
	let counts = { numskins, skinwidth, skinheight, numverts, numtris, numframes };
	Object.entries(counts).forEach(([name, value], i) => {
		if (value < 0) {
			throw new FormatError(`Header field ${name} is negative: ${value}`, countsoffset + i * 4);
		}
	});

	let rawsynctype = stream.readInt();
	let synctype = namedValue(syncTypes, rawsynctype);
	if (synctype == null) {
		warn(`unknown sync type ${rawsynctype}`);
	}
	let flags = stream.readInt();
	let size = stream.readFloat();

	return {
		ident, version,
		scale, scaleorigin, boundingradius, eyeposition,
		...counts,
		synctype, rawsynctype, flags, size
	};
}

/**
 * Sequential reader for alias model files. The sections have to be consumed
 * in file order: skins, texture coordinates, triangles and then frames.
 */
export class MdlReader {
	readonly header: MdlHeader;
	private stream: Stream;
	private phase: ReadPhase = "skins";
	private lenientFrameCount: boolean;
	private warn: (msg: string) => void;

	constructor(data: Buffer | Stream, opts: MdlReadOpts = {}) {
		this.stream = (data instanceof Stream ? data : new Stream(data));
		this.lenientFrameCount = opts.lenientFrameCount ?? false;
		this.warn = opts.warn ?? (() => { });
		this.header = readMdlHeader(this.stream, this.warn);
	}

	private enterPhase(phase: ReadPhase) {
		if (this.phase != phase) {
			let missing = phaseOrder.slice(phaseOrder.indexOf(this.phase), phaseOrder.indexOf(phase));
			if (missing.length == 0) {
				throw new Error(`model section ${phase} was already read`);
			}
			throw new Error(`model section ${phase} can't be read before ${missing.join(", ")}`);
		}
	}

	*readSkins(): Generator<SkinRecord> {
		this.enterPhase("skins");
		let { numskins, skinwidth, skinheight } = this.header;
		for (let index = 0; index < numskins; index++) {
			let rawkind = this.stream.readInt();
			let kind = namedValue(skinKinds, rawkind);
			if (kind == "group") {
				this.warn(`skin ${index} is a skin group, reading it as a single skin`);
			} else if (kind == null) {
				this.warn(`skin ${index} has unknown type ${rawkind}, reading it as a single skin`);
			}
			let pixels = this.stream.readBuffer(skinwidth * skinheight);
			yield { index, kind, rawkind, width: skinwidth, height: skinheight, pixels };
		}
		this.phase = "texcoords";
	}

	readTexCoords(): TextureVertex[] {
		this.enterPhase("texcoords");
		let res: TextureVertex[] = [];
		for (let i = 0; i < this.header.numverts; i++) {
			let onseam = this.stream.readInt() != 0;
			let s = this.stream.readInt();
			let t = this.stream.readInt();
			res.push({ onseam, s, t });
		}
		this.phase = "triangles";
		return res;
	}

	readTriangles(): TriangleIndex[] {
		this.enterPhase("triangles");
		let { numtris, numverts } = this.header;
		let res: TriangleIndex[] = [];
		for (let i = 0; i < numtris; i++) {
			let facesfront = this.stream.readInt() != 0;
			let vertindex: [number, number, number] = [0, 0, 0];
			for (let c = 0; c < 3; c++) {
				let offset = this.stream.scanloc();
				let index = this.stream.readInt();
				if (index < 0 || index >= numverts) {
					throw new FormatError(`Triangle ${i} corner ${c} references vertex ${index}, model only has ${numverts} vertices`, offset);
				}
				vertindex[c] = index;
			}
			res.push({ facesfront, vertindex });
		}
		this.phase = "frames";
		return res;
	}

	private readPackedVertex(): PackedVertex {
		let x = this.stream.readUByte();
		let y = this.stream.readUByte();
		let z = this.stream.readUByte();
		let lightnormalindex = this.stream.readUByte();
		return { v: [x, y, z], lightnormalindex };
	}

	private readSingleFrame(): SingleFrame {
		let bboxmin = this.readPackedVertex();
		let bboxmax = this.readPackedVertex();
		let name = this.stream.readFixedString(mdlConstants.framenamelength);
		let verts: PackedVertex[] = new Array(this.header.numverts);
		for (let i = 0; i < verts.length; i++) {
			verts[i] = this.readPackedVertex();
		}
		return { name, bboxmin, bboxmax, verts };
	}

	private readGroupInfo(): FrameGroupInfo {
		let countoffset = this.stream.scanloc();
		//stored in host order, which for every known file is little endian
		let count = this.stream.readInt();
		if (count < 1 || count > mdlConstants.maxgroupframes) {
			throw new FormatError(`Suspicious group size: ${count} sub-frames (expected 1 to ${mdlConstants.maxgroupframes})`, countoffset);
		}
		let bboxmin = this.readPackedVertex();
		let bboxmax = this.readPackedVertex();
		let intervals: number[] = [];
		for (let i = 0; i < count; i++) {
			intervals.push(this.stream.readFloat());
		}
		return { count, bboxmin, bboxmax, intervals };
	}

	/**
	 * Lazily decodes the frame stream. A single frame advances the logical frame
	 * counter by one, a group by one plus its member count.
	 */
	*readFrames(): Generator<FrameRecord> {
		this.enterPhase("frames");
		let { numframes } = this.header;
		let counter = 0;
		while (counter < numframes) {
			let frameindex = counter;
			let tagoffset = this.stream.scanloc();
			let type: FrameType = enumValue(frameTypes, this.stream.readInt(), "frame type", tagoffset);
			switch (type) {
				case "single": {
					let frame = this.readSingleFrame();
					counter += 1;
					yield { type, frameindex, frame };
					break;
				}
				case "group": {
					let group = this.readGroupInfo();
					counter += 1 + group.count;
					if (counter > numframes && !this.lenientFrameCount) {
						throw new FormatError(`Frame counter overshoot: group at entry ${frameindex} brings the count to ${counter}, header declares ${numframes} frames`, tagoffset);
					}
					for (let subindex = 0; subindex < group.count; subindex++) {
						let frame = this.readSingleFrame();
						yield { type, frameindex, subindex, group, frame };
					}
					break;
				}
				default: {
					let unreachable: never = type;
					throw new FormatError(`Unknown frame type: ${unreachable}`, tagoffset);
				}
			}
		}
		if (!this.stream.eof()) {
			this.warn(`${this.stream.bytesLeft()} bytes left over after the last frame`);
		}
		this.phase = "done";
	}
}
