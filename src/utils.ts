import { shortReadError, shortWriteError } from "./errors";

export type Vec3 = [number, number, number];

type NumberCodec = {
	size: number,
	read(buf: Buffer, offset: number): number,
	write(buf: Buffer, v: number, offset: number): void
};

//all reads and writes go through this table so every field has an explicit byte order
export const numberTypes = {
	ubyte: {
		size: 1,
		read(b, o) { return b.readUInt8(o); },
		write(b, v, o) { b.writeUInt8(v, o); }
	},
	ushortbe: {
		size: 2,
		read(b, o) { return b.readUInt16BE(o); },
		write(b, v, o) { b.writeUInt16BE(v, o); }
	},
	shortbe: {
		size: 2,
		read(b, o) { return b.readInt16BE(o); },
		write(b, v, o) { b.writeInt16BE(v, o); }
	},
	intle: {
		size: 4,
		read(b, o) { return b.readInt32LE(o); },
		write(b, v, o) { b.writeInt32LE(v, o); }
	},
	intbe: {
		size: 4,
		read(b, o) { return b.readInt32BE(o); },
		write(b, v, o) { b.writeInt32BE(v, o); }
	},
	uintbe: {
		size: 4,
		read(b, o) { return b.readUInt32BE(o); },
		write(b, v, o) { b.writeUInt32BE(v, o); }
	},
	floatle: {
		size: 4,
		read(b, o) { return b.readFloatLE(o); },
		write(b, v, o) { b.writeFloatLE(v, o); }
	},
	floatbe: {
		size: 4,
		read(b, o) { return b.readFloatBE(o); },
		write(b, v, o) { b.writeFloatBE(v, o); }
	}
} satisfies Record<string, NumberCodec>;

export type NumberType = keyof typeof numberTypes;

export class Stream {
	private data: Buffer;
	private scan: number;

	constructor(data: Buffer, scan = 0) {
		this.data = data;
		this.scan = scan;
	}

	getData() {
		return this.data;
	}
	scanloc() {
		return this.scan;
	}
	bytesLeft() {
		return this.data.length - this.scan;
	}
	eof() {
		return this.scan >= this.data.length;
	}
	tee() {
		return new Stream(this.data, this.scan);
	}

	private take(len: number) {
		if (this.scan + len > this.data.length) {
			throw shortReadError(len, Math.max(0, this.data.length - this.scan), this.scan);
		}
		let offset = this.scan;
		this.scan += len;
		return offset;
	}

	skip(n: number) {
		this.take(n);
		return this;
	}

	read(type: NumberType) {
		let codec = numberTypes[type];
		return codec.read(this.data, this.take(codec.size));
	}

	readUByte() {
		return this.read("ubyte");
	}
	readInt(bigendian = false) {
		return this.read(bigendian ? "intbe" : "intle");
	}
	readFloat(bigendian = false) {
		return this.read(bigendian ? "floatbe" : "floatle");
	}
	readVec3(bigendian = false): Vec3 {
		return [this.readFloat(bigendian), this.readFloat(bigendian), this.readFloat(bigendian)];
	}

	readBuffer(len = this.data.length - this.scan) {
		let offset = this.take(len);
		return this.data.subarray(offset, offset + len);
	}

	/**
	 * Reads a fixed size text field, the value ends at the first nul byte
	 */
	readFixedString(len: number) {
		let raw = this.readBuffer(len);
		let end = raw.indexOf(0);
		return raw.toString("latin1", 0, end == -1 ? len : end);
	}

	/**
	 * Reads a nul terminated string, a missing terminator is a short read
	 */
	readCString() {
		let end = this.data.indexOf(0, this.scan);
		if (end == -1) {
			throw shortReadError(this.bytesLeft() + 1, this.bytesLeft(), this.scan);
		}
		let str = this.data.toString("latin1", this.scan, end);
		this.scan = end + 1;
		return str;
	}

	readTag() {
		return this.readBuffer(4).toString("latin1");
	}
}

/**
 * Writes into a buffer of known size. Sizes of all our output formats can be
 * computed up front so there is never any need to grow.
 */
export class Encoder {
	private buffer: Buffer;
	private scan = 0;

	constructor(size: number) {
		this.buffer = Buffer.alloc(size);
	}

	scanloc() {
		return this.scan;
	}

	private reserve(len: number) {
		if (this.scan + len > this.buffer.length) {
			throw shortWriteError(len, this.buffer.length - this.scan, this.scan);
		}
		let offset = this.scan;
		this.scan += len;
		return offset;
	}

	write(type: NumberType, v: number) {
		let codec = numberTypes[type];
		codec.write(this.buffer, v, this.reserve(codec.size));
		return this;
	}

	//overwrite a value that was reserved earlier, used for chunk lengths
	patch(type: NumberType, v: number, offset: number) {
		let codec = numberTypes[type];
		if (offset < 0 || offset + codec.size > this.scan) {
			throw shortWriteError(codec.size, Math.max(0, this.scan - offset), offset);
		}
		codec.write(this.buffer, v, offset);
		return this;
	}

	writeBuffer(data: Uint8Array) {
		let offset = this.reserve(data.length);
		this.buffer.set(data, offset);
		return this;
	}

	writeCString(str: string) {
		let len = Buffer.byteLength(str, "latin1");
		let offset = this.reserve(len + 1);
		this.buffer.write(str, offset, len, "latin1");
		this.buffer[offset + len] = 0;
		return this;
	}

	writeTag(tag: string) {
		if (tag.length != 4) { throw new Error(`chunk tag must be 4 characters, got "${tag}"`); }
		let offset = this.reserve(4);
		this.buffer.write(tag, offset, 4, "latin1");
		return this;
	}

	getData() {
		if (this.scan != this.buffer.length) {
			throw shortWriteError(this.buffer.length, this.scan, this.scan);
		}
		return this.buffer;
	}
}

export function cStringSize(str: string) {
	return Buffer.byteLength(str, "latin1") + 1;
}

/**
 * Strips the final extension off a file name, "dir/model.mdl" -> "dir/model"
 */
export function stripExtension(filename: string) {
	let slash = Math.max(filename.lastIndexOf("/"), filename.lastIndexOf("\\"));
	let dot = filename.lastIndexOf(".");
	return (dot > slash ? filename.slice(0, dot) : filename);
}

export function formatSize(bytes: number) {
	if (bytes < 1024) { return `${bytes} B`; }
	if (bytes < 1024 * 1024) { return `${(bytes / 1024).toFixed(1)} KB`; }
	return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}
