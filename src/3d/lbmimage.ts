import { lbmConstants } from "../constants";
import { FormatError } from "../errors";
import { checkPalette, Palette } from "../palette";
import { Encoder, Stream } from "../utils";

//IFF "PBM " (packed bitmap) files, all lengths and multi byte fields big endian

export type BitmapHeader = {
	width: number,
	height: number,
	x: number,
	y: number,
	nplanes: number,
	masking: number,
	compression: number,
	transparentcolor: number,
	xaspect: number,
	yaspect: number,
	pagewidth: number,
	pageheight: number
}

export type LbmImage = {
	header: BitmapHeader,
	palette: Palette | null,
	pixels: Buffer,
	formlength: number,
	chunks: { tag: string, length: number }[]
}

function paddedSize(len: number) {
	return len + (len & 1);
}

/**
 * Total on disk size of a chunk including its tag, length and pad byte
 */
export function iffChunkSize(contentlength: number) {
	return 8 + paddedSize(contentlength);
}

export function lbmFileSize(width: number, height: number) {
	return 12
		+ iffChunkSize(lbmConstants.bmhdsize)
		+ iffChunkSize(lbmConstants.palettesize)
		+ iffChunkSize(width * height);
}

/**
 * Writes a chunk with a length placeholder, the length is patched in after
 * the content callback is done and a pad byte is added for odd lengths
 */
function writeChunk(enc: Encoder, tag: string, content: (enc: Encoder) => void) {
	enc.writeTag(tag);
	let lenoffset = enc.scanloc();
	enc.write("uintbe", 0);
	content(enc);
	let len = enc.scanloc() - lenoffset - 4;
	enc.patch("uintbe", len, lenoffset);
	if (len & 1) { enc.write("ubyte", 0); }
}

export function writeLbm(pixels: Uint8Array, width: number, height: number, palette: Palette) {
	if (width < 0 || height < 0 || width > 0xffff || height > 0xffff) {
		throw new FormatError(`Image size ${width}x${height} does not fit a bitmap header`);
	}
	if (pixels.length != width * height) {
		throw new FormatError(`Pixel data is ${pixels.length} bytes, expected ${width}x${height}=${width * height}`);
	}
	checkPalette(palette);

	let enc = new Encoder(lbmFileSize(width, height));
	writeChunk(enc, "FORM", enc => {
		enc.writeTag(lbmConstants.formtype);
		writeChunk(enc, "BMHD", enc => {
			enc.write("ushortbe", width);
			enc.write("ushortbe", height);
			enc.write("shortbe", 0);//x
			enc.write("shortbe", 0);//y
			enc.write("ubyte", lbmConstants.nplanes);
			enc.write("ubyte", lbmConstants.masking.none);
			enc.write("ubyte", lbmConstants.compression.none);
			enc.write("ubyte", 0);//pad1
			enc.write("ushortbe", 0);//transparent color
			enc.write("ubyte", lbmConstants.xaspect);
			enc.write("ubyte", lbmConstants.yaspect);
			//page size mirrors the image size
			enc.write("ushortbe", width);
			enc.write("ushortbe", height);
		});
		writeChunk(enc, "CMAP", enc => enc.writeBuffer(palette));
		writeChunk(enc, "BODY", enc => enc.writeBuffer(pixels));
	});
	return enc.getData();
}

function readBitmapHeader(stream: Stream): BitmapHeader {
	let width = stream.read("ushortbe");
	let height = stream.read("ushortbe");
	let x = stream.read("shortbe");
	let y = stream.read("shortbe");
	let nplanes = stream.readUByte();
	let masking = stream.readUByte();
	let compression = stream.readUByte();
	stream.skip(1);//pad1
	let transparentcolor = stream.read("ushortbe");
	let xaspect = stream.readUByte();
	let yaspect = stream.readUByte();
	let pagewidth = stream.read("ushortbe");
	let pageheight = stream.read("ushortbe");
	return { width, height, x, y, nplanes, masking, compression, transparentcolor, xaspect, yaspect, pagewidth, pageheight };
}

/**
 * Reads back an uncompressed packed bitmap
 */
export function readLbm(data: Buffer): LbmImage {
	let stream = new Stream(data);
	let formtag = stream.readTag();
	if (formtag != "FORM") {
		throw new FormatError(`Not an IFF file, outer chunk is "${formtag}"`, 0);
	}
	let formlength = stream.read("uintbe");
	let formend = stream.scanloc() + formlength;
	let formtype = stream.readTag();
	if (formtype != lbmConstants.formtype) {
		throw new FormatError(`Unsupported IFF form type "${formtype}"`, 8);
	}
	let header: BitmapHeader | null = null;
	let palette: Palette | null = null;
	let pixels: Buffer | null = null;
	let chunks: LbmImage["chunks"] = [];
	while (stream.scanloc() < formend) {
		let tag = stream.readTag();
		let length = stream.read("uintbe");
		let content = new Stream(stream.readBuffer(length));
		if (length & 1) { stream.skip(1); }
		chunks.push({ tag, length });
		if (tag == "BMHD") {
			header = readBitmapHeader(content);
		} else if (tag == "CMAP") {
			palette = checkPalette(content.readBuffer());
		} else if (tag == "BODY") {
			pixels = content.readBuffer();
		}
	}
	if (!header) { throw new FormatError("Bitmap file has no BMHD chunk"); }
	if (!pixels) { throw new FormatError("Bitmap file has no BODY chunk"); }
	if (header.compression != lbmConstants.compression.none) {
		throw new FormatError(`Unsupported bitmap compression ${header.compression}`);
	}
	if (pixels.length != header.width * header.height) {
		throw new FormatError(`Bitmap body is ${pixels.length} bytes, expected ${header.width}x${header.height}`);
	}
	return { header, palette, pixels, formlength, chunks };
}
