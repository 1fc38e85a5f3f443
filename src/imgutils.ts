//structure similar to ImageData, but without prototype chain or clamped constraint, easy to consume with sharp
import sharp from "sharp";
import { FormatError } from "./errors";
import { checkPalette, Palette } from "./palette";

export type RawImage = {
	data: Uint8Array,
	width: number,
	height: number
}

export function makeImageData(data: Uint8Array | null, width: number, height: number): RawImage {
	if (!data) {
		data = new Uint8Array(width * height * 4);
	}
	if (data.length != width * height * 4) {
		throw new FormatError(`rgba data is ${data.length} bytes, expected ${width * height * 4} for ${width}x${height}`);
	}
	return { data, width, height };
}

/**
 * Expands 8 bit palette indices to rgba, all pixels are opaque
 */
export function palettedToImageData(pixels: Uint8Array, width: number, height: number, palette: Palette) {
	checkPalette(palette);
	let img = makeImageData(null, width, height);
	if (pixels.length != width * height) {
		throw new FormatError(`Pixel data is ${pixels.length} bytes, expected ${width}x${height}=${width * height}`);
	}
	for (let i = 0; i < pixels.length; i++) {
		let col = pixels[i] * 3;
		img.data[i * 4 + 0] = palette[col + 0];
		img.data[i * 4 + 1] = palette[col + 1];
		img.data[i * 4 + 2] = palette[col + 2];
		img.data[i * 4 + 3] = 255;
	}
	return img;
}

export async function pixelsToImageFile(imgdata: RawImage, format: "png" | "webp", quality: number) {
	let img = sharp(imgdata.data, { raw: { width: imgdata.width, height: imgdata.height, channels: 4 } });
	if (format == "png") {
		return img.png().toBuffer();
	} else if (format == "webp") {
		return img.webp({ quality: quality * 100 }).toBuffer();
	} else {
		throw new Error("unknown format");
	}
}
