import { lbmConstants } from "./constants";
import { FormatError } from "./errors";
import defaultPaletteColors from "./assets/quakepalette.json";

/**
 * 256 rgb triplets, 768 bytes
 */
export type Palette = Uint8Array;

export function checkPalette<T extends Uint8Array>(palette: T): T {
	if (palette.length != lbmConstants.palettesize) {
		throw new FormatError(`Palette must be ${lbmConstants.palettesize} bytes, got ${palette.length}`);
	}
	return palette;
}

export function paletteFromHexColors(colors: unknown): Palette {
	if (!Array.isArray(colors) || colors.length != 256) {
		throw new FormatError(`Palette json must be an array of 256 colors, got ${Array.isArray(colors) ? colors.length + " entries" : typeof colors}`);
	}
	let res = new Uint8Array(lbmConstants.palettesize);
	colors.forEach((col: unknown, i) => {
		if (typeof col != "string" || !/^#?[0-9a-fA-F]{6}$/.test(col)) {
			throw new FormatError(`Palette entry ${i} is not an rrggbb hex color: ${JSON.stringify(col)}`);
		}
		let rgb = parseInt(col.replace(/^#/, ""), 16);
		res[i * 3 + 0] = (rgb >> 16) & 0xff;
		res[i * 3 + 1] = (rgb >> 8) & 0xff;
		res[i * 3 + 2] = rgb & 0xff;
	});
	return res;
}

let defaultPaletteCache: Palette | null = null;
export function defaultPalette(): Palette {
	defaultPaletteCache ??= paletteFromHexColors(defaultPaletteColors);
	return defaultPaletteCache;
}

/**
 * Loads a palette from either a json array of hex colors or a raw 768 byte
 * palette lump
 */
export function loadPaletteFile(filename: string, data: Buffer): Palette {
	if (filename.toLowerCase().endsWith(".json")) {
		let parsed: unknown;
		try {
			parsed = JSON.parse(data.toString("utf8"));
		} catch (e) {
			throw new FormatError(`Palette file ${filename} is not valid json: ${e instanceof Error ? e.message : e}`);
		}
		return paletteFromHexColors(parsed);
	}
	return checkPalette(new Uint8Array(data));
}
