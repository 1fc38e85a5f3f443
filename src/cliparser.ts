import * as cmdts from "cmd-ts";
import fs from "fs";
import path from "path";
import { IoError } from "./errors";
import { defaultPalette, loadPaletteFile, Palette } from "./palette";
import { CLIScriptFS, ScriptFS } from "./scriptrunner";
import { stripExtension } from "./utils";

export type InputFile = {
	fs: ScriptFS,
	filename: string,
	//file name without its final extension
	basename: string
}

export const InputFileType: cmdts.Type<string, InputFile> = {
	async from(str) {
		let stat = await fs.promises.stat(str).catch(e => {
			throw new IoError(`Error opening ${str} for read: ${e instanceof Error ? e.message : e}`, -1, { cause: e });
		});
		if (!stat.isFile()) { throw new IoError(`Error opening ${str} for read: not a file`); }
		let filename = path.basename(str);
		return { fs: new CLIScriptFS(path.dirname(str)), filename, basename: stripExtension(filename) };
	},
	displayName: "file",
	description: "The file to read"
};

export const PaletteSource: cmdts.Type<string, Palette> = {
	async from(str) {
		let data = await fs.promises.readFile(str).catch(e => {
			throw new IoError(`Error opening palette ${str} for read: ${e instanceof Error ? e.message : e}`, -1, { cause: e });
		});
		return loadPaletteFile(str, data);
	},
	defaultValue: () => defaultPalette(),
	description: "A 768 byte palette lump or a json array of 256 rrggbb colors, defaults to the built-in palette"
};

export function cliFsOutputType(): cmdts.Type<string, ScriptFS | null> {
	return {
		async from(str) { return new CLIScriptFS(str); },
		defaultValue() { return null; },
		description: "Where to save files, defaults to the directory of the input file"
	};
}

export function cliArguments(argv?: string[]) {
	//skip the node executable and the main script
	return argv ?? process.argv.slice(2);
}
