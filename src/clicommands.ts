import * as cmdts from "cmd-ts";
import { command, flag, option, positional } from "cmd-ts";
import { cliFsOutputType, InputFileType, PaletteSource } from "./cliparser";
import { triConstants } from "./constants";
import { extractMdl } from "./scripts/extractmdl";
import { inspectFile } from "./scripts/inspect";
import { ScriptFS, ScriptOutput } from "./scriptrunner";

export type CliApiContext = {
	getConsole(): ScriptOutput,
	//called once a command is done, the cli turns an error state into the exit code
	onDone?(output: ScriptOutput): void
}

export function cliApi(ctx: CliApiContext) {
	let finish = (output: ScriptOutput) => ctx.onDone?.(output);

	const extract = command({
		name: "extract",
		description: "Writes every skin as a .lbm bitmap and every frame as a .tri triangle file",
		args: {
			input: positional({ type: InputFileType, displayName: "file.mdl" }),
			save: option({ long: "save", short: "s", type: cliFsOutputType() }),
			palette: option({ long: "palette", short: "p", type: PaletteSource }),
			png: flag({ long: "png", description: "Also write each skin as png" }),
			json: flag({ long: "json", short: "j", description: "Write a json summary of the model and the written files" }),
			lenient: flag({ long: "lenient-frames", description: "Accept group entries that push the frame counter past the header frame count" }),
			texture: option({ long: "texture", short: "t", type: cmdts.string, defaultValue: (): string => triConstants.defaulttexturename, description: "Texture name stored in the triangle files" }),
			eofname: option({ long: "eofname", type: cmdts.optional(cmdts.string), description: "Name after the end marker of the triangle files, defaults to the object name" })
		},
		async handler(args) {
			let output = ctx.getConsole();
			let outdir: ScriptFS = args.save ?? args.input.fs;
			let data = await output.run(async () => args.input.fs.readFileBuffer(args.input.filename));
			if (data) {
				output.log(`reading model file: ${args.input.filename}`);
				await output.run(extractMdl, outdir, args.input.basename, data, {
					palette: args.palette,
					png: args.png,
					json: args.json,
					lenientFrameCount: args.lenient,
					texturename: args.texture,
					endname: args.eofname ?? null
				});
			}
			finish(output);
		}
	});

	const inspect = command({
		name: "inspect",
		description: "Prints a summary of a .mdl, .tri or .lbm file",
		args: {
			input: positional({ type: InputFileType, displayName: "file" })
		},
		async handler(args) {
			let output = ctx.getConsole();
			await output.run(inspectFile, args.input.fs, args.input.filename);
			finish(output);
		}
	});

	let subcommands = cmdts.subcommands({
		name: "mdl2src",
		cmds: { extract, inspect }
	});

	return {
		subcommands
	}
}
