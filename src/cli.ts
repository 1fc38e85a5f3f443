#!/usr/bin/env node
import * as cmdts from "cmd-ts";
import { CliApiContext, cliApi } from "./clicommands";
import { cliArguments } from "./cliparser";
import { CLIScriptOutput } from "./scriptrunner";

let ctx: CliApiContext = {
	getConsole() { return new CLIScriptOutput(); },
	onDone(output) {
		if (output.state == "error") { process.exitCode = 1; }
	}
}

let api = cliApi(ctx);

cmdts.run(api.subcommands, cliArguments()).catch(e => {
	console.error(e);
	process.exitCode = 1;
});
