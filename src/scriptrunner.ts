import path from "path";
import fs from "fs";
import { IoError } from "./errors";

export type ScriptState = "running" | "error" | "done";

export interface ScriptOutput {
	state: ScriptState;
	log(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	setState(state: ScriptState): void;
	run<ARGS extends unknown[], RET>(fn: (output: ScriptOutput, ...args: [...ARGS]) => Promise<RET>, ...args: ARGS): Promise<RET | null>;
}

export interface ScriptFS {
	writeFile(name: string, data: Buffer | string): Promise<void>;
	readFileText(name: string): Promise<string>;
	readFileBuffer(name: string): Promise<Buffer>;
}

function ioFailure(action: string, name: string, e: unknown) {
	let reason = (e instanceof Error ? e.message : String(e));
	return new IoError(`Error opening ${name} for ${action}: ${reason}`, -1, { cause: e });
}

export class CLIScriptFS implements ScriptFS {
	dir: string;
	constructor(dir: string) {
		this.dir = path.resolve(dir);
		if (dir) { fs.mkdirSync(dir, { recursive: true }); }
	}
	convertPath(sub: string) {
		let target = path.resolve(this.dir, sub.replace(/^\//g, ""));
		//make sure the result is indeed a subfolder of the fs
		let rel = path.relative(this.dir, target);
		if (target != this.dir && (rel.startsWith("..") || path.isAbsolute(rel))) {
			throw new Error("Error while converting CLIScriptFS path");
		}
		return target;
	}
	async writeFile(name: string, data: Buffer | string) {
		try {
			await fs.promises.writeFile(this.convertPath(name), data);
		} catch (e) {
			throw ioFailure("write", name, e);
		}
	}
	async readFileBuffer(name: string) {
		try {
			return await fs.promises.readFile(this.convertPath(name));
		} catch (e) {
			throw ioFailure("read", name, e);
		}
	}
	async readFileText(name: string) {
		return (await this.readFileBuffer(name)).toString("utf-8");
	}
}

export class CLIScriptOutput implements ScriptOutput {
	state: ScriptState = "running";

	//bind instead of call so the original call site is retained while debugging
	log = console.log.bind(console);
	warn = console.warn.bind(console);

	setState(state: ScriptState) {
		this.state = state;
	}

	async run<ARGS extends unknown[], RET>(fn: (output: ScriptOutput, ...args: ARGS) => Promise<RET>, ...args: ARGS): Promise<RET | null> {
		try {
			return await fn(this, ...args);
		} catch (e) {
			console.error(`${e instanceof Error ? e.name : "Error"}: ${e instanceof Error ? e.message : e}`);
			this.setState("error");
			return null;
		} finally {
			if (this.state == "running") {
				this.setState("done");
			}
		}
	}
}
