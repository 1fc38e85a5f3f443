import { IoError } from "../src/errors";
import { ScriptFS, ScriptOutput, ScriptState } from "../src/scriptrunner";

export class MemoryScriptFS implements ScriptFS {
	files = new Map<string, Buffer>();

	async writeFile(name: string, data: Buffer | string) {
		this.files.set(name, typeof data == "string" ? Buffer.from(data, "utf8") : data);
	}
	async readFileBuffer(name: string) {
		let file = this.files.get(name);
		if (!file) { throw new IoError(`Error opening ${name} for read: no such file`); }
		return file;
	}
	async readFileText(name: string) {
		return (await this.readFileBuffer(name)).toString("utf8");
	}
	names() {
		return [...this.files.keys()].sort();
	}
}

export class MemoryScriptOutput implements ScriptOutput {
	state: ScriptState = "running";
	logs: string[] = [];
	warnings: string[] = [];
	errors: unknown[] = [];

	log(...args: unknown[]) {
		this.logs.push(args.map(String).join(" "));
	}
	warn(...args: unknown[]) {
		this.warnings.push(args.map(String).join(" "));
	}
	setState(state: ScriptState) {
		this.state = state;
	}
	async run<ARGS extends unknown[], RET>(fn: (output: ScriptOutput, ...args: ARGS) => Promise<RET>, ...args: ARGS): Promise<RET | null> {
		try {
			return await fn(this, ...args);
		} catch (e) {
			this.errors.push(e);
			this.setState("error");
			return null;
		} finally {
			if (this.state == "running") {
				this.setState("done");
			}
		}
	}
}
