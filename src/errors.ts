/**
 * A read or write could not move the number of bytes it needed, or a file
 * could not be opened.
 */
export class IoError extends Error {
	name = "IoError";
	constructor(message: string, public readonly position = -1, options?: ErrorOptions) {
		super(message, options);
	}
}

/**
 * The bytes were read fine but don't describe a valid file, the message always
 * contains the offending value.
 */
export class FormatError extends Error {
	name = "FormatError";
	constructor(message: string, public readonly offset = -1) {
		super(message);
	}
}

export function shortReadError(expected: number, actual: number, position: number) {
	return new IoError(`File read failure: expected ${expected} bytes, read ${actual}. At file position ${position}.`, position);
}

export function shortWriteError(expected: number, actual: number, position: number) {
	return new IoError(`File write failure: expected to write ${expected} bytes, room for ${actual}. At position ${position}.`, position);
}
