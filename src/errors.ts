/**
 * Errors raised by the record store.
 *
 * A missing document and an unknown table are not errors: the store starts
 * empty and lookups come back empty.
 */

export class MalformedDocumentError extends Error {
	readonly path: string;

	constructor(path: string, message: string, options?: { cause?: unknown }) {
		super(`Malformed document at ${path}: ${message}`, options);
		this.name = "MalformedDocumentError";
		this.path = path;
	}
}

export class WriteFailureError extends Error {
	readonly path: string;

	constructor(path: string, options?: { cause?: unknown }) {
		super(`Failed to write ${path}: ${describeCause(options?.cause)}`, options);
		this.name = "WriteFailureError";
		this.path = path;
	}
}

export class InvalidValueError extends Error {
	/** Location of the offending value, e.g. `record.tags[2]`. */
	readonly path: string;

	constructor(path: string, reason: string) {
		super(`Invalid value at ${path}: ${reason}`);
		this.name = "InvalidValueError";
		this.path = path;
	}
}

export function describeCause(cause: unknown): string {
	return cause instanceof Error ? cause.message : String(cause);
}
