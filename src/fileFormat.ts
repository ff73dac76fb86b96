import Ajv from "ajv";
import type { Database, StoreRecord } from "./model";
import { databaseToObject } from "./model";
import { assertJsonValue } from "./matcher";
import { MalformedDocumentError, describeCause } from "./errors";

/**
 * The persisted document: table name to the table's records, in order.
 */
export type DocumentFormat = Record<string, StoreRecord[]>;

/**
 * Converts between document text and structured values.
 */
export interface Serializer {
	/** Parse document text. Throws on malformed input. */
	parse(text: string): unknown;
	serialize(document: DocumentFormat): string;
}

export interface JsonSerializerOptions {
	/** Spaces per indentation level; 0 writes compact JSON. Defaults to 2. */
	readonly indent?: number;
}

export class JsonSerializer implements Serializer {
	private readonly _indent: number;

	constructor(options: JsonSerializerOptions = {}) {
		this._indent = options.indent ?? 2;
	}

	parse(text: string): unknown {
		return JSON.parse(text);
	}

	serialize(document: DocumentFormat): string {
		return JSON.stringify(document, null, this._indent);
	}
}

const documentSchema = {
	$schema: "http://json-schema.org/draft-07/schema#",
	type: "object",
	additionalProperties: {
		type: "array",
		items: { type: "object" },
	},
} as const;

const ajv = new Ajv({ allErrors: true });
const validateDocument = ajv.compile<DocumentFormat>(documentSchema);

/**
 * Parse document text into a Database.
 * Both unparsable text and a document of the wrong shape are reported as
 * MalformedDocumentError against `source`.
 */
export function parseDatabase(
	text: string,
	source: string,
	serializer: Serializer = new JsonSerializer()
): Database {
	let parsed: unknown;
	try {
		parsed = serializer.parse(text);
	} catch (err) {
		throw new MalformedDocumentError(source, describeCause(err), { cause: err });
	}

	if (!validateDocument(parsed)) {
		throw new MalformedDocumentError(
			source,
			ajv.errorsText(validateDocument.errors, { dataVar: "document" })
		);
	}

	// A custom serializer may hand back values JSON cannot hold
	try {
		assertJsonValue(parsed, "document");
	} catch (err) {
		throw new MalformedDocumentError(source, describeCause(err), { cause: err });
	}

	return { tables: new Map(Object.entries(parsed)) };
}

/**
 * Serialize a Database to document text, tables in creation order.
 */
export function serializeDatabase(
	database: Database,
	serializer: Serializer = new JsonSerializer()
): string {
	return serializer.serialize(databaseToObject(database));
}
