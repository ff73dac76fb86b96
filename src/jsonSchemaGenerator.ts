import type { JsonValue, StoreRecord } from "./model";

export interface JsonSchema {
	readonly $schema: string;
	readonly type: string;
	readonly properties: Record<string, unknown>;
	readonly additionalProperties: Record<string, unknown>;
	readonly definitions: Record<string, unknown>;
}

type JsonTypeName = "array" | "boolean" | "integer" | "null" | "number" | "object" | "string";

const TYPE_ORDER: readonly JsonTypeName[] = ["array", "boolean", "integer", "null", "number", "object", "string"];

const DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i;

interface FieldStats {
	readonly types: Set<JsonTypeName>;
	allDateTimes: boolean;
}

/**
 * Generate a JSON Schema describing a store document.
 * This enables autocomplete and validation in editors.
 *
 * Each table gets a row definition listing the fields seen in its records.
 * Records are schema-less, so no field is required and unknown fields are allowed.
 */
export function generateJsonSchema(document: Readonly<Record<string, readonly StoreRecord[]>>): JsonSchema {
	const properties: [string, unknown][] = [];
	const definitions: [string, unknown][] = [];

	for (const [tableName, records] of Object.entries(document)) {
		const definitionName = `${tableName}Row`;
		definitions.push([definitionName, generateRowSchema(records)]);

		// Table property is an array of rows
		properties.push([
			tableName,
			{
				type: "array",
				items: { $ref: `#/definitions/${encodePointerSegment(definitionName)}` },
			},
		]);
	}

	return {
		$schema: "http://json-schema.org/draft-07/schema#",
		type: "object",
		properties: Object.fromEntries(properties),
		additionalProperties: { type: "array", items: { type: "object" } },
		definitions: Object.fromEntries(definitions),
	};
}

function generateRowSchema(records: readonly StoreRecord[]): Record<string, unknown> {
	const fields = new Map<string, FieldStats>();

	for (const record of records) {
		for (const [field, value] of Object.entries(record)) {
			let stats = fields.get(field);
			if (!stats) {
				stats = { types: new Set(), allDateTimes: true };
				fields.set(field, stats);
			}
			const typeName = jsonTypeOf(value);
			stats.types.add(typeName);
			if (typeName === "string" && (typeof value !== "string" || !DATE_TIME.test(value))) {
				stats.allDateTimes = false;
			}
		}
	}

	const properties: [string, unknown][] = [];
	for (const [field, stats] of fields) {
		properties.push([field, fieldSchema(stats)]);
	}

	return {
		type: "object",
		properties: Object.fromEntries(properties),
	};
}

function fieldSchema(stats: FieldStats): Record<string, unknown> {
	const types = new Set(stats.types);
	// Every integer is also a number
	if (types.has("number")) {
		types.delete("integer");
	}

	const ordered = TYPE_ORDER.filter(t => types.has(t));
	const schema: Record<string, unknown> = {
		type: ordered.length === 1 ? ordered[0] : ordered,
	};
	if (types.has("string") && stats.allDateTimes) {
		schema.format = "date-time";
	}
	return schema;
}

function jsonTypeOf(value: JsonValue): JsonTypeName {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	switch (typeof value) {
		case "number":
			return Number.isInteger(value) ? "integer" : "number";
		case "string":
			return "string";
		case "boolean":
			return "boolean";
		default:
			return "object";
	}
}

function encodePointerSegment(segment: string): string {
	return encodeURIComponent(segment.replace(/~/g, "~0").replace(/\//g, "~1"));
}
