import { describe, test, expect } from "vitest";
import Ajv from "ajv";
import addFormats from "ajv-formats";
import { generateJsonSchema } from "./jsonSchemaGenerator";
import { RecordStore } from "./recordStore";
import { MemoryStorage } from "./storage";

function createValidator(schema: object) {
	const ajv = new Ajv({ strict: false, allErrors: true });
	addFormats(ajv);
	return ajv.compile(schema);
}

describe("jsonSchemaGenerator", () => {
	test("generates a row definition per table", () => {
		const schema = generateJsonSchema({
			users: [
				{ id: 1, name: "Ann" },
				{ id: 2, name: "Bob", admin: true },
			],
		});

		expect(schema).toEqual({
			$schema: "http://json-schema.org/draft-07/schema#",
			type: "object",
			properties: {
				users: {
					type: "array",
					items: { $ref: "#/definitions/usersRow" },
				},
			},
			additionalProperties: { type: "array", items: { type: "object" } },
			definitions: {
				usersRow: {
					type: "object",
					properties: {
						id: { type: "integer" },
						name: { type: "string" },
						admin: { type: "boolean" },
					},
				},
			},
		});
	});

	test("unions the types seen for a field", () => {
		const schema = generateJsonSchema({
			items: [{ v: 1 }, { v: 1.5 }, { v: null }, { v: [1] }, { v: { a: 1 } }, { v: "x" }],
		});

		expect(schema.definitions.itemsRow).toEqual({
			type: "object",
			properties: {
				v: { type: ["array", "null", "number", "object", "string"] },
			},
		});
	});

	test("marks fields holding only date-times", () => {
		const schema = generateJsonSchema({
			events: [
				{ at: "2024-03-01T10:00:00Z", note: "2024-03-01" },
				{ at: "2024-03-02T11:30:00.250+02:00", note: null },
			],
		});

		expect(schema.definitions.eventsRow).toEqual({
			type: "object",
			properties: {
				at: { type: "string", format: "date-time" },
				note: { type: ["null", "string"] },
			},
		});
	});

	test("empty table gets an empty row definition", () => {
		const schema = generateJsonSchema({ orders: [] });
		expect(schema.definitions.ordersRow).toEqual({ type: "object", properties: {} });
	});

	test("escapes table names in references", () => {
		const schema = generateJsonSchema({ "a/b": [{ x: 1 }] });
		expect(schema.properties["a/b"]).toEqual({
			type: "array",
			items: { $ref: "#/definitions/a~1bRow" },
		});
		expect(createValidator(schema)({ "a/b": [{ x: 1 }] })).toBe(true);
	});

	test("store document validates against its own schema", () => {
		const store = new RecordStore("data.json", { storage: new MemoryStorage() });
		store.insert("users", { id: 1, name: "Ann", joined: "2024-01-01T00:00:00Z" });
		store.insert("users", { id: 2, name: "Bob", tags: ["x"] });
		store.insert("orders", { id: 10, total: 9.5 });

		const document = store.toObject();
		const validate = createValidator(generateJsonSchema(document));

		expect(validate(document)).toBe(true);
	});

	test("schema rejects documents with different field types", () => {
		const validate = createValidator(generateJsonSchema({ users: [{ id: 1 }] }));

		expect(validate({ users: [{ id: "one" }] })).toBe(false);
		expect(validate({ users: [{ id: 2, extra: true }] })).toBe(true);
		expect(validate({ users: [], other: "not a table" })).toBe(false);
	});
});
