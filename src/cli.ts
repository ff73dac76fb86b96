import { Command, InvalidArgumentError, Option } from "commander";
import * as readline from "readline";
import * as fs from "fs";
import { RecordStore, type RecordStoreOptions } from "./recordStore";
import { generateJsonSchema } from "./jsonSchemaGenerator";
import { assertRecord } from "./matcher";
import { describeCause } from "./errors";
import type { StoreRecord } from "./model";

async function confirm(message: string): Promise<boolean> {
	const rl = readline.createInterface({
		input: process.stdin,
		output: process.stdout,
	});

	return new Promise((resolve) => {
		rl.question(`${message} (y/N) `, (answer) => {
			rl.close();
			resolve(answer.toLowerCase() === "y" || answer.toLowerCase() === "yes");
		});
	});
}

/**
 * Commander argument parser for JSON object arguments (records, queries, updates).
 */
export function parseObjectArgument(value: string): StoreRecord {
	let parsed: unknown;
	try {
		parsed = JSON.parse(value);
	} catch (err) {
		throw new InvalidArgumentError(`Not valid JSON: ${describeCause(err)}`);
	}

	try {
		assertRecord(parsed, "argument");
		return parsed;
	} catch (err) {
		throw new InvalidArgumentError(describeCause(err));
	}
}

export interface ProgramOptions {
	/** Options for every store the commands open. */
	store?: RecordStoreOptions;
	/** Asks a yes/no question. Defaults to a stdin prompt. */
	confirm?: (message: string) => Promise<boolean>;
}

/**
 * Build the `recstore` command line. Every command opens the store named by
 * --file; commands that change it persist before returning.
 */
export function createProgram(options: ProgramOptions = {}): Command {
	const program = new Command();
	const storeOptions = options.store ?? {};
	const ask = options.confirm ?? confirm;

	program
		.name("recstore")
		.description("Query and edit a flat JSON record store")
		.version("1.0.0")
		.addOption(
			new Option("-f, --file <path>", "Store document")
				.env("RECSTORE_FILE")
				.default("data.json")
		);

	const openStore = (): RecordStore => {
		const { file } = program.opts<{ file: string }>();
		return new RecordStore(file, storeOptions);
	};

	program
		.command("show")
		.description("Print one table, or every table when no table is given")
		.argument("[table]", "Table to print (\"all\" is an ordinary table name)")
		.action((table: string | undefined) => {
			openStore().report(table);
		});

	program
		.command("tables")
		.description("List tables with their record counts")
		.action(() => {
			const store = openStore();
			const names = store.tableNames();
			if (names.length === 0) {
				console.log("No tables.");
				return;
			}
			for (const name of names) {
				console.log(`${name} (${store.count(name)} record(s))`);
			}
		});

	program
		.command("insert")
		.description("Append a record to a table")
		.argument("<table>", "Table name")
		.argument("<record>", "Record as a JSON object", parseObjectArgument)
		.action((table: string, record: StoreRecord) => {
			const store = openStore();
			store.insert(table, record);
			store.persist();
			console.log(`Inserted 1 record into '${table}'.`);
		});

	program
		.command("query")
		.description("Print the records matching a query as JSON")
		.argument("<table>", "Table name")
		.argument("[query]", "Exact-match query as a JSON object", parseObjectArgument)
		.action((table: string, query: StoreRecord | undefined) => {
			const records = openStore().query(table, query);
			console.log(JSON.stringify(records, null, 2));
		});

	program
		.command("update")
		.description("Merge fields into every record matching a query")
		.argument("<table>", "Table name")
		.argument("<query>", "Exact-match query as a JSON object", parseObjectArgument)
		.argument("<updates>", "Fields to set as a JSON object", parseObjectArgument)
		.action((table: string, query: StoreRecord, updates: StoreRecord) => {
			const store = openStore();
			if (!store.updateWhere(table, query, updates)) {
				console.log(`No matching records in '${table}'.`);
				return;
			}
			store.persist();
			console.log(`Updated records in '${table}'.`);
		});

	program
		.command("delete")
		.description("Remove every record matching a query ({} removes all records)")
		.argument("<table>", "Table name")
		.argument("<query>", "Exact-match query as a JSON object", parseObjectArgument)
		.option("-y, --yes", "Skip confirmation when the query is empty")
		.action(async (table: string, query: StoreRecord, commandOptions: { yes?: boolean }) => {
			const store = openStore();

			if (Object.keys(query).length === 0 && !commandOptions.yes) {
				const confirmed = await ask(`Delete every record in '${table}'?`);
				if (!confirmed) {
					console.log("Aborted.");
					return;
				}
			}

			if (!store.deleteWhere(table, query)) {
				console.log(`No matching records in '${table}'.`);
				return;
			}
			store.persist();
			console.log(`Deleted records from '${table}'.`);
		});

	program
		.command("schema")
		.description("Export a JSON Schema describing the store's tables")
		.option("-o, --output <file>", "Output file (defaults to stdout)")
		.action((commandOptions: { output?: string }) => {
			const schema = generateJsonSchema(openStore().toObject());
			const json = JSON.stringify(schema, null, "\t");

			if (commandOptions.output) {
				fs.writeFileSync(commandOptions.output, json);
				console.log(`Exported to ${commandOptions.output}`);
			} else {
				console.log(json);
			}
		});

	return program;
}
