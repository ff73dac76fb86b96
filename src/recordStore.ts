import type { Database, Query, StoreRecord } from "./model";
import { createDatabase, databaseToObject } from "./model";
import { matchesQuery, assertRecord } from "./matcher";
import { parseDatabase, serializeDatabase, JsonSerializer, type Serializer } from "./fileFormat";
import { FileStorage, type StorageBackend } from "./storage";
import { WriteFailureError } from "./errors";

/** Receives report output one line at a time. */
export type ReportSink = (line: string) => void;

export interface RecordStoreOptions {
	/** Where the document lives. Defaults to the local filesystem. */
	storage?: StorageBackend;
	/** Document encoding. Defaults to 2-space indented JSON. */
	serializer?: Serializer;
	/** Destination for report(). Defaults to console.log. */
	output?: ReportSink;
}

/**
 * An in-memory set of named tables backed by a single document.
 *
 * Changes stay in memory until persist() is called. Records returned by
 * query() are the stored objects themselves: mutating one mutates the store.
 */
export class RecordStore {
	private readonly _database: Database;
	private readonly _storage: StorageBackend;
	private readonly _serializer: Serializer;
	private readonly _output: ReportSink;

	/**
	 * Load the document at `path`. A missing or unreadable document yields an
	 * empty store.
	 * @throws MalformedDocumentError if the document exists but cannot be parsed
	 */
	constructor(
		private readonly _path: string,
		options: RecordStoreOptions = {}
	) {
		this._storage = options.storage ?? new FileStorage();
		this._serializer = options.serializer ?? new JsonSerializer();
		this._output = options.output ?? ((line) => console.log(line));

		const text = this._storage.read(_path);
		this._database = text === null
			? createDatabase()
			: parseDatabase(text, _path, this._serializer);
	}

	get path(): string {
		return this._path;
	}

	/**
	 * Write the whole store back to its document, replacing the previous content.
	 * @throws WriteFailureError if the document cannot be written
	 */
	persist(): void {
		const text = serializeDatabase(this._database, this._serializer);
		try {
			this._storage.write(this._path, text);
		} catch (err) {
			throw new WriteFailureError(this._path, { cause: err });
		}
	}

	/**
	 * Append a record to a table, creating the table if needed.
	 * The record object is stored as given, not copied.
	 */
	insert(table: string, record: StoreRecord): void {
		assertRecord(record, "record");
		this._getOrCreateTable(table).push(record);
	}

	/**
	 * Records of `table` that match `query`, in table order. Every record is
	 * returned when the query is absent or empty; an unknown table yields [].
	 */
	query(table: string, query?: Query): StoreRecord[] {
		if (query !== undefined) {
			assertRecord(query, "query");
		}
		const records = this._database.tables.get(table);
		if (!records) {
			return [];
		}
		if (query === undefined) {
			return [...records];
		}
		return records.filter(record => matchesQuery(record, query));
	}

	/**
	 * Merge `updates` into every record of `table` that matches `query`.
	 * An empty query updates every record.
	 * @returns true if at least one record matched
	 */
	updateWhere(table: string, query: Query, updates: Readonly<StoreRecord>): boolean {
		assertRecord(query, "query");
		assertRecord(updates, "updates");
		const records = this._database.tables.get(table);
		if (!records) {
			return false;
		}

		let updated = false;
		for (const record of records) {
			if (matchesQuery(record, query)) {
				mergeInto(record, updates);
				updated = true;
			}
		}
		return updated;
	}

	/**
	 * Remove every record of `table` that matches `query`, keeping the order of
	 * the rest.
	 *
	 * WARNING: an empty query matches every record and empties the table.
	 * @returns true if the table shrank
	 */
	deleteWhere(table: string, query: Query): boolean {
		assertRecord(query, "query");
		const records = this._database.tables.get(table);
		if (!records) {
			return false;
		}

		const kept = records.filter(record => !matchesQuery(record, query));
		this._database.tables.set(table, kept);
		return kept.length < records.length;
	}

	/**
	 * Print one table, or all tables when `table` is omitted.
	 */
	report(table?: string): void {
		for (const line of this.formatReport(table)) {
			this._output(line);
		}
	}

	/**
	 * The lines report() would print.
	 */
	formatReport(table?: string): string[] {
		if (table === undefined) {
			const lines: string[] = [];
			for (const [name, records] of this._database.tables) {
				lines.push("", `Table '${name}':`);
				if (records.length === 0) {
					lines.push("  (empty)");
				} else {
					lines.push(...records.map((record, i) => `  Record ${i + 1}: ${JSON.stringify(record)}`));
				}
			}
			return lines;
		}

		const records = this._database.tables.get(table);
		if (!records) {
			return [`Table '${table}' does not exist.`];
		}
		if (records.length === 0) {
			return [`Table '${table}' is empty.`];
		}
		return [
			`Table '${table}':`,
			...records.map((record, i) => `Record ${i + 1}: ${JSON.stringify(record)}`),
		];
	}

	tableNames(): string[] {
		return [...this._database.tables.keys()];
	}

	hasTable(table: string): boolean {
		return this._database.tables.has(table);
	}

	count(table: string): number {
		return this._database.tables.get(table)?.length ?? 0;
	}

	/**
	 * The store as a document object. Table arrays are copies; records are shared.
	 */
	toObject(): Record<string, StoreRecord[]> {
		return databaseToObject(this._database);
	}

	private _getOrCreateTable(table: string): StoreRecord[] {
		let records = this._database.tables.get(table);
		if (!records) {
			records = [];
			this._database.tables.set(table, records);
		}
		return records;
	}
}

// Own-property definition, so a "__proto__" key is stored as a field
function mergeInto(record: StoreRecord, updates: Readonly<StoreRecord>): void {
	for (const [field, value] of Object.entries(updates)) {
		Object.defineProperty(record, field, { value, writable: true, enumerable: true, configurable: true });
	}
}
