/**
 * Core data model types for flat-record-store.
 *
 * Records are schema-less: every field holds a value from the JSON value
 * domain, and tables are plain arrays kept in insertion order.
 */

// === Value Types ===

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

// === Store Types ===

export type StoreRecord = JsonObject;

/** Exact-match filter: every key must be present on a record with an equal value. */
export type Query = Readonly<Record<string, JsonValue>>;

export interface Database {
  readonly tables: Map<string, StoreRecord[]>;
}

// === Helpers ===

export function createDatabase(data: Record<string, StoreRecord[]> = {}): Database {
  return {
    tables: new Map(Object.entries(data)),
  };
}

export function databaseToObject(database: Database): Record<string, StoreRecord[]> {
  // fromEntries defines own properties, so a table named "__proto__" survives
  return Object.fromEntries(
    [...database.tables].map(([table, records]) => [table, [...records]])
  );
}
