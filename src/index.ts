// Core data model
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  StoreRecord,
  Query,
  Database,
} from './model';

export { createDatabase, databaseToObject } from './model';

// Record store
export type { RecordStoreOptions, ReportSink } from './recordStore';
export { RecordStore } from './recordStore';

// Errors
export { MalformedDocumentError, WriteFailureError, InvalidValueError } from './errors';

// Query matching
export { matchesQuery, valuesEqual, assertRecord, assertJsonValue } from './matcher';

// Storage
export type { StorageBackend } from './storage';
export { FileStorage, MemoryStorage } from './storage';

// File format
export type { DocumentFormat, Serializer, JsonSerializerOptions } from './fileFormat';
export { JsonSerializer, parseDatabase, serializeDatabase } from './fileFormat';

// JSON Schema generation
export type { JsonSchema } from './jsonSchemaGenerator';
export { generateJsonSchema } from './jsonSchemaGenerator';
