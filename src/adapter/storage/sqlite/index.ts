export {
  DEFAULT_SQLITE_DB_REL_PATH,
  SQLITE_STORAGE_SCHEMA_VERSION,
  SQLiteStorage,
  type SQLiteParam,
  type SQLiteStorageOptions,
} from "./sqlite.storage";

export {
  SQLiteLongTermMemoryStore,
  createSQLiteStorageLayer,
  type SQLiteStorageLayer,
} from "./sqlite.stores";
