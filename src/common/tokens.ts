export const APP_CONFIG = Symbol('APP_CONFIG');
export const WAREHOUSE_SCHEMA = Symbol('WAREHOUSE_SCHEMA');
export const COMPLETION_SERVICE = Symbol('COMPLETION_SERVICE');
export const EMBEDDING_SERVICE = Symbol('EMBEDDING_SERVICE');
export const SQL_EXECUTOR = Symbol('SQL_EXECUTOR');
export const CHUNK_STORE = Symbol('CHUNK_STORE');
