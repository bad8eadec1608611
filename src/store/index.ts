export { InMemoryAccountStore } from './memory-account-store.js';
export { PostgresAccountStore, createPostgresPool } from './postgres-account-store.js';
export type { PostgreSQLConfig } from './postgres-account-store.js';
