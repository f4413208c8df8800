/**
 * @quarry/persistence
 *
 * Data-access core: connection pool, store drivers, sessions, the generic
 * repository, the migration tracker and store health.
 *
 * Key components:
 * - ConnectionPool over PostgreSQL (postgres.js) or embedded PGlite connections
 * - SessionManager for request-scoped transactions
 * - createRepository for typed CRUD over a Drizzle table
 * - MigrationTracker for numbered SQL scripts
 * - checkStoreHealth for readiness endpoints
 *
 * @example
 * ```typescript
 * import { createRepository, createStore, loadStoreConfig } from '@quarry/persistence';
 *
 * const store = await createStore(loadStoreConfig(), logger);
 * const users = createRepository<User, NewUser>({ name: 'User', table: usersTable, schema: userSchema });
 *
 * const user = await store.sessions.run((session) => users.get(session, 42), ctx);
 * ```
 */

// Errors
export {
	PersistenceError,
	type PersistenceErrorCode,
	PoolExhaustedError,
	PoolClosedError,
	ConnectionUnhealthyError,
	ConnectionNotCheckedOutError,
	StoreUnavailableError,
	SessionAlreadyClosedError,
	SessionRollbackOnlyError,
	NotFoundError,
	UniqueConstraintViolationError,
	InvalidQueryError,
	OutOfOrderMigrationError,
	UnknownMigrationError,
	findUniqueViolation,
	type UniqueViolationDetails,
} from './errors.js';

// Connections and drivers
export {
	createPostgresConnectionFactory,
	type BeginOptions,
	type ConnectionFactory,
	type PoolableConnection,
	type PostgresConnectionConfig,
	type StoreConnection,
	type StoreDatabase,
} from './connection.js';
export { createEmbeddedStore, TransactionGate, type EmbeddedStore, type EmbeddedStoreConfig } from './embedded.js';

// Pool
export {
	ConnectionPool,
	DEFAULT_POOL_OPTIONS,
	type AcquireOptions,
	type HealthCheckRecord,
	type PoolOptions,
	type PoolStats,
	type ResolvedPoolOptions,
} from './pool.js';

// Sessions
export { Session, type SessionState } from './session.js';
export { SessionManager, type SessionContext } from './session-manager.js';

// Repository
export {
	createRepository,
	createPagedResult,
	DEFAULT_MAX_LIST_LIMIT,
	type Entity,
	type EntityDefinition,
	type EntityId,
	type FieldOperators,
	type FieldPredicate,
	type Filter,
	type ListQuery,
	type PagedResult,
	type Repository,
	type SortSpec,
} from './repository.js';

// Migrations
export {
	MigrationTracker,
	loadMigrations,
	type Migration,
	type MigrationRecord,
	type MigrationTrackerOptions,
} from './migrations.js';

// Health
export { checkStoreHealth, type StoreHealthOptions, type StoreHealthResult } from './health.js';

// Configuration and wiring
export {
	loadStoreConfig,
	StoreEnvSchema,
	type EmbeddedStoreSettings,
	type PostgresStoreConfig,
	type StoreConfig,
} from './config.js';
export { createStore, type Store } from './store.js';

// Schema
export {
	timestampColumn,
	baseEntityColumns,
	schemaMigrations,
	type BaseEntity,
	type NewEntity,
	type SchemaMigrationRecord,
} from './schema/index.js';
