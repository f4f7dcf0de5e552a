/**
 * @file Main entry point of the SqlCatalog library.
 * Exports the operation surface, the template engine, driver adapters and error types.
 */

export { SqlCatalog } from './sqlCatalog';
export type { SqlCatalogOptions, ConnectOptions, QueryOperation, Row } from './sqlCatalog';

export { QueryRegistry } from './queryRegistry';
export type { QueryRegistryOptions } from './queryRegistry';
export { QueryDefinition, StatementTemplate } from './queryDefinition';
export type { QueryDefinitionOptions } from './queryDefinition';
export { Executor, bindArguments } from './executor';
export type { CallArguments, BoundStatement } from './executor';
export { Transaction, withTransaction, isInTransaction } from './transaction';
export type { TransactionState, TransactionalSurface } from './transaction';

export { interpolate, findInterpolationNames } from './unsafeInterpolator';
export { parsePlaceholders, positionalIndex } from './placeholderParser';
export type { ParsedTemplate } from './placeholderParser';
export { PARAM_STYLES, translate, buildBindings, isParamStyle, toParamStyle } from './paramStyle';
export type { ParamStyle, Bindings, BindingShape, CompiledStatement } from './paramStyle';

export { BufferedCursor, dictRowFactory, arrayRowFactory } from './cursor';
export type { Cursor, CursorMetadata, CursorResult, ColumnDescription, DriverConnection, RawRow, RowFactory } from './cursor';
export { readQueries, toConfigSource } from './catalogConfig';
export type { ConfigSource, ConfigInput, QuerySpec, DriverName } from './catalogConfig';

export { SQLiteConnection, SQLITE_PARAM_STYLES } from './drivers/SQLiteConnection';
export { MySQLConnection, MYSQL_PARAM_STYLES } from './drivers/MySQLConnection';
export { PostgreSQLConnection } from './drivers/PostgreSQLConnection';
export { openConnection } from './drivers/openConnection';
export type { ConnectionParameters } from './drivers/openConnection';

export {
	SqlCatalogError,
	TemplateSyntaxError,
	MissingInterpolationValueError,
	UnknownParameterError,
	PositionalParameterError,
	ArgumentError,
	TransactionStateError,
	RollbackError,
	QueryDefinitionError,
	UnknownQueryError,
	ConfigurationError
} from './errors';

export { Logger, LogLevel, globalLogger, getLogger } from './logger';
export type { LoggerConfig, LogEntry, ContextLogger } from './logger';
