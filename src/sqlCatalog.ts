/**
 * @file SqlCatalog - the operation surface applications use.
 *
 * A catalog binds a QueryRegistry to one live connection. Operations are
 * invoked by name:
 *
 *     const catalog = SqlCatalog.fromConfig({
 *         QUERIES: {
 *             create_user: 'INSERT INTO users(name, password) VALUES(${name}, ${password})',
 *             list_users: 'SELECT * FROM users ORDER BY name %(order)s'
 *         }
 *     }, connection);
 *
 *     await catalog.callNamed('create_user', { name: 'bruce', password: 'iamthenight' });
 *     const users = await catalog.callNamed('list_users', { order: 'DESC' });
 *
 * Calls on one catalog must be awaited one after another: a connection runs
 * one logical operation at a time.
 */

import { QueryRegistry } from './queryRegistry';
import type { QueryDefinition } from './queryDefinition';
import { Executor, CallArguments } from './executor';
import { Cursor, DriverConnection, RowFactory, dictRowFactory } from './cursor';
import { TransactionalSurface, isInTransaction, withTransaction } from './transaction';
import { openConnection, ConnectionParameters } from './drivers/openConnection';
import { TransactionStateError } from './errors';
import { getLogger } from './logger';

/**
 * Settings shared by every way of building a catalog.
 */
export interface SqlCatalogOptions
{
	/** Memo table size per statement with unsafe substitutions (default: 64) */
	statementCacheSize?: number;
}

/**
 * Options of `SqlCatalog.connect`.
 */
export interface ConnectOptions extends SqlCatalogOptions
{
	/** Values for `{name}` references in the DATABASE section */
	parameters?: ConnectionParameters;
}

/**
 * Default row shape: column name -> value.
 */
export type Row = Record<string, unknown>;

/**
 * A registered operation as a function. Calling it passes positional
 * arguments; `named` passes keyword arguments too.
 */
export interface QueryOperation<T>
{
	(...positional: unknown[]): Promise<T[]>;
	readonly queryName: string;
	named(keyword: Readonly<Record<string, unknown>>, ...positional: unknown[]): Promise<T[]>;
}

export class SqlCatalog<T = Row> implements TransactionalSurface
{
	readonly registry: QueryRegistry;
	/** Cursor every call runs on; reflects the last statement executed */
	readonly cursor: Cursor;

	private readonly executor: Executor<T>;
	private readonly logger = getLogger('SqlCatalog');

	/**
	 * @param connection Live connection; its paramstyle decides how statements are rendered
	 * @param rowFactory Maps each row of an operation's final result set
	 * @param options Catalog settings
	 */
	constructor(readonly connection: DriverConnection, rowFactory: RowFactory<T>, options: SqlCatalogOptions = {})
	{
		this.registry = new QueryRegistry(connection.paramStyle, { statementCacheSize: options.statementCacheSize });
		this.cursor = connection.cursor();
		this.executor = new Executor(this.cursor, rowFactory);
	}

	/**
	 * Builds a catalog from a configuration's QUERIES section and a live connection.
	 */
	static fromConfig(config: unknown, connection: DriverConnection, options?: SqlCatalogOptions): SqlCatalog<Row>;
	static fromConfig<T>(config: unknown, connection: DriverConnection, options: SqlCatalogOptions & { rowFactory: RowFactory<T> }): SqlCatalog<T>;
	static fromConfig<T>(
		config: unknown,
		connection: DriverConnection,
		options: SqlCatalogOptions & { rowFactory?: RowFactory<T> } = {}
	): SqlCatalog<T> | SqlCatalog<Row>
	{
		const catalog = options.rowFactory
			? new SqlCatalog(connection, options.rowFactory, options)
			: new SqlCatalog(connection, dictRowFactory, options);
		return catalog.loadQueries(config);
	}

	/**
	 * Opens the connection described by the MODULE and DATABASE sections and
	 * builds a catalog over it. The connection is closed again if the
	 * QUERIES section fails to load.
	 */
	static async connect(config: unknown, options?: ConnectOptions): Promise<SqlCatalog<Row>>;
	static async connect<T>(config: unknown, options: ConnectOptions & { rowFactory: RowFactory<T> }): Promise<SqlCatalog<T>>;
	static async connect<T>(
		config: unknown,
		options: ConnectOptions & { rowFactory?: RowFactory<T> } = {}
	): Promise<SqlCatalog<T> | SqlCatalog<Row>>
	{
		const connection = await openConnection(config, options.parameters);
		try
		{
			return options.rowFactory
				? SqlCatalog.fromConfig(config, connection, { statementCacheSize: options.statementCacheSize, rowFactory: options.rowFactory })
				: SqlCatalog.fromConfig(config, connection, options);
		}
		catch (error)
		{
			await connection.close();
			throw error;
		}
	}

	/**
	 * Registers every entry of a configuration's QUERIES section.
	 */
	loadQueries(config: unknown): this
	{
		this.registry.loadFromConfig(config);
		return this;
	}

	/**
	 * Adds or replaces an operation at runtime.
	 * @param parameters Optional declared formal parameter names, in positional order
	 */
	register(name: string, statements: string | readonly string[], parameters?: readonly string[]): QueryDefinition
	{
		return this.registry.register(name, statements, parameters);
	}

	has(name: string): boolean
	{
		return this.registry.has(name);
	}

	names(): string[]
	{
		return this.registry.names();
	}

	/**
	 * Executes an operation with positional arguments.
	 */
	async call(name: string, ...positional: unknown[]): Promise<T[]>
	{
		return this.invoke(name, { positional });
	}

	/**
	 * Executes an operation with keyword arguments, optionally preceded by positional ones.
	 */
	async callNamed(name: string, keyword: Readonly<Record<string, unknown>>, ...positional: unknown[]): Promise<T[]>
	{
		return this.invoke(name, { positional, keyword });
	}

	/**
	 * Executes an operation.
	 * @returns The rows of the operation's last statement, mapped by the row factory
	 */
	async invoke(name: string, args: CallArguments = {}): Promise<T[]>
	{
		return this.executor.execute(this.registry.get(name), args);
	}

	/**
	 * Returns an operation as a function. The definition is looked up on every
	 * call, so later replacements through `register` take effect.
	 * @throws UnknownQueryError if `name` is not registered
	 */
	operation(name: string): QueryOperation<T>
	{
		this.registry.get(name);

		const named = (keyword: Readonly<Record<string, unknown>>, ...positional: unknown[]): Promise<T[]> =>
			this.invoke(name, { positional, keyword });
		const operation = (...positional: unknown[]): Promise<T[]> => this.invoke(name, { positional });

		return Object.assign(operation, { queryName: name, named });
	}

	/**
	 * Runs `scope` in a transaction: committed when it resolves, rolled back
	 * (and the error rethrown) when it throws.
	 * @throws TransactionStateError if a transaction is already active on this connection
	 */
	async transaction<R>(scope: (catalog: this) => Promise<R>): Promise<R>
	{
		return withTransaction(this, scope);
	}

	/**
	 * Closes the underlying connection.
	 * @throws TransactionStateError while a transaction is active
	 */
	async close(): Promise<void>
	{
		if (isInTransaction(this.connection))
		{
			throw new TransactionStateError('Cannot close a connection with an active transaction');
		}
		await this.connection.close();
		this.logger.info('Catalog closed', { queries: this.registry.size });
	}
}
