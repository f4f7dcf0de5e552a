import { readFile, writeFile } from 'node:fs/promises';
import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic } from 'sql.js';
import { BufferedCursor, Cursor, CursorResult, DriverConnection, RawRow } from '../cursor';
import { Bindings, ParamStyle } from '../paramStyle';
import { ConfigurationError } from '../errors';
import { getLogger } from '../logger';

/**
 * Conventions SQLite parses natively: `?`, `:1` and `:name`.
 */
export const SQLITE_PARAM_STYLES: readonly ParamStyle[] = ['qmark', 'numeric', 'named'];

/**
 * The part of a sql.js Database the adapter uses.
 */
export type SQLiteHandle = Pick<Database, 'prepare' | 'exec' | 'getRowsModified' | 'export' | 'close'>;

type SQLiteValue = number | string | Uint8Array | null;
type SQLiteBindings = SQLiteValue[] | Record<string, SQLiteValue>;

let sqlJs: Promise<SqlJsStatic> | undefined;

/**
 * Loads the sql.js module once per process.
 */
function loadSqlJs(): Promise<SqlJsStatic>
{
	sqlJs ??= initSqlJs().catch((error: unknown) =>
	{
		sqlJs = undefined;
		throw error;
	});
	return sqlJs;
}

function toSQLiteValue(value: unknown): SQLiteValue
{
	if (value === null || value === undefined)
	{
		return null;
	}
	if (typeof value === 'boolean')
	{
		return value ? 1 : 0;
	}
	if (typeof value === 'number' || typeof value === 'string' || value instanceof Uint8Array)
	{
		return value;
	}
	if (value instanceof Date)
	{
		return value.toISOString();
	}
	return String(value);
}

function checkParamStyle(paramStyle: ParamStyle): void
{
	if (!SQLITE_PARAM_STYLES.includes(paramStyle))
	{
		throw new ConfigurationError(`SQLite does not support paramstyle '${paramStyle}', use one of: ${SQLITE_PARAM_STYLES.join(', ')}`);
	}
}

/**
 * sql.js binds object parameters by their full SQL name, prefix included.
 */
function toSQLiteBindings(bindings: Bindings, paramStyle: ParamStyle): SQLiteBindings
{
	if (paramStyle === 'numeric' && Array.isArray(bindings))
	{
		const numbered: Record<string, SQLiteValue> = {};
		bindings.forEach((value, index) =>
		{
			numbered[`:${index + 1}`] = toSQLiteValue(value);
		});
		return numbered;
	}

	if (!Array.isArray(bindings))
	{
		const prefixed: Record<string, SQLiteValue> = {};
		for (const [name, value] of Object.entries(bindings))
		{
			prefixed[`:${name}`] = toSQLiteValue(value);
		}
		return prefixed;
	}

	return bindings.map(toSQLiteValue);
}

/**
 * Cursor over a sql.js database. Rows are stepped as arrays, so duplicate
 * column names survive.
 *
 * `rowCount` is the number of returned rows for statements with a result set
 * (zero for an empty one) and the number of modified rows otherwise.
 */
export class SQLiteCursor extends BufferedCursor
{
	constructor(private readonly db: SQLiteHandle, private readonly paramStyle: ParamStyle)
	{
		super();
	}

	protected async run(sql: string, bindings: Bindings): Promise<CursorResult>
	{
		const statement = this.db.prepare(sql);
		try
		{
			statement.bind(toSQLiteBindings(bindings, this.paramStyle));

			const rows: RawRow[] = [];
			while (statement.step())
			{
				rows.push(statement.get());
			}

			const names = statement.getColumnNames();
			if (names.length === 0)
			{
				return { rows: [], rowCount: this.db.getRowsModified() };
			}
			return { columns: names.map(name => ({ name })), rows, rowCount: rows.length };
		}
		finally
		{
			statement.free();
		}
	}
}

/**
 * DriverConnection over a sql.js database.
 *
 * sql.js keeps the database in memory. A connection opened on a file loads it
 * and writes it back after every commit and on close.
 */
export class SQLiteConnection implements DriverConnection
{
	private readonly logger = getLogger('SQLiteConnection');

	/**
	 * @param db Open handle
	 * @param paramStyle One of SQLITE_PARAM_STYLES (default: qmark)
	 * @param filename File the database is written back to; omitted for in-memory databases
	 * @throws ConfigurationError for a convention SQLite cannot parse
	 */
	constructor(
		private readonly db: SQLiteHandle,
		readonly paramStyle: ParamStyle = 'qmark',
		private readonly filename?: string
	)
	{
		checkParamStyle(paramStyle);
	}

	/**
	 * Opens a database file, or a fresh in-memory database for `:memory:`.
	 * A missing file is created on the first write back.
	 */
	static async open(filename: string, paramStyle?: ParamStyle): Promise<SQLiteConnection>
	{
		const inMemory = filename === '' || filename === ':memory:';
		checkParamStyle(paramStyle ?? 'qmark');

		const SQL = await loadSqlJs();
		const image = inMemory ? undefined : await readDatabaseFile(filename);
		const connection = new SQLiteConnection(new SQL.Database(image), paramStyle, inMemory ? undefined : filename);
		connection.logger.info('SQLite database opened', { filename, paramStyle: connection.paramStyle });
		return connection;
	}

	cursor(): Cursor
	{
		return new SQLiteCursor(this.db, this.paramStyle);
	}

	async begin(): Promise<void>
	{
		this.db.exec('BEGIN');
	}

	async commit(): Promise<void>
	{
		this.db.exec('COMMIT');
		await this.writeBack();
	}

	async rollback(): Promise<void>
	{
		this.db.exec('ROLLBACK');
	}

	async close(): Promise<void>
	{
		try
		{
			await this.writeBack();
		}
		finally
		{
			this.db.close();
		}
		this.logger.info('SQLite database closed');
	}

	private async writeBack(): Promise<void>
	{
		if (this.filename === undefined) return;

		await writeFile(this.filename, this.db.export());
		this.logger.debug('SQLite database written', { filename: this.filename });
	}
}

async function readDatabaseFile(filename: string): Promise<Uint8Array | undefined>
{
	try
	{
		return await readFile(filename);
	}
	catch (error)
	{
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT')
		{
			return undefined;
		}
		throw error;
	}
}
