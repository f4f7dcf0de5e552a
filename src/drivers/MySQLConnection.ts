import { createConnection, Connection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { BufferedCursor, Cursor, CursorResult, DriverConnection } from '../cursor';
import { Bindings, ParamStyle } from '../paramStyle';
import type { ServerDatabaseSection } from '../catalogConfig';
import { ConfigurationError } from '../errors';
import { getLogger } from '../logger';

/**
 * mysql2 takes `?` natively and `:name` with `namedPlaceholders`.
 */
export const MYSQL_PARAM_STYLES: readonly ParamStyle[] = ['qmark', 'named'];

/**
 * The part of a mysql2 promise connection the adapter uses.
 */
export type MySQLHandle = Pick<Connection, 'query' | 'beginTransaction' | 'commit' | 'rollback' | 'end'>;

type MySQLValue = string | number | boolean | Date | Buffer | null;

function toMySQLValue(value: unknown): MySQLValue
{
	if (value === null || value === undefined)
	{
		return null;
	}
	if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value instanceof Date || Buffer.isBuffer(value))
	{
		return value;
	}
	if (value instanceof Uint8Array)
	{
		return Buffer.from(value);
	}
	if (typeof value === 'object')
	{
		return JSON.stringify(value);
	}
	return String(value);
}

/**
 * Narrows driver-native bindings to the values mysql2 escapes.
 * Plain objects and arrays are sent as JSON text.
 */
function toMySQLValues(bindings: Bindings): MySQLValue[] | Record<string, MySQLValue>
{
	if (Array.isArray(bindings))
	{
		return bindings.map(toMySQLValue);
	}

	const values: Record<string, MySQLValue> = {};
	for (const [name, value] of Object.entries(bindings))
	{
		values[name] = toMySQLValue(value);
	}
	return values;
}

/**
 * Cursor over a mysql2 connection. Result sets are requested as arrays so
 * duplicate column names survive; `rowCount` is the affected row count for
 * statements without a result set.
 */
export class MySQLCursor extends BufferedCursor
{
	constructor(private readonly connection: MySQLHandle, private readonly paramStyle: ParamStyle)
	{
		super();
	}

	protected async run(sql: string, bindings: Bindings): Promise<CursorResult>
	{
		const [result, fields] = await this.connection.query<RowDataPacket[][] | ResultSetHeader>(
			{ sql, rowsAsArray: true, namedPlaceholders: this.paramStyle === 'named' },
			toMySQLValues(bindings)
		);

		if (Array.isArray(result))
		{
			return {
				columns: (fields ?? []).map(field => ({ name: field.name, typeCode: field.type })),
				rows: result,
				rowCount: result.length
			};
		}

		return { rows: [], rowCount: result.affectedRows };
	}
}

/**
 * DriverConnection over an open mysql2 promise connection.
 */
export class MySQLConnection implements DriverConnection
{
	private readonly logger = getLogger('MySQLConnection');

	/**
	 * @param connection Open connection
	 * @param paramStyle One of MYSQL_PARAM_STYLES (default: qmark)
	 * @throws ConfigurationError for a convention mysql2 cannot bind
	 */
	constructor(private readonly connection: MySQLHandle, readonly paramStyle: ParamStyle = 'qmark')
	{
		if (!MYSQL_PARAM_STYLES.includes(paramStyle))
		{
			throw new ConfigurationError(`MySQL does not support paramstyle '${paramStyle}', use one of: ${MYSQL_PARAM_STYLES.join(', ')}`);
		}
	}

	/**
	 * Opens a single (unpooled) connection.
	 */
	static async open(options: ServerDatabaseSection, paramStyle?: ParamStyle): Promise<MySQLConnection>
	{
		const connection = await createConnection({
			host: options.host,
			port: options.port,
			user: options.user,
			password: options.password,
			database: options.database,
			uri: options.connectionString
		});
		const wrapped = new MySQLConnection(connection, paramStyle);
		wrapped.logger.info('MySQL connection opened', { host: options.host, database: options.database });
		return wrapped;
	}

	cursor(): Cursor
	{
		return new MySQLCursor(this.connection, this.paramStyle);
	}

	async begin(): Promise<void>
	{
		await this.connection.beginTransaction();
	}

	async commit(): Promise<void>
	{
		await this.connection.commit();
	}

	async rollback(): Promise<void>
	{
		await this.connection.rollback();
	}

	async close(): Promise<void>
	{
		await this.connection.end();
		this.logger.info('MySQL connection closed');
	}
}
