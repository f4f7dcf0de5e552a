import { Client } from 'pg';
import { BufferedCursor, Cursor, CursorResult, DriverConnection } from '../cursor';
import { Bindings, ParamStyle } from '../paramStyle';
import type { ServerDatabaseSection } from '../catalogConfig';
import { ConfigurationError, SqlCatalogError } from '../errors';
import { getLogger } from '../logger';

/**
 * The part of a pg Client the adapter uses.
 */
export type PostgreSQLHandle = Pick<Client, 'query' | 'end'>;

/**
 * Cursor over a pg client. PostgreSQL numbers its parameters (`$1`, `$2`),
 * so bindings always arrive as an array.
 */
export class PostgreSQLCursor extends BufferedCursor
{
	constructor(private readonly client: PostgreSQLHandle)
	{
		super();
	}

	protected async run(sql: string, bindings: Bindings): Promise<CursorResult>
	{
		if (!Array.isArray(bindings))
		{
			throw new SqlCatalogError('PostgreSQL statements take positional bindings');
		}

		const result = await this.client.query({ text: sql, values: bindings, rowMode: 'array' });
		return {
			columns: result.fields.length > 0
				? result.fields.map(field => ({ name: field.name, typeCode: field.dataTypeID }))
				: undefined,
			rows: result.rows,
			rowCount: result.rowCount ?? -1
		};
	}
}

/**
 * DriverConnection over a connected pg Client. Statements are rendered with
 * the `dollar` convention.
 */
export class PostgreSQLConnection implements DriverConnection
{
	readonly paramStyle: ParamStyle = 'dollar';
	private readonly logger = getLogger('PostgreSQLConnection');

	constructor(private readonly client: PostgreSQLHandle)
	{
	}

	/**
	 * Connects a single (unpooled) client.
	 * @throws ConfigurationError if `paramStyle` is given and is not `dollar`
	 */
	static async open(options: ServerDatabaseSection, paramStyle?: ParamStyle): Promise<PostgreSQLConnection>
	{
		if (paramStyle !== undefined && paramStyle !== 'dollar')
		{
			throw new ConfigurationError(`PostgreSQL does not support paramstyle '${paramStyle}', use 'dollar'`);
		}

		const client = new Client({
			host: options.host,
			port: options.port,
			user: options.user,
			password: options.password,
			database: options.database,
			connectionString: options.connectionString
		});
		await client.connect();

		const connection = new PostgreSQLConnection(client);
		connection.logger.info('PostgreSQL connection opened', { host: options.host, database: options.database });
		return connection;
	}

	cursor(): Cursor
	{
		return new PostgreSQLCursor(this.client);
	}

	async begin(): Promise<void>
	{
		await this.client.query('BEGIN');
	}

	async commit(): Promise<void>
	{
		await this.client.query('COMMIT');
	}

	async rollback(): Promise<void>
	{
		await this.client.query('ROLLBACK');
	}

	async close(): Promise<void>
	{
		await this.client.end();
		this.logger.info('PostgreSQL connection closed');
	}
}
