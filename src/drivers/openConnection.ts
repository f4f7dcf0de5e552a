import type { DriverConnection } from '../cursor';
import {
	ModuleSectionSchema,
	SQLiteDatabaseSchema,
	ServerDatabaseSchema,
	expandParameters,
	formatIssues,
	toConfigSource,
	toPlainValue
} from '../catalogConfig';
import { ConfigurationError } from '../errors';
import { SQLiteConnection } from './SQLiteConnection';
import { MySQLConnection } from './MySQLConnection';
import { PostgreSQLConnection } from './PostgreSQLConnection';

/**
 * Values substituted into `{name}` references of the DATABASE section.
 */
export type ConnectionParameters = Readonly<Record<string, string | number>>;

/**
 * Reads the DATABASE section, expanding `{name}` references in string values.
 */
function readDatabaseSection(config: unknown, parameters: ConnectionParameters): Record<string, unknown>
{
	const root = toConfigSource(config, 'Configuration');
	const section = root.get('DATABASE');
	if (section === undefined)
	{
		throw new ConfigurationError('Missing DATABASE section in configuration');
	}

	const source = toConfigSource(section, 'DATABASE section');
	const settings: Record<string, unknown> = {};
	for (const key of source.keys())
	{
		const value = source.get(key);
		settings[key] = typeof value === 'string' ? expandParameters(value, parameters) : value;
	}
	return settings;
}

/**
 * Opens the connection described by the MODULE and DATABASE sections.
 *
 * @example
 * const connection = await openConnection({
 *     MODULE: { name: 'postgres' },
 *     DATABASE: { host: 'db.internal', user: 'app', password: '{password}', database: 'app' }
 * }, { password: process.env.DB_PASSWORD ?? '' });
 *
 * @throws ConfigurationError for a missing or invalid section
 */
export async function openConnection(config: unknown, parameters: ConnectionParameters = {}): Promise<DriverConnection>
{
	const root = toConfigSource(config, 'Configuration');
	const moduleSection = root.get('MODULE');
	if (moduleSection === undefined)
	{
		throw new ConfigurationError('Missing MODULE section in configuration');
	}

	const parsedModule = ModuleSectionSchema.safeParse(toPlainValue(moduleSection));
	if (!parsedModule.success)
	{
		throw new ConfigurationError(`Invalid MODULE section: ${formatIssues(parsedModule.error)}`);
	}

	const { name, paramstyle } = parsedModule.data;
	const settings = readDatabaseSection(config, parameters);

	if (name === 'sqlite')
	{
		const parsed = SQLiteDatabaseSchema.safeParse(settings);
		if (!parsed.success)
		{
			throw new ConfigurationError(`Invalid DATABASE section for sqlite: ${formatIssues(parsed.error)}`);
		}
		return SQLiteConnection.open(parsed.data.filename, paramstyle);
	}

	const parsed = ServerDatabaseSchema.safeParse(settings);
	if (!parsed.success)
	{
		throw new ConfigurationError(`Invalid DATABASE section for ${name}: ${formatIssues(parsed.error)}`);
	}

	return name === 'mysql'
		? MySQLConnection.open(parsed.data, paramstyle)
		: PostgreSQLConnection.open(parsed.data, paramstyle);
}
