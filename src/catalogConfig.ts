/**
 * @file Configuration shapes accepted by SqlCatalog and their zod schemas.
 *
 * Configuration arrives as a nested key-value object. Any object with
 * `get(key)` and `keys()` works (a `Map` does as-is), and so does a plain
 * object. Sections:
 *
 *  - `QUERIES`  operation name -> statement template(s)
 *  - `MODULE`   driver name and optional paramstyle, used by `SqlCatalog.connect`
 *  - `DATABASE` connection options, used by `SqlCatalog.connect`
 */

import { z } from 'zod';
import { PARAM_STYLES } from './paramStyle';
import { ConfigurationError } from './errors';

/**
 * Minimal mapping capability configuration is read through.
 */
export interface ConfigSource
{
	get(key: string): unknown;
	keys(): Iterable<string>;
}

/**
 * A ConfigSource or a plain object.
 */
export type ConfigInput = ConfigSource | Readonly<Record<string, unknown>>;

export function isConfigSource(value: unknown): value is ConfigSource
{
	return typeof value === 'object'
		&& value !== null
		&& 'get' in value && typeof value.get === 'function'
		&& 'keys' in value && typeof value.keys === 'function';
}

function isPlainRecord(value: unknown): value is Readonly<Record<string, unknown>>
{
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Wraps a configuration value as a ConfigSource.
 * @param value A ConfigSource or plain object
 * @param label What the value is, for error messages
 * @throws ConfigurationError if `value` is not a mapping
 */
export function toConfigSource(value: unknown, label: string): ConfigSource
{
	if (isConfigSource(value))
	{
		return value;
	}
	if (isPlainRecord(value))
	{
		const record = value;
		return {
			get: key => Object.hasOwn(record, key) ? record[key] : undefined,
			keys: () => Object.keys(record)
		};
	}
	throw new ConfigurationError(`${label} must be a mapping`);
}

/**
 * Copies a mapping-like value into a plain object, leaving other values untouched.
 */
export function toPlainValue(value: unknown): unknown
{
	if (!isConfigSource(value))
	{
		return value;
	}
	const record: Record<string, unknown> = {};
	for (const key of value.keys())
	{
		record[key] = value.get(key);
	}
	return record;
}

// --- Schemas ---

const StatementsSchema = z.union([
	z.string().min(1),
	z.array(z.string().min(1)).min(1),
]);

/** Whitespace-separated names are accepted for text-based formats */
const ParameterListSchema = z.union([
	z.array(z.string().min(1)),
	z.string().transform(names => names.split(/\s+/).filter(Boolean)),
]);

const QueryRecordSchema = z.object({
	/** Statement template(s), executed in order */
	statements: StatementsSchema.optional(),
	/** Alias of `statements` */
	query: StatementsSchema.optional(),
	/** Formal parameter names, in positional order */
	parameters: ParameterListSchema.optional(),
}).strict().refine(
	entry => (entry.statements === undefined) !== (entry.query === undefined),
	{ message: 'exactly one of "statements" or "query" is required' }
);

export const QueryEntrySchema = z.union([StatementsSchema, QueryRecordSchema]);

export const ModuleSectionSchema = z.object({
	/** Driver to open the connection with */
	name: z.enum(['sqlite', 'mysql', 'postgres']),
	/** Overrides the driver's default binding convention */
	paramstyle: z.enum(PARAM_STYLES).optional(),
});

export const SQLiteDatabaseSchema = z.object({
	/** Database file, or ':memory:' */
	filename: z.string().min(1).optional(),
	/** Alias of `filename` */
	database: z.string().min(1).optional(),
}).strict().transform((section, ctx) =>
{
	const filename = section.filename ?? section.database;
	if (filename === undefined)
	{
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: '"filename" is required' });
		return z.NEVER;
	}
	return { filename };
});

export const ServerDatabaseSchema = z.object({
	host: z.string().optional(),
	/** Text formats deliver ports as strings */
	port: z.coerce.number().int().positive().optional(),
	user: z.string().optional(),
	password: z.string().optional(),
	database: z.string().optional(),
	/** PostgreSQL only */
	connectionString: z.string().optional(),
}).strict();

// --- Types ---

export type DriverName = z.infer<typeof ModuleSectionSchema>['name'];
export type ModuleSection = z.infer<typeof ModuleSectionSchema>;
export type SQLiteDatabaseSection = z.infer<typeof SQLiteDatabaseSchema>;
export type ServerDatabaseSection = z.infer<typeof ServerDatabaseSchema>;

/**
 * One entry of the QUERIES section after validation.
 */
export interface QuerySpec
{
	name: string;
	statements: string | string[];
	parameters?: string[];
}

/**
 * Formats zod issues as `path: message` pairs.
 */
export function formatIssues(error: z.ZodError): string
{
	return error.issues
		.map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
		.join('; ');
}

/**
 * Reads and validates the QUERIES section. A missing section yields no queries.
 * @throws ConfigurationError for a non-mapping section or an invalid entry
 */
export function readQueries(config: unknown): QuerySpec[]
{
	const root = toConfigSource(config, 'Configuration');
	const section = root.get('QUERIES');
	if (section === undefined)
	{
		return [];
	}

	const queries = toConfigSource(section, 'QUERIES section');
	const specs: QuerySpec[] = [];

	for (const name of queries.keys())
	{
		const parsed = QueryEntrySchema.safeParse(toPlainValue(queries.get(name)));
		if (!parsed.success)
		{
			throw new ConfigurationError(`Invalid query specification for '${name}': ${formatIssues(parsed.error)}`);
		}

		const entry = parsed.data;
		if (typeof entry === 'string' || Array.isArray(entry))
		{
			specs.push({ name, statements: entry });
		}
		else
		{
			// refine() guarantees exactly one of the two is set
			const statements = entry.statements ?? entry.query ?? [];
			specs.push({ name, statements, parameters: entry.parameters });
		}
	}

	return specs;
}

/**
 * Expands `{name}` references in a connection setting from `parameters`.
 * `{{` and `}}` stand for literal braces.
 * @throws ConfigurationError for a reference with no parameter
 */
export function expandParameters(value: string, parameters: Readonly<Record<string, string | number>>): string
{
	return value.replace(/\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (match: string, name: string | undefined) =>
	{
		if (name === undefined)
		{
			return match[0];
		}
		if (!Object.hasOwn(parameters, name))
		{
			throw new ConfigurationError(`Connection setting references unknown parameter '{${name}}'`);
		}
		return String(parameters[name]);
	});
}
