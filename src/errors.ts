/**
 * @file Error taxonomy for SqlCatalog.
 *
 * Assembly-time errors (template syntax, parameter lists) are thrown before a
 * query definition reaches the registry. Call-time errors are thrown before the
 * first statement of a call executes. Driver errors are never wrapped.
 */

/**
 * Base class of every error raised by the library itself.
 */
export class SqlCatalogError extends Error
{
	constructor(message: string, options?: ErrorOptions)
	{
		super(message, options);
		this.name = 'SqlCatalogError';
	}
}

/**
 * Malformed `${...}` or `%(...)s` syntax in a statement template.
 */
export class TemplateSyntaxError extends SqlCatalogError
{
	constructor(message: string, readonly template: string, readonly offset: number)
	{
		super(`${message} at offset ${offset}`);
		this.name = 'TemplateSyntaxError';
	}
}

/**
 * An unsafe `%(name)s` placeholder was referenced but no value was supplied for it.
 */
export class MissingInterpolationValueError extends SqlCatalogError
{
	constructor(readonly key: string)
	{
		super(`No value supplied for unsafe substitution '${key}'`);
		this.name = 'MissingInterpolationValueError';
	}
}

/**
 * An explicit parameter list does not cover every identifier used by the statements.
 */
export class UnknownParameterError extends SqlCatalogError
{
	constructor(readonly queryName: string, readonly parameter: string)
	{
		super(`Query '${queryName}' uses parameter '${parameter}' which is not in its declared parameter list`);
		this.name = 'UnknownParameterError';
	}
}

/**
 * Positional markers (`${_0}`, `${_1}`, ...) are misused.
 */
export class PositionalParameterError extends SqlCatalogError
{
	constructor(readonly queryName: string, message: string)
	{
		super(`Query '${queryName}': ${message}`);
		this.name = 'PositionalParameterError';
	}
}

/**
 * Call-time arguments do not match the formal parameters of an operation.
 */
export class ArgumentError extends SqlCatalogError
{
	constructor(readonly queryName: string, message: string)
	{
		super(`${queryName}(): ${message}`);
		this.name = 'ArgumentError';
	}
}

/**
 * A transaction was started while another is active, or reused after it finished.
 */
export class TransactionStateError extends SqlCatalogError
{
	constructor(message: string)
	{
		super(message);
		this.name = 'TransactionStateError';
	}
}

/**
 * Rolling back after a failure inside a transaction scope failed as well.
 * The error that triggered the rollback is kept in `originalError`; the rollback
 * failure is the `cause`.
 */
export class RollbackError extends SqlCatalogError
{
	constructor(readonly originalError: unknown, rollbackError: unknown)
	{
		super(`Rollback failed: ${describe(rollbackError)} (while handling: ${describe(originalError)})`, { cause: rollbackError });
		this.name = 'RollbackError';
	}
}

/**
 * Invalid query name or statement list.
 */
export class QueryDefinitionError extends SqlCatalogError
{
	constructor(message: string)
	{
		super(message);
		this.name = 'QueryDefinitionError';
	}
}

/**
 * No operation is registered under the requested name.
 */
export class UnknownQueryError extends SqlCatalogError
{
	constructor(readonly queryName: string)
	{
		super(`Unknown query '${queryName}'`);
		this.name = 'UnknownQueryError';
	}
}

/**
 * Configuration object, connection settings or paramstyle are invalid.
 */
export class ConfigurationError extends SqlCatalogError
{
	constructor(message: string, options?: ErrorOptions)
	{
		super(message, options);
		this.name = 'ConfigurationError';
	}
}

function describe(error: unknown): string
{
	return error instanceof Error ? error.message : String(error);
}
