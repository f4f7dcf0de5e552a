/**
 * Executor - binds call-time arguments to a QueryDefinition and runs its statements.
 *
 * Argument resolution happens completely before the first statement is sent to
 * the driver, so an argument mismatch never leaves a multi-statement operation
 * half executed.
 *
 * @module executor
 */

import { QueryDefinition } from './queryDefinition';
import { Bindings, CompiledStatement, buildBindings } from './paramStyle';
import { Cursor, RowFactory } from './cursor';
import { ArgumentError } from './errors';
import { getLogger } from './logger';

/**
 * Arguments of one operation call.
 */
export interface CallArguments
{
	/** Fill formal parameters left to right */
	positional?: readonly unknown[];
	/** Fill formal parameters by name; also feed unsafe substitutions */
	keyword?: Readonly<Record<string, unknown>>;
}

/**
 * A statement ready to send: driver text plus native bindings.
 */
export interface BoundStatement
{
	statement: CompiledStatement;
	bindings: Bindings;
}

/**
 * Resolves the arguments of a call and renders every statement of `definition`.
 *
 * Positional arguments fill formal parameters left to right. When the operation
 * uses positional markers (`${_0}` ...), positional arguments fill only those
 * and named parameters must be passed by keyword. Keywords that only feed
 * unsafe substitutions are accepted. Placeholders introduced by an unsafe
 * substitution are resolved by keyword for this call only.
 *
 * @throws ArgumentError on any mismatch between arguments and parameters
 * @throws MissingInterpolationValueError if an unsafe substitution has no keyword value
 */
export function bindArguments(definition: QueryDefinition, args: CallArguments = {}): BoundStatement[]
{
	const positional = args.positional ?? [];
	const keyword = args.keyword ?? {};
	const { name, formalParameters, positionalCount } = definition;

	const limit = positionalCount > 0 ? positionalCount : formalParameters.length;
	if (positional.length > limit)
	{
		const detail = positionalCount > 0 && formalParameters.length > positionalCount ? ' (named parameters are keyword-only)' : '';
		throw new ArgumentError(name, `takes ${limit} positional argument(s) but ${positional.length} were given${detail}`);
	}

	const values = new Map<string, unknown>();
	positional.forEach((value, index) => values.set(formalParameters[index], value));

	const unexpected = new Set<string>();
	for (const [key, value] of Object.entries(keyword))
	{
		if (formalParameters.includes(key))
		{
			if (values.has(key))
			{
				throw new ArgumentError(name, `got multiple values for parameter '${key}'`);
			}
			values.set(key, value);
		}
		else if (!definition.interpolationNames.has(key))
		{
			unexpected.add(key);
		}
	}

	const missing = formalParameters.filter(parameter => !values.has(parameter));
	if (missing.length > 0)
	{
		throw new ArgumentError(name, `missing value for parameter(s): ${missing.join(', ')}`);
	}

	const compiled = definition.statements.map(template => template.compile(keyword));

	for (const statement of compiled)
	{
		for (const identifier of statement.bindingNames)
		{
			if (values.has(identifier)) continue;

			if (!Object.hasOwn(keyword, identifier))
			{
				throw new ArgumentError(name, `missing value for parameter '${identifier}' introduced by unsafe substitution`);
			}
			values.set(identifier, keyword[identifier]);
			unexpected.delete(identifier);
		}
	}

	if (unexpected.size > 0)
	{
		throw new ArgumentError(name, `unexpected keyword argument(s): ${[...unexpected].join(', ')}`);
	}

	return compiled.map(statement => ({
		statement,
		bindings: buildBindings(statement, identifier => values.get(identifier))
	}));
}

/**
 * Runs operations on one cursor and maps the final result set through a row factory.
 */
export class Executor<T>
{
	private readonly logger = getLogger('Executor');

	constructor(
		private readonly cursor: Cursor,
		private readonly rowFactory: RowFactory<T>
	)
	{
	}

	/**
	 * Executes every statement of `definition` in order.
	 * Only the rows of the last statement are returned; earlier results are discarded.
	 * Driver errors propagate unchanged.
	 */
	async execute(definition: QueryDefinition, args: CallArguments = {}): Promise<T[]>
	{
		const bound = bindArguments(definition, args);

		for (const [index, { statement, bindings }] of bound.entries())
		{
			if (this.logger.isDebugEnabled())
			{
				this.logger.debug('Executing statement', {
					query: definition.name,
					statement: `${index + 1}/${bound.length}`,
					sql: statement.driverText,
					bindings
				});
			}
			await this.cursor.execute(statement.driverText, bindings);
		}

		const rows = this.cursor.fetchAll().map(row => this.rowFactory(this.cursor, row));
		this.logger.debug('Query completed', { query: definition.name, rows: rows.length, rowCount: this.cursor.rowCount });
		return rows;
	}
}
