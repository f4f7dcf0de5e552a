/**
 * QueryDefinition - the compiled form of one named operation.
 *
 * A definition holds one or more statement templates, executed in order, and
 * the operation's formal parameter list. Statements without unsafe
 * substitutions are compiled once, at assembly. Statements with `%(name)s`
 * substitutions depend on call-time values and are compiled per distinct set of
 * those values through a bounded memo table.
 *
 * @module queryDefinition
 */

import { CompiledStatement, ParamStyle, translate } from './paramStyle';
import { parsePlaceholders, positionalIndex } from './placeholderParser';
import { findInterpolationNames, interpolate } from './unsafeInterpolator';
import { StatementCache } from './statementCache';
import {
	MissingInterpolationValueError,
	PositionalParameterError,
	QueryDefinitionError,
	UnknownParameterError
} from './errors';
import { getLogger } from './logger';

const QUERY_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const logger = getLogger('QueryDefinition');

/**
 * Options accepted when assembling a definition.
 */
export interface QueryDefinitionOptions
{
	/** Declared formal parameter names; positional call arguments map onto them in this order */
	parameters?: readonly string[];
	/** Memo table size for statements with unsafe substitutions (default: 64) */
	cacheSize?: number;
}

/**
 * One statement of a definition, as written in configuration.
 */
export class StatementTemplate
{
	/** Unsafe substitution names, first-seen order */
	readonly interpolationNames: readonly string[];
	/** Safe placeholder identifiers visible before unsafe substitution, one per occurrence */
	readonly staticIdentifiers: readonly string[];

	private readonly compiled?: CompiledStatement;
	private readonly cache: StatementCache<CompiledStatement>;

	/**
	 * @throws TemplateSyntaxError if either placeholder syntax is malformed
	 */
	constructor(readonly template: string, readonly paramStyle: ParamStyle, cacheSize = 64)
	{
		this.interpolationNames = findInterpolationNames(template);
		this.staticIdentifiers = parsePlaceholders(template).identifiers;
		this.cache = new StatementCache<CompiledStatement>(cacheSize);

		if (this.interpolationNames.length === 0)
		{
			this.compiled = this.render({});
		}
	}

	/**
	 * Whether the statement text depends on call-time unsafe substitution values.
	 */
	get isDynamic(): boolean
	{
		return this.compiled === undefined;
	}

	/**
	 * Returns the statement compiled for the given unsafe substitution values.
	 * @throws MissingInterpolationValueError if a substitution has no value
	 */
	compile(values: Readonly<Record<string, unknown>>): CompiledStatement
	{
		if (this.compiled) return this.compiled;

		const key = JSON.stringify(this.interpolationNames.map(name =>
		{
			if (!Object.hasOwn(values, name))
			{
				throw new MissingInterpolationValueError(name);
			}
			return String(values[name]);
		}));

		return this.cache.getOrCompute(key, () => this.render(values));
	}

	private render(values: Readonly<Record<string, unknown>>): CompiledStatement
	{
		const text = interpolate(this.template, values);
		const statement = translate(parsePlaceholders(text), this.paramStyle, text);
		if (logger.isDebugEnabled())
		{
			logger.debug('Statement compiled', { driverText: statement.driverText, paramOrder: statement.paramOrder });
		}
		return statement;
	}
}

/**
 * Compiled, immutable representation of one named operation.
 */
export class QueryDefinition
{
	/** Every unsafe substitution name used by any statement */
	readonly interpolationNames: ReadonlySet<string>;

	private constructor(
		readonly name: string,
		readonly statements: readonly StatementTemplate[],
		readonly formalParameters: readonly string[],
		/** Number of leading formal parameters that are positional markers (`_0` ... `_n`) */
		readonly positionalCount: number,
		readonly paramStyle: ParamStyle
	)
	{
		this.interpolationNames = new Set(statements.flatMap(s => s.interpolationNames));
	}

	/**
	 * Assembles a definition from raw statement templates.
	 *
	 * @param name Operation name, an identifier
	 * @param statements One template or an ordered list of templates
	 * @param paramStyle Convention the statements are rendered in
	 * @param options Declared parameter list, cache size
	 * @throws QueryDefinitionError for an invalid name, statement list or declared list
	 * @throws TemplateSyntaxError for malformed placeholders
	 * @throws UnknownParameterError if the declared list misses an identifier
	 * @throws PositionalParameterError for misused positional markers
	 */
	static compile(
		name: string,
		statements: string | readonly string[],
		paramStyle: ParamStyle,
		options: QueryDefinitionOptions = {}
	): QueryDefinition
	{
		if (typeof name !== 'string' || !QUERY_NAME_PATTERN.test(name))
		{
			throw new QueryDefinitionError(`Invalid query name '${String(name)}'`);
		}

		const texts = typeof statements === 'string' ? [statements] : [...statements];
		if (texts.length === 0)
		{
			throw new QueryDefinitionError(`Query '${name}' has no statements`);
		}
		texts.forEach((text, index) =>
		{
			if (typeof text !== 'string' || text.trim() === '')
			{
				throw new QueryDefinitionError(`Query '${name}': statement ${index + 1} must be a non-empty string`);
			}
		});

		const declared = options.parameters ? validateDeclaredParameters(name, options.parameters) : undefined;
		const templates = texts.map(text => new StatementTemplate(text, paramStyle, options.cacheSize));

		let positionalCount = 0;
		const named: string[] = [];

		templates.forEach((template, index) =>
		{
			const indices = template.staticIdentifiers
				.map(positionalIndex)
				.filter((i): i is number => i !== undefined);

			if (indices.length > 0)
			{
				if (declared)
				{
					throw new PositionalParameterError(name, `statement ${index + 1} uses positional placeholders together with a declared parameter list`);
				}

				const distinct = [...new Set(indices)].sort((a, b) => a - b);
				if (distinct[distinct.length - 1] !== distinct.length - 1)
				{
					throw new PositionalParameterError(
						name,
						`statement ${index + 1} positional placeholders must run contiguously from _0, found ${distinct.map(i => `_${i}`).join(', ')}`
					);
				}
				positionalCount = Math.max(positionalCount, distinct.length);
			}

			for (const identifier of template.staticIdentifiers)
			{
				if (positionalIndex(identifier) !== undefined || named.includes(identifier)) continue;

				if (declared && !declared.includes(identifier))
				{
					throw new UnknownParameterError(name, identifier);
				}
				named.push(identifier);
			}
		});

		const formalParameters = declared
			? declared
			: [...Array.from({ length: positionalCount }, (_, i) => `_${i}`), ...named];

		logger.debug('Query assembled', {
			name,
			statements: templates.length,
			formalParameters,
			dynamic: templates.filter(t => t.isDynamic).length
		});

		return new QueryDefinition(name, templates, formalParameters, positionalCount, paramStyle);
	}
}

function validateDeclaredParameters(queryName: string, parameters: readonly string[]): string[]
{
	const seen: string[] = [];
	for (const parameter of parameters)
	{
		if (typeof parameter !== 'string' || !QUERY_NAME_PATTERN.test(parameter))
		{
			throw new QueryDefinitionError(`Query '${queryName}': invalid parameter name '${String(parameter)}'`);
		}
		if (positionalIndex(parameter) !== undefined)
		{
			throw new PositionalParameterError(queryName, `positional marker '${parameter}' cannot be declared as a parameter name`);
		}
		if (seen.includes(parameter))
		{
			throw new QueryDefinitionError(`Query '${queryName}': parameter '${parameter}' is declared twice`);
		}
		seen.push(parameter);
	}
	return seen;
}
