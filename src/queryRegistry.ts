import { QueryDefinition } from './queryDefinition';
import type { ParamStyle } from './paramStyle';
import { readQueries } from './catalogConfig';
import { UnknownQueryError } from './errors';
import { getLogger } from './logger';

/**
 * Options for a QueryRegistry.
 */
export interface QueryRegistryOptions
{
	/** Memo table size per dynamic statement (default: 64) */
	statementCacheSize?: number;
}

/**
 * Name -> QueryDefinition map for one binding convention.
 *
 * Registering an existing name replaces its definition. A definition that
 * fails to assemble never enters the registry. Mutation is single-writer:
 * callers must not register while calls on the same registry are in flight.
 */
export class QueryRegistry
{
	private readonly definitions = new Map<string, QueryDefinition>();
	private readonly logger = getLogger('QueryRegistry');

	constructor(readonly paramStyle: ParamStyle, private readonly options: QueryRegistryOptions = {})
	{
	}

	/**
	 * Assembles and adds (or replaces) an operation.
	 *
	 * @param name Operation name
	 * @param statements One template or an ordered list of templates
	 * @param parameters Optional declared formal parameter names
	 * @returns The new definition
	 */
	register(name: string, statements: string | readonly string[], parameters?: readonly string[]): QueryDefinition
	{
		const definition = this.assemble(name, statements, parameters);
		this.store(definition);
		return definition;
	}

	/**
	 * Registers every entry of a configuration's QUERIES section.
	 * Every entry is assembled before any is registered, so a failing entry leaves the registry unchanged.
	 * @returns Names registered, in configuration order
	 */
	loadFromConfig(config: unknown): string[]
	{
		const definitions = readQueries(config).map(entry => this.assemble(entry.name, entry.statements, entry.parameters));
		definitions.forEach(definition => this.store(definition));
		this.logger.info('Queries loaded from configuration', { count: definitions.length });
		return definitions.map(definition => definition.name);
	}

	/**
	 * @throws UnknownQueryError if no operation is registered under `name`
	 */
	get(name: string): QueryDefinition
	{
		const definition = this.definitions.get(name);
		if (!definition)
		{
			throw new UnknownQueryError(name);
		}
		return definition;
	}

	has(name: string): boolean
	{
		return this.definitions.has(name);
	}

	names(): string[]
	{
		return [...this.definitions.keys()];
	}

	get size(): number
	{
		return this.definitions.size;
	}

	private assemble(name: string, statements: string | readonly string[], parameters?: readonly string[]): QueryDefinition
	{
		return QueryDefinition.compile(name, statements, this.paramStyle, {
			parameters,
			cacheSize: this.options.statementCacheSize
		});
	}

	private store(definition: QueryDefinition): void
	{
		const replaced = this.definitions.has(definition.name);
		this.definitions.set(definition.name, definition);
		this.logger.debug(replaced ? 'Query replaced' : 'Query registered', {
			name: definition.name,
			formalParameters: definition.formalParameters
		});
	}
}
