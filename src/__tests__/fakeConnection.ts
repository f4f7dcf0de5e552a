import { BufferedCursor, Cursor, CursorResult, DriverConnection } from '../cursor';
import type { Bindings, ParamStyle } from '../paramStyle';

/**
 * One statement received by a FakeConnection.
 */
export interface ExecutedStatement
{
	sql: string;
	bindings: Bindings;
}

type Step = 'begin' | 'commit' | 'rollback' | 'close';

class FakeCursor extends BufferedCursor
{
	constructor(private readonly connection: FakeConnection)
	{
		super();
	}

	protected async run(sql: string, bindings: Bindings): Promise<CursorResult>
	{
		return this.connection.receive(sql, bindings);
	}
}

/**
 * In-process DriverConnection that records every statement and transaction
 * step, answers statements from scripted results and fails on demand.
 */
export class FakeConnection implements DriverConnection
{
	/** Statements in the order they were executed */
	readonly executed: ExecutedStatement[] = [];
	/** Transaction steps and statements, e.g. ['begin', 'execute SELECT 1', 'commit'] */
	readonly events: string[] = [];

	private readonly results = new Map<string, CursorResult | Error>();
	private readonly failures = new Map<Step, Error>();

	constructor(readonly paramStyle: ParamStyle = 'qmark')
	{
	}

	/**
	 * Scripts the answer to a statement; an Error is thrown as a driver error.
	 */
	respond(sql: string, result: CursorResult | Error): this
	{
		this.results.set(sql, result);
		return this;
	}

	/**
	 * Makes a transaction step or close fail with `error`.
	 */
	failOn(step: Step, error: Error): this
	{
		this.failures.set(step, error);
		return this;
	}

	async receive(sql: string, bindings: Bindings): Promise<CursorResult>
	{
		this.executed.push({ sql, bindings });
		this.events.push(`execute ${sql}`);

		const result = this.results.get(sql);
		if (result instanceof Error)
		{
			throw result;
		}
		return result ?? { rows: [], rowCount: -1 };
	}

	cursor(): Cursor
	{
		return new FakeCursor(this);
	}

	async begin(): Promise<void>
	{
		this.step('begin');
	}

	async commit(): Promise<void>
	{
		this.step('commit');
	}

	async rollback(): Promise<void>
	{
		this.step('rollback');
	}

	async close(): Promise<void>
	{
		this.step('close');
	}

	private step(step: Step): void
	{
		this.events.push(step);
		const failure = this.failures.get(step);
		if (failure)
		{
			throw failure;
		}
	}
}
