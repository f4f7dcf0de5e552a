import type { Bindings, ParamStyle } from './paramStyle';

/**
 * Column metadata of the last result set.
 */
export interface ColumnDescription
{
	/** Column name or alias as reported by the driver */
	name: string;
	/** Driver-specific type code, when the driver reports one */
	typeCode?: number | string;
}

/**
 * One result row, values in column order.
 */
export type RawRow = readonly unknown[];

/**
 * The cursor state a row factory may read.
 */
export interface CursorMetadata
{
	/** Columns of the last result set; undefined when the statement returned none */
	readonly description: readonly ColumnDescription[] | undefined;
	/** Rows returned or affected by the last statement, -1 when the driver cannot tell */
	readonly rowCount: number;
}

/**
 * Turns a raw row into the value an operation returns.
 */
export type RowFactory<T> = (cursor: CursorMetadata, row: RawRow) => T;

/**
 * Executes statements on a connection and keeps the result of the last one.
 */
export interface Cursor extends CursorMetadata
{
	/** Driver text of the last executed statement */
	readonly lastStatement: string | undefined;

	/**
	 * Executes `sql` with driver-native `bindings`, replacing the previous result.
	 * Driver errors propagate unchanged.
	 */
	execute(sql: string, bindings: Bindings): Promise<void>;

	/**
	 * Rows of the last executed statement; empty when it returned no result set.
	 */
	fetchAll(): RawRow[];
}

/**
 * A live database connection, as seen by the catalog.
 * Implementations wrap an already-open driver handle.
 */
export interface DriverConnection
{
	/** Binding convention statements must be rendered in */
	readonly paramStyle: ParamStyle;

	cursor(): Cursor;

	/** Starts a transaction, suspending the driver's per-statement autocommit */
	begin(): Promise<void>;
	commit(): Promise<void>;
	rollback(): Promise<void>;
	close(): Promise<void>;
}

/**
 * Buffered result of one driver call.
 */
export interface CursorResult
{
	columns?: ColumnDescription[];
	rows: RawRow[];
	rowCount: number;
}

/**
 * Cursor base class for drivers that return complete result sets.
 * Subclasses only implement `run`.
 */
export abstract class BufferedCursor implements Cursor
{
	private result: CursorResult | undefined;
	private statement: string | undefined;

	get description(): readonly ColumnDescription[] | undefined
	{
		return this.result?.columns;
	}

	get rowCount(): number
	{
		return this.result?.rowCount ?? -1;
	}

	get lastStatement(): string | undefined
	{
		return this.statement;
	}

	async execute(sql: string, bindings: Bindings): Promise<void>
	{
		this.result = undefined;
		this.statement = sql;
		this.result = await this.run(sql, bindings);
	}

	fetchAll(): RawRow[]
	{
		return this.result ? [...this.result.rows] : [];
	}

	/**
	 * Sends one statement to the driver.
	 */
	protected abstract run(sql: string, bindings: Bindings): Promise<CursorResult>;
}

/**
 * Default row factory: maps column names to values.
 * Later columns win when a result set repeats a name.
 */
export function dictRowFactory(cursor: CursorMetadata, row: RawRow): Record<string, unknown>
{
	const record: Record<string, unknown> = {};
	(cursor.description ?? []).forEach((column, index) =>
	{
		record[column.name] = row[index];
	});
	return record;
}

/**
 * Row factory returning the values as a plain array.
 */
export function arrayRowFactory(_cursor: CursorMetadata, row: RawRow): unknown[]
{
	return [...row];
}
