/**
 * Transaction - a begin/commit/rollback boundary around several catalog calls.
 *
 * A transaction moves from `idle` to `active` on begin, and ends either
 * `committed` or `rolled_back`. A scope commits when its callback resolves and
 * rolls back when it throws, whatever the error is. The original error is
 * rethrown unchanged; if the rollback fails too, a RollbackError is thrown
 * instead and carries both.
 *
 * Transactions are not reentrant: a connection with an active transaction
 * refuses a second one. Nested units of work must share the outer scope.
 *
 * @module transaction
 */

import type { DriverConnection } from './cursor';
import { RollbackError, TransactionStateError } from './errors';
import { getLogger } from './logger';

export type TransactionState = 'idle' | 'active' | 'committed' | 'rolled_back';

/** Connections that currently have an active transaction */
const activeConnections = new WeakSet<DriverConnection>();

/**
 * Whether `connection` is inside an active transaction.
 */
export function isInTransaction(connection: DriverConnection): boolean
{
	return activeConnections.has(connection);
}

export class Transaction
{
	private currentState: TransactionState = 'idle';
	private readonly logger = getLogger('Transaction');

	constructor(private readonly connection: DriverConnection)
	{
	}

	get state(): TransactionState
	{
		return this.currentState;
	}

	/**
	 * Issues the driver's begin.
	 * @throws TransactionStateError if this transaction was already used or the connection has an active one
	 */
	async begin(): Promise<void>
	{
		if (this.currentState !== 'idle')
		{
			throw new TransactionStateError(`Cannot begin a transaction in state '${this.currentState}'`);
		}
		if (activeConnections.has(this.connection))
		{
			throw new TransactionStateError('Connection already has an active transaction; nested work must share the outer scope');
		}

		activeConnections.add(this.connection);
		try
		{
			await this.connection.begin();
		}
		catch (error)
		{
			activeConnections.delete(this.connection);
			throw error;
		}
		this.currentState = 'active';
		this.logger.debug('Transaction started');
	}

	/**
	 * Commits. If the commit fails the transaction is rolled back and the commit error rethrown.
	 * @throws TransactionStateError if the transaction is not active
	 * @throws RollbackError if rolling back the failed commit fails as well
	 */
	async commit(): Promise<void>
	{
		this.assertActive('commit');

		try
		{
			await this.connection.commit();
		}
		catch (error)
		{
			this.logger.warn('Commit failed, rolling back', { error });
			await this.rollbackAfter(error);
			throw error;
		}

		this.finish('committed');
		this.logger.debug('Transaction committed');
	}

	/**
	 * Rolls back.
	 * @throws TransactionStateError if the transaction is not active
	 */
	async rollback(): Promise<void>
	{
		this.assertActive('roll back');

		try
		{
			await this.connection.rollback();
		}
		finally
		{
			this.finish('rolled_back');
		}
		this.logger.debug('Transaction rolled back');
	}

	/**
	 * Runs `scope` inside this transaction: begin, then commit on success or
	 * roll back and rethrow on failure.
	 */
	async run<R>(scope: () => Promise<R>): Promise<R>
	{
		await this.begin();

		let result: R;
		try
		{
			result = await scope();
		}
		catch (error)
		{
			this.logger.warn('Transaction scope failed, rolling back', { error });
			await this.rollbackAfter(error);
			throw error;
		}

		await this.commit();
		return result;
	}

	private async rollbackAfter(originalError: unknown): Promise<void>
	{
		try
		{
			await this.rollback();
		}
		catch (rollbackError)
		{
			this.logger.error('Rollback failed', { error: rollbackError, originalError });
			throw new RollbackError(originalError, rollbackError);
		}
	}

	private assertActive(action: string): void
	{
		if (this.currentState !== 'active')
		{
			throw new TransactionStateError(`Cannot ${action} a transaction in state '${this.currentState}'`);
		}
	}

	private finish(state: 'committed' | 'rolled_back'): void
	{
		this.currentState = state;
		activeConnections.delete(this.connection);
	}
}

/**
 * Anything that exposes the connection its operations run on.
 */
export interface TransactionalSurface
{
	readonly connection: DriverConnection;
}

/**
 * Runs `scope` in a new transaction on the surface's connection.
 * Every catalog call awaited inside the scope is part of the transaction.
 *
 * @example
 * await withTransaction(catalog, async db =>
 * {
 *     await db.callNamed('debit', { account: 'a', amount: 10 });
 *     await db.callNamed('credit', { account: 'b', amount: 10 });
 * });
 */
export async function withTransaction<S extends TransactionalSurface, R>(surface: S, scope: (surface: S) => Promise<R>): Promise<R>
{
	return new Transaction(surface.connection).run(() => scope(surface));
}
