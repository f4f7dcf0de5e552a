/**
 * Tests for transaction boundaries
 */

import { describe, it, expect } from 'vitest';
import { Transaction, isInTransaction, withTransaction } from './transaction';
import { RollbackError, TransactionStateError } from './errors';
import { FakeConnection } from './__tests__/fakeConnection';

describe('Transaction', () =>
{
	it('should commit when the scope resolves', async () =>
	{
		const connection = new FakeConnection();
		const transaction = new Transaction(connection);

		const result = await transaction.run(async () =>
		{
			expect(isInTransaction(connection)).toBe(true);
			return 'done';
		});

		expect(result).toBe('done');
		expect(connection.events).toEqual(['begin', 'commit']);
		expect(transaction.state).toBe('committed');
		expect(isInTransaction(connection)).toBe(false);
	});

	it('should roll back and rethrow the original error when the scope throws', async () =>
	{
		const connection = new FakeConnection();
		const transaction = new Transaction(connection);
		const failure = new Error('scope failed');

		await expect(transaction.run(async () =>
		{
			throw failure;
		})).rejects.toBe(failure);

		expect(connection.events).toEqual(['begin', 'rollback']);
		expect(transaction.state).toBe('rolled_back');
		expect(isInTransaction(connection)).toBe(false);
	});

	it('should roll back for errors that are not driver errors', async () =>
	{
		const connection = new FakeConnection();

		await expect(new Transaction(connection).run(async () =>
		{
			throw new TypeError('not a database problem');
		})).rejects.toThrow(TypeError);

		expect(connection.events).toEqual(['begin', 'rollback']);
	});

	it('should report a failed rollback together with the original error', async () =>
	{
		const rollbackFailure = new Error('connection lost');
		const connection = new FakeConnection().failOn('rollback', rollbackFailure);
		const failure = new Error('scope failed');

		const error = await new Transaction(connection).run(async () =>
		{
			throw failure;
		}).catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(RollbackError);
		if (error instanceof RollbackError)
		{
			expect(error.originalError).toBe(failure);
			expect(error.cause).toBe(rollbackFailure);
			expect(error.message).toBe('Rollback failed: connection lost (while handling: scope failed)');
		}
		expect(isInTransaction(connection)).toBe(false);
	});

	it('should roll back and rethrow when the commit fails', async () =>
	{
		const commitFailure = new Error('deferred constraint violated');
		const connection = new FakeConnection().failOn('commit', commitFailure);
		const transaction = new Transaction(connection);

		await expect(transaction.run(async () => 1)).rejects.toBe(commitFailure);

		expect(connection.events).toEqual(['begin', 'commit', 'rollback']);
		expect(transaction.state).toBe('rolled_back');
	});

	it('should refuse a second transaction on the same connection', async () =>
	{
		const connection = new FakeConnection();
		const outer = new Transaction(connection);
		await outer.begin();

		await expect(new Transaction(connection).begin()).rejects.toThrow(TransactionStateError);
		expect(connection.events).toEqual(['begin']);

		await outer.commit();
		await expect(new Transaction(connection).run(async () => 'again')).resolves.toBe('again');
	});

	it('should not be reusable after it ends', async () =>
	{
		const transaction = new Transaction(new FakeConnection());
		await transaction.run(async () => undefined);

		await expect(transaction.begin()).rejects.toThrow("Cannot begin a transaction in state 'committed'");
		await expect(transaction.commit()).rejects.toThrow("Cannot commit a transaction in state 'committed'");
		await expect(transaction.rollback()).rejects.toThrow("Cannot roll back a transaction in state 'committed'");
	});

	it('should release the connection when begin fails', async () =>
	{
		const beginFailure = new Error('database is locked');
		const connection = new FakeConnection().failOn('begin', beginFailure);
		const transaction = new Transaction(connection);

		await expect(transaction.begin()).rejects.toBe(beginFailure);

		expect(transaction.state).toBe('idle');
		expect(isInTransaction(connection)).toBe(false);
	});

	it('should run statements issued inside the scope between begin and commit', async () =>
	{
		const connection = new FakeConnection();
		const cursor = connection.cursor();

		await withTransaction({ connection }, async () =>
		{
			await cursor.execute('DELETE FROM users', []);
		});

		expect(connection.events).toEqual(['begin', 'execute DELETE FROM users', 'commit']);
	});
});
