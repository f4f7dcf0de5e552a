/**
 * Tests for configuration reading
 */

import { describe, it, expect } from 'vitest';
import { expandParameters, readQueries, toConfigSource } from './catalogConfig';
import { ConfigurationError } from './errors';

describe('readQueries', () =>
{
	it('should read every entry form', () =>
	{
		const specs = readQueries({
			QUERIES: {
				list_users: 'SELECT * FROM users',
				create_user_returning_id: [
					'INSERT INTO users(name, password) VALUES(${name}, ${password})',
					'SELECT last_insert_rowid() AS id'
				],
				create_user: {
					statements: 'INSERT INTO users(name, password) VALUES(${username}, ${password})',
					parameters: ['username', 'password']
				},
				rename_user: {
					query: 'UPDATE users SET name = ${new_name} WHERE name = ${old_name}',
					parameters: 'old_name new_name'
				}
			}
		});

		expect(specs).toEqual([
			{ name: 'list_users', statements: 'SELECT * FROM users' },
			{
				name: 'create_user_returning_id',
				statements: ['INSERT INTO users(name, password) VALUES(${name}, ${password})', 'SELECT last_insert_rowid() AS id']
			},
			{
				name: 'create_user',
				statements: 'INSERT INTO users(name, password) VALUES(${username}, ${password})',
				parameters: ['username', 'password']
			},
			{
				name: 'rename_user',
				statements: 'UPDATE users SET name = ${new_name} WHERE name = ${old_name}',
				parameters: ['old_name', 'new_name']
			}
		]);
	});

	it('should read Map-based configuration', () =>
	{
		const config = new Map([
			['QUERIES', new Map<string, unknown>([
				['list_users', 'SELECT * FROM users'],
				['create_user', new Map<string, unknown>([['query', 'INSERT INTO users(name) VALUES(${name})']])]
			])]
		]);

		expect(readQueries(config)).toEqual([
			{ name: 'list_users', statements: 'SELECT * FROM users' },
			{ name: 'create_user', statements: 'INSERT INTO users(name) VALUES(${name})', parameters: undefined }
		]);
	});

	it('should return nothing when the QUERIES section is missing', () =>
	{
		expect(readQueries({ MODULE: { name: 'sqlite' } })).toEqual([]);
	});

	it('should reject a configuration that is not a mapping', () =>
	{
		expect(() => readQueries(42)).toThrow(ConfigurationError);
		expect(() => readQueries({ QUERIES: ['SELECT 1'] })).toThrow('QUERIES section must be a mapping');
	});

	it('should reject an entry with both statements and query', () =>
	{
		expect(() => readQueries({ QUERIES: { q: { statements: 'SELECT 1', query: 'SELECT 2' } } }))
			.toThrow("Invalid query specification for 'q'");
	});

	it('should reject unknown keys in an entry', () =>
	{
		expect(() => readQueries({ QUERIES: { q: { query: 'SELECT 1', params: ['a'] } } })).toThrow(ConfigurationError);
	});

	it('should reject non-string statements', () =>
	{
		expect(() => readQueries({ QUERIES: { q: 42 } })).toThrow(ConfigurationError);
		expect(() => readQueries({ QUERIES: { q: [] } })).toThrow(ConfigurationError);
	});
});

describe('toConfigSource', () =>
{
	it('should expose only own keys of a plain object', () =>
	{
		const source = toConfigSource({ a: 1 }, 'Section');

		expect(source.get('a')).toBe(1);
		expect(source.get('toString')).toBeUndefined();
		expect([...source.keys()]).toEqual(['a']);
	});

	it('should use a Map as-is', () =>
	{
		const map = new Map([['a', 1]]);

		expect(toConfigSource(map, 'Section')).toBe(map);
	});

	it('should reject other values', () =>
	{
		expect(() => toConfigSource('a', 'DATABASE section')).toThrow('DATABASE section must be a mapping');
		expect(() => toConfigSource(null, 'Configuration')).toThrow(ConfigurationError);
	});
});

describe('expandParameters', () =>
{
	it('should replace references with parameter values', () =>
	{
		expect(expandParameters('/var/lib/{app}/{env}.db', { app: 'catalog', env: 'test' })).toBe('/var/lib/catalog/test.db');
		expect(expandParameters('{port}', { port: 5432 })).toBe('5432');
	});

	it('should treat doubled braces as literal braces', () =>
	{
		expect(expandParameters('{{literal}} {name}', { name: 'x' })).toBe('{literal} x');
	});

	it('should leave text without references unchanged', () =>
	{
		expect(expandParameters(':memory:', {})).toBe(':memory:');
	});

	it('should reject a reference without a parameter', () =>
	{
		expect(() => expandParameters('{password}', {})).toThrow("Connection setting references unknown parameter '{password}'");
	});
});
