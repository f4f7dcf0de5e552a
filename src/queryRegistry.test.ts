import { describe, it, expect } from 'vitest';
import { QueryRegistry } from './queryRegistry';
import { ConfigurationError, TemplateSyntaxError, UnknownQueryError } from './errors';

describe('QueryRegistry', () =>
{
	it('should register and look up definitions', () =>
	{
		const registry = new QueryRegistry('named');
		const definition = registry.register('list_users', 'SELECT * FROM users WHERE name <> ${name}');

		expect(registry.get('list_users')).toBe(definition);
		expect(definition.paramStyle).toBe('named');
		expect(registry.has('list_users')).toBe(true);
		expect(registry.size).toBe(1);
	});

	it('should replace a definition registered under the same name', () =>
	{
		const registry = new QueryRegistry('qmark');
		registry.register('list_users', 'SELECT * FROM users');
		const replacement = registry.register('list_users', 'SELECT UPPER(name) AS name FROM users');

		expect(registry.get('list_users')).toBe(replacement);
		expect(registry.names()).toEqual(['list_users']);
	});

	it('should not register a definition that fails to assemble', () =>
	{
		const registry = new QueryRegistry('qmark');
		registry.register('list_users', 'SELECT * FROM users');

		expect(() => registry.register('list_users', 'SELECT * FROM users WHERE name = ${name')).toThrow(TemplateSyntaxError);
		expect(() => registry.register('broken', 'SELECT ${')).toThrow(TemplateSyntaxError);

		expect(registry.get('list_users').statements[0].template).toBe('SELECT * FROM users');
		expect(registry.has('broken')).toBe(false);
	});

	it('should throw UnknownQueryError for an unregistered name', () =>
	{
		const registry = new QueryRegistry('qmark');

		expect(() => registry.get('drop_everything')).toThrow(UnknownQueryError);
		expect(() => registry.get('drop_everything')).toThrow("Unknown query 'drop_everything'");
	});

	it('should load the QUERIES section in configuration order', () =>
	{
		const registry = new QueryRegistry('qmark');

		const names = registry.loadFromConfig({
			QUERIES: {
				create_user: { query: 'INSERT INTO users(name, password) VALUES(${username}, ${password})', parameters: ['password', 'username'] },
				list_users: 'SELECT * FROM users ORDER BY name %(order)s'
			}
		});

		expect(names).toEqual(['create_user', 'list_users']);
		expect(registry.get('create_user').formalParameters).toEqual(['password', 'username']);
		expect(registry.get('list_users').statements[0].isDynamic).toBe(true);
	});

	it('should register no entry when the configuration is invalid', () =>
	{
		const registry = new QueryRegistry('qmark');

		expect(() => registry.loadFromConfig({ QUERIES: { list_users: 'SELECT 1', bad: 7 } })).toThrow(ConfigurationError);
		expect(registry.size).toBe(0);
	});

	it('should register no entry when a later entry fails to assemble', () =>
	{
		const registry = new QueryRegistry('qmark');

		expect(() => registry.loadFromConfig({ QUERIES: { list_users: 'SELECT 1', broken: 'SELECT ${name' } }))
			.toThrow(TemplateSyntaxError);
		expect(registry.has('list_users')).toBe(false);
	});

	it('should pass the statement cache size to definitions', () =>
	{
		const registry = new QueryRegistry('qmark', { statementCacheSize: 0 });
		const [statement] = registry.register('list_users', 'SELECT * FROM users ORDER BY name %(order)s').statements;

		expect(statement.compile({ order: 'ASC' })).not.toBe(statement.compile({ order: 'ASC' }));
	});
});
