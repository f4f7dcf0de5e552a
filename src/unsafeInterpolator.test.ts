/**
 * Tests for unsafe %(name)s substitution
 */

import { describe, it, expect } from 'vitest';
import { findInterpolationNames, interpolate } from './unsafeInterpolator';
import { MissingInterpolationValueError, TemplateSyntaxError } from './errors';

describe('interpolate', () =>
{
	it('should insert values verbatim', () =>
	{
		const text = interpolate('SELECT * FROM users ORDER BY name %(order)s', { order: 'DESC' });

		expect(text).toBe('SELECT * FROM users ORDER BY name DESC');
	});

	it('should not quote or escape inserted text', () =>
	{
		const text = interpolate('SELECT * FROM %(table)s', { table: "users; DROP TABLE users; --'" });

		expect(text).toBe("SELECT * FROM users; DROP TABLE users; --'");
	});

	it('should render non-string values with String()', () =>
	{
		expect(interpolate('SELECT * FROM users LIMIT %(limit)s', { limit: 10 })).toBe('SELECT * FROM users LIMIT 10');
	});

	it('should replace every occurrence of a repeated name', () =>
	{
		expect(interpolate('%(col)s, %(col)s', { col: 'name' })).toBe('name, name');
	});

	it('should render %% as a single %', () =>
	{
		expect(interpolate("SELECT '100%%' AS pct", {})).toBe("SELECT '100%' AS pct");
	});

	it('should leave a lone % untouched', () =>
	{
		expect(interpolate("SELECT * FROM users WHERE name LIKE 'v%'", {})).toBe("SELECT * FROM users WHERE name LIKE 'v%'");
	});

	it('should keep safe placeholders contained in an inserted fragment', () =>
	{
		const text = interpolate('SELECT * FROM users WHERE %(predicate)s', { predicate: 'name LIKE ${pattern}' });

		expect(text).toBe('SELECT * FROM users WHERE name LIKE ${pattern}');
	});

	it('should throw MissingInterpolationValueError for an absent key', () =>
	{
		expect(() => interpolate('ORDER BY name %(order)s', {})).toThrow(MissingInterpolationValueError);
		expect(() => interpolate('ORDER BY name %(order)s', {})).toThrow("No value supplied for unsafe substitution 'order'");
	});

	it('should ignore inherited properties', () =>
	{
		expect(() => interpolate('%(toString)s', {})).toThrow(MissingInterpolationValueError);
	});

	describe('syntax errors', () =>
	{
		it('should reject an unterminated substitution', () =>
		{
			expect(() => interpolate('ORDER BY name %(order', { order: 'ASC' })).toThrow(TemplateSyntaxError);
			expect(() => interpolate('ORDER BY name %(order', { order: 'ASC' })).toThrow('Unterminated unsafe substitution at offset 14');
		});

		it('should reject a conversion other than s', () =>
		{
			expect(() => interpolate('LIMIT %(limit)d', { limit: 1 })).toThrow(TemplateSyntaxError);
		});

		it('should reject an invalid name', () =>
		{
			expect(() => interpolate('%(sort order)s', {})).toThrow(TemplateSyntaxError);
		});
	});
});

describe('findInterpolationNames', () =>
{
	it('should list names once, in first-seen order', () =>
	{
		expect(findInterpolationNames('%(b)s %(a)s %(b)s')).toEqual(['b', 'a']);
	});

	it('should skip escaped percent signs', () =>
	{
		expect(findInterpolationNames("SELECT '%%(x)s', %(y)s")).toEqual(['y']);
	});

	it('should return nothing for a template without substitutions', () =>
	{
		expect(findInterpolationNames('SELECT * FROM users WHERE name = ${name}')).toEqual([]);
	});
});
