/**
 * Unsafe substitution of structural SQL fragments.
 *
 * Templates reference caller-supplied text with printf-style named conversions:
 *
 *     SELECT * FROM users ORDER BY name %(order)s
 *
 * The value is inserted as-is. Nothing is quoted or escaped, so whatever the
 * caller passes becomes SQL. Only use it for fragments that cannot be bound as
 * parameters (identifiers, sort direction, predicates built by trusted code).
 *
 * `%%` renders a single `%`; any other `%` is left untouched. This pass runs
 * before safe placeholders are parsed, so an inserted fragment may itself
 * contain `${...}` placeholders.
 *
 * @module unsafeInterpolator
 */

import { MissingInterpolationValueError, TemplateSyntaxError } from './errors';

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

type Token =
	| { kind: 'text'; text: string }
	| { kind: 'name'; name: string };

/**
 * Splits a template into literal text and `%(name)s` references.
 * Adjacent literal pieces are merged.
 */
function tokenize(template: string): Token[]
{
	const tokens: Token[] = [];
	let text = '';
	let i = 0;

	while (i < template.length)
	{
		const ch = template[i];
		if (ch !== '%')
		{
			text += ch;
			i++;
			continue;
		}

		const next = template[i + 1];
		if (next === '%')
		{
			text += '%';
			i += 2;
			continue;
		}
		if (next !== '(')
		{
			text += ch;
			i++;
			continue;
		}

		const close = template.indexOf(')', i + 2);
		if (close === -1)
		{
			throw new TemplateSyntaxError('Unterminated unsafe substitution', template, i);
		}

		const name = template.slice(i + 2, close);
		if (!NAME_PATTERN.test(name))
		{
			throw new TemplateSyntaxError(`Invalid unsafe substitution name '${name}'`, template, i);
		}
		if (template[close + 1] !== 's')
		{
			throw new TemplateSyntaxError(`Unsupported conversion for unsafe substitution '${name}', expected %(${name})s`, template, i);
		}

		if (text)
		{
			tokens.push({ kind: 'text', text });
			text = '';
		}
		tokens.push({ kind: 'name', name });
		i = close + 2;
	}

	if (text)
	{
		tokens.push({ kind: 'text', text });
	}
	return tokens;
}

/**
 * Lists the unsafe substitution names a template references, first-seen order, without duplicates.
 * @throws TemplateSyntaxError on malformed `%(` syntax
 */
export function findInterpolationNames(template: string): string[]
{
	const names: string[] = [];
	for (const token of tokenize(template))
	{
		if (token.kind === 'name' && !names.includes(token.name))
		{
			names.push(token.name);
		}
	}
	return names;
}

/**
 * Replaces every `%(name)s` with `String(values[name])`.
 *
 * @param template Statement template
 * @param values Substitution values; only own properties are consulted
 * @returns The interpolated text, unsanitized
 * @throws MissingInterpolationValueError if a referenced name has no value
 * @throws TemplateSyntaxError on malformed `%(` syntax
 */
export function interpolate(template: string, values: Readonly<Record<string, unknown>>): string
{
	return tokenize(template).map(token =>
	{
		if (token.kind === 'text')
		{
			return token.text;
		}
		if (!Object.hasOwn(values, token.name))
		{
			throw new MissingInterpolationValueError(token.name);
		}
		return String(values[token.name]);
	}).join('');
}
