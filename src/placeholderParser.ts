/**
 * Safe placeholder parsing.
 *
 * Statement templates mark bound parameters with `${identifier}`. An identifier
 * is either a name (`${username}`) or a zero-based positional marker (`${_0}`).
 * `$$` renders a single `$`; any other `$` is literal text.
 *
 * The parser does not decide how a placeholder is rendered. It returns the text
 * around each placeholder (`segments`) and the identifiers in occurrence order,
 * and the ParamStyle translator fills the gaps.
 *
 * @module placeholderParser
 */

import { TemplateSyntaxError } from './errors';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const POSITIONAL_PATTERN = /^_(0|[1-9][0-9]*)$/;

/**
 * A template split around its safe placeholders.
 * `segments.length` is always `identifiers.length + 1`.
 */
export interface ParsedTemplate
{
	/** Literal SQL between placeholders */
	readonly segments: readonly string[];
	/** Placeholder identifiers, one entry per occurrence */
	readonly identifiers: readonly string[];
}

/**
 * Scans `text` left to right for `${identifier}` placeholders.
 * @throws TemplateSyntaxError for an unterminated `${` or an invalid identifier
 */
export function parsePlaceholders(text: string): ParsedTemplate
{
	const segments: string[] = [];
	const identifiers: string[] = [];
	let current = '';
	let i = 0;

	while (i < text.length)
	{
		const ch = text[i];
		const next = text[i + 1];

		if (ch === '$' && next === '$')
		{
			current += '$';
			i += 2;
		}
		else if (ch === '$' && next === '{')
		{
			const close = text.indexOf('}', i + 2);
			if (close === -1)
			{
				throw new TemplateSyntaxError('Unterminated placeholder', text, i);
			}

			const identifier = text.slice(i + 2, close);
			if (!IDENTIFIER_PATTERN.test(identifier))
			{
				throw new TemplateSyntaxError(`Invalid placeholder '\${${identifier}}'`, text, i);
			}

			segments.push(current);
			identifiers.push(identifier);
			current = '';
			i = close + 1;
		}
		else
		{
			current += ch;
			i++;
		}
	}

	segments.push(current);
	return { segments, identifiers };
}

/**
 * Returns the index of a positional marker (`_3` → 3), or undefined for a named identifier.
 */
export function positionalIndex(identifier: string): number | undefined
{
	const match = POSITIONAL_PATTERN.exec(identifier);
	return match ? Number(match[1]) : undefined;
}

/**
 * Returns the identifiers of a parsed template without duplicates, first-seen order.
 */
export function distinctIdentifiers(parsed: ParsedTemplate): string[]
{
	return [...new Set(parsed.identifiers)];
}
