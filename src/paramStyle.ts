/**
 * ParamStyle translation - rewrites parsed safe placeholders into a driver's
 * native binding convention and builds the matching binding structure.
 *
 * | style      | marker           | bindings                          |
 * |------------|------------------|-----------------------------------|
 * | `qmark`    | `?`              | array, one value per occurrence   |
 * | `numeric`  | `:1`, `:2`, ...  | array, one value per distinct name|
 * | `named`    | `:name`          | object keyed by name              |
 * | `format`   | `%s`             | array, one value per occurrence   |
 * | `pyformat` | `%(name)s`       | object keyed by name              |
 * | `dollar`   | `$1`, `$2`, ...  | array, one value per distinct name|
 *
 * @module paramStyle
 */

import { ParsedTemplate, distinctIdentifiers } from './placeholderParser';
import { ConfigurationError } from './errors';

export const PARAM_STYLES = ['qmark', 'numeric', 'named', 'format', 'pyformat', 'dollar'] as const;

/**
 * Native parameter-binding convention of a driver.
 */
export type ParamStyle = typeof PARAM_STYLES[number];

/**
 * Whether a driver receives its parameters as an ordered array or a name-keyed object.
 */
export type BindingShape = 'sequence' | 'mapping';

/**
 * Parameters in the form the driver expects.
 */
export type Bindings = unknown[] | Record<string, unknown>;

/**
 * One statement rendered for a specific driver convention.
 */
export interface CompiledStatement
{
	/** Template text after unsafe substitution, placeholders intact */
	readonly rawText: string;
	/** Text with placeholders in the driver's native syntax */
	readonly driverText: string;
	/** Identifier of every placeholder occurrence, left to right */
	readonly paramOrder: readonly string[];
	/** Identifier feeding each binding slot (array index or object key) */
	readonly bindingNames: readonly string[];
	readonly shape: BindingShape;
	readonly paramStyle: ParamStyle;
}

interface StyleRenderer
{
	shape: BindingShape;
	/** Whether repeated identifiers share one binding slot */
	shared: boolean;
	/** Renders the marker for `identifier`, whose slot number (1-based) is `slot` */
	marker(identifier: string, slot: number): string;
}

const RENDERERS: Record<ParamStyle, StyleRenderer> = {
	qmark: { shape: 'sequence', shared: false, marker: () => '?' },
	numeric: { shape: 'sequence', shared: true, marker: (_, slot) => `:${slot}` },
	named: { shape: 'mapping', shared: true, marker: identifier => `:${identifier}` },
	format: { shape: 'sequence', shared: false, marker: () => '%s' },
	pyformat: { shape: 'mapping', shared: true, marker: identifier => `%(${identifier})s` },
	dollar: { shape: 'sequence', shared: true, marker: (_, slot) => `$${slot}` },
};

/**
 * Type guard for paramstyle names coming from configuration.
 */
export function isParamStyle(value: unknown): value is ParamStyle
{
	return typeof value === 'string' && (PARAM_STYLES as readonly string[]).includes(value);
}

/**
 * Validates a paramstyle name.
 * @throws ConfigurationError if `value` is not one of PARAM_STYLES
 */
export function toParamStyle(value: unknown): ParamStyle
{
	if (!isParamStyle(value))
	{
		throw new ConfigurationError(`Unsupported paramstyle '${String(value)}', expected one of: ${PARAM_STYLES.join(', ')}`);
	}
	return value;
}

/**
 * Renders a parsed template in `paramStyle`.
 *
 * @param parsed Output of parsePlaceholders
 * @param paramStyle Target convention
 * @param rawText Template text the parse came from, kept for diagnostics
 */
export function translate(parsed: ParsedTemplate, paramStyle: ParamStyle, rawText: string): CompiledStatement
{
	const renderer = RENDERERS[paramStyle];
	const distinct = distinctIdentifiers(parsed);

	let driverText = parsed.segments[0];
	parsed.identifiers.forEach((identifier, index) =>
	{
		driverText += renderer.marker(identifier, distinct.indexOf(identifier) + 1) + parsed.segments[index + 1];
	});

	return {
		rawText,
		driverText,
		paramOrder: parsed.identifiers,
		bindingNames: renderer.shared ? distinct : parsed.identifiers,
		shape: renderer.shape,
		paramStyle,
	};
}

/**
 * Builds the driver binding structure for a compiled statement.
 *
 * @param statement Compiled statement
 * @param lookup Returns the resolved value of an identifier
 */
export function buildBindings(statement: CompiledStatement, lookup: (identifier: string) => unknown): Bindings
{
	if (statement.shape === 'sequence')
	{
		return statement.bindingNames.map(lookup);
	}

	const bindings: Record<string, unknown> = {};
	for (const name of statement.bindingNames)
	{
		bindings[name] = lookup(name);
	}
	return bindings;
}
