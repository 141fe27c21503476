/**
 * Scalar Conversion Table
 *
 * Parses the canonical text form of a value into a target scalar kind.
 * Every parser is strict and reports failure as `UNCONVERTIBLE`, never by throwing.
 *
 * @example
 * ```typescript
 * parseInteger('30');      // -> { ok: true, value: 30 }
 * parseInteger('1.00');    // -> { ok: false }
 * parseLong('30');         // -> { ok: true, value: 30n }
 * parseBoolean('TRUE');    // -> { ok: false }
 * parseScalar(LocalDate.of(1970, 1, 1), type.string().type);  // -> { ok: true, value: '1970-01-01' }
 * ```
 */

import { DateTimeParseException } from '@js-joda/core';
import Decimal from 'decimal.js';
import { converted, UNCONVERTIBLE, type ConversionResult } from './conversion-result';
import { isTemporalKind, temporalType } from './temporal';
import type { TemporalKind, TypeDescriptor } from './types';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DOUBLE_SPECIALS: ReadonlyMap<string, number> = new Map([
	['NaN', Number.NaN],
	['Infinity', Number.POSITIVE_INFINITY],
	['+Infinity', Number.POSITIVE_INFINITY],
	['-Infinity', Number.NEGATIVE_INFINITY]
]);

const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

/**
 * Canonical text form of a value.
 */
export function textOf(value: unknown): string {
	return typeof value === 'string' ? value : String(value);
}

export function parseInteger(text: string): ConversionResult<number> {
	if (!INTEGER_PATTERN.test(text)) {
		return UNCONVERTIBLE;
	}
	const num = Number(text);
	return Number.isSafeInteger(num) ? converted(num) : UNCONVERTIBLE;
}

export function parseLong(text: string): ConversionResult<bigint> {
	if (!INTEGER_PATTERN.test(text)) {
		return UNCONVERTIBLE;
	}
	const num = BigInt(text);
	return num >= LONG_MIN && num <= LONG_MAX ? converted(num) : UNCONVERTIBLE;
}

export function parseDouble(text: string): ConversionResult<number> {
	const special = DOUBLE_SPECIALS.get(text);
	if (special !== undefined) {
		return converted(special);
	}
	return DECIMAL_PATTERN.test(text) ? converted(Number(text)) : UNCONVERTIBLE;
}

export function parseDecimal(text: string): ConversionResult<Decimal> {
	return DECIMAL_PATTERN.test(text) ? converted(new Decimal(text)) : UNCONVERTIBLE;
}

export function parseBoolean(text: string): ConversionResult<boolean> {
	if (text === 'true') return converted(true);
	if (text === 'false') return converted(false);
	return UNCONVERTIBLE;
}

/**
 * Parse ISO text into a js-joda temporal. Only parse failures are reported as
 * `UNCONVERTIBLE`; any other exception propagates.
 */
export function parseTemporal(text: string, kind: TemporalKind): ConversionResult {
	const parse = temporalType(kind)?.parse;
	if (!parse) {
		return UNCONVERTIBLE;
	}
	try {
		return converted(parse(text));
	} catch (error) {
		if (error instanceof DateTimeParseException) {
			return UNCONVERTIBLE;
		}
		throw error;
	}
}

/**
 * Whether a value already is of the target kind, so it can be returned without re-parsing.
 */
export function isOfKind(value: unknown, type: TypeDescriptor): boolean {
	const kind = type.kind;
	switch (kind) {
		case 'string':
			return typeof value === 'string';
		case 'boolean':
			return typeof value === 'boolean';
		case 'integer':
			return Number.isSafeInteger(value);
		case 'long':
			return typeof value === 'bigint' && value >= LONG_MIN && value <= LONG_MAX;
		case 'double':
			return typeof value === 'number';
		case 'decimal':
			return Decimal.isDecimal(value);
		case 'enum':
			return typeof value === 'string' && (type.values ?? []).includes(value);
		default:
			return isTemporalKind(kind) && temporalType(kind)?.is(value) === true;
	}
}

/**
 * Convert a value to the target scalar kind through its text form.
 * Kinds outside the table (duration, containers, structs) are `UNCONVERTIBLE`.
 */
export function parseScalar(value: unknown, type: TypeDescriptor): ConversionResult {
	if (isOfKind(value, type)) {
		return converted(value);
	}

	const text = textOf(value);
	const kind = type.kind;
	switch (kind) {
		case 'string':
			return converted(text);
		case 'boolean':
			return parseBoolean(text);
		case 'integer':
			return parseInteger(text);
		case 'long':
			return parseLong(text);
		case 'double':
			return parseDouble(text);
		case 'decimal':
			return parseDecimal(text);
		case 'enum':
			return (type.values ?? []).includes(text) ? converted(text) : UNCONVERTIBLE;
		default:
			return isTemporalKind(kind) ? parseTemporal(text, kind) : UNCONVERTIBLE;
	}
}
