import { describe, test, expect } from 'vitest';
import { Duration, Instant, LocalDate, LocalDateTime, Year, YearMonth } from '@js-joda/core';
import Decimal from 'decimal.js';
import {
	parseBoolean,
	parseDecimal,
	parseDouble,
	parseInteger,
	parseLong,
	parseScalar,
	parseTemporal,
	textOf
} from '../src/coercion';
import type { ConversionResult } from '../src/conversion-result';
import { type } from '../src/type-builder';

function valueOf<T>(result: ConversionResult<T>): T {
	if (!result.ok) {
		throw new Error('expected a converted value');
	}
	return result.value;
}

describe('textOf()', () => {
	test('should return strings unchanged and stringify everything else', () => {
		expect(textOf('abc')).toBe('abc');
		expect(textOf(42)).toBe('42');
		expect(textOf(7n)).toBe('7');
		expect(textOf(LocalDate.of(1970, 1, 1))).toBe('1970-01-01');
	});
});

describe('parseInteger()', () => {
	test('should parse signed integer text', () => {
		expect(valueOf(parseInteger('30'))).toBe(30);
		expect(valueOf(parseInteger('-7'))).toBe(-7);
		expect(valueOf(parseInteger('+5'))).toBe(5);
		expect(valueOf(parseInteger('007'))).toBe(7);
	});

	test('should reject fractional, padded and empty text', () => {
		expect(parseInteger('1.00').ok).toBe(false);
		expect(parseInteger(' 1').ok).toBe(false);
		expect(parseInteger('').ok).toBe(false);
		expect(parseInteger('1e3').ok).toBe(false);
	});

	test('should reject values outside the safe-integer range', () => {
		expect(valueOf(parseInteger('9007199254740991'))).toBe(Number.MAX_SAFE_INTEGER);
		expect(parseInteger('9007199254740992').ok).toBe(false);
	});
});

describe('parseLong()', () => {
	test('should parse into a bigint', () => {
		expect(valueOf(parseLong('30'))).toBe(30n);
	});

	test('should accept the signed 64-bit bounds and nothing beyond', () => {
		expect(valueOf(parseLong('9223372036854775807'))).toBe(9223372036854775807n);
		expect(valueOf(parseLong('-9223372036854775808'))).toBe(-9223372036854775808n);
		expect(parseLong('9223372036854775808').ok).toBe(false);
	});

	test('should reject non-integer text', () => {
		expect(parseLong('12.0').ok).toBe(false);
	});
});

describe('parseDouble()', () => {
	test('should parse decimal literals with optional exponent', () => {
		expect(valueOf(parseDouble('3.14'))).toBe(3.14);
		expect(valueOf(parseDouble('1e3'))).toBe(1000);
		expect(valueOf(parseDouble('.5'))).toBe(0.5);
		expect(valueOf(parseDouble('-2.5E-1'))).toBe(-0.25);
	});

	test('should parse the special values', () => {
		expect(valueOf(parseDouble('NaN'))).toBeNaN();
		expect(valueOf(parseDouble('Infinity'))).toBe(Number.POSITIVE_INFINITY);
		expect(valueOf(parseDouble('-Infinity'))).toBe(Number.NEGATIVE_INFINITY);
	});

	test('should reject anything else', () => {
		expect(parseDouble('abc').ok).toBe(false);
		expect(parseDouble('').ok).toBe(false);
		expect(parseDouble('1,5').ok).toBe(false);
		expect(parseDouble('toString').ok).toBe(false);
	});
});

describe('parseDecimal()', () => {
	test('should keep the exact decimal value', () => {
		const value = valueOf(parseDecimal('0.1'));
		expect(Decimal.isDecimal(value)).toBe(true);
		expect(value.plus('0.2').toString()).toBe('0.3');
	});

	test('should reject special and malformed values', () => {
		expect(parseDecimal('NaN').ok).toBe(false);
		expect(parseDecimal('1.2.3').ok).toBe(false);
	});
});

describe('parseBoolean()', () => {
	test('should accept exactly the two literals', () => {
		expect(valueOf(parseBoolean('true'))).toBe(true);
		expect(valueOf(parseBoolean('false'))).toBe(false);
	});

	test('should reject other spellings', () => {
		expect(parseBoolean('TRUE').ok).toBe(false);
		expect(parseBoolean('1').ok).toBe(false);
		expect(parseBoolean('yes').ok).toBe(false);
	});
});

describe('parseTemporal()', () => {
	test('should parse ISO text for each parseable kind', () => {
		expect(String(valueOf(parseTemporal('2024', 'year')))).toBe('2024');
		expect(String(valueOf(parseTemporal('2024-05', 'year-month')))).toBe('2024-05');
		expect(String(valueOf(parseTemporal('2024-02-29', 'date')))).toBe('2024-02-29');
		expect(String(valueOf(parseTemporal('2024-05-01T10:15:30', 'date-time')))).toBe('2024-05-01T10:15:30');
		expect(String(valueOf(parseTemporal('2024-05-01T10:15:30Z', 'instant')))).toBe('2024-05-01T10:15:30Z');
		expect(String(valueOf(parseTemporal('2024-05-01T10:15:30+02:00', 'offset-date-time')))).toBe(
			'2024-05-01T10:15:30+02:00'
		);
		expect(String(valueOf(parseTemporal('2024-05-01T10:15:30+02:00[Europe/Paris]', 'zoned-date-time')))).toBe(
			'2024-05-01T10:15:30+02:00[Europe/Paris]'
		);
	});

	test('should return js-joda instances', () => {
		expect(valueOf(parseTemporal('2024-02-29', 'date'))).toBeInstanceOf(LocalDate);
		expect(valueOf(parseTemporal('2024-05-01T10:15:30Z', 'instant'))).toBeInstanceOf(Instant);
	});

	test('should report malformed text as unconvertible', () => {
		expect(parseTemporal('not-a-date', 'date').ok).toBe(false);
		expect(parseTemporal('2024-05-01', 'date-time').ok).toBe(false);
	});

	test('should never parse durations', () => {
		expect(parseTemporal('PT1H', 'duration').ok).toBe(false);
	});
});

describe('parseScalar()', () => {
	test('should render any value as text for string targets', () => {
		expect(valueOf(parseScalar(30, type.string().type))).toBe('30');
		expect(valueOf(parseScalar(LocalDate.of(1970, 1, 1), type.string().type))).toBe('1970-01-01');
	});

	test('should convert numerics through their text form', () => {
		expect(valueOf(parseScalar('30', type.integer().type))).toBe(30);
		expect(valueOf(parseScalar(30n, type.integer().type))).toBe(30);
		expect(valueOf(parseScalar(42, type.long().type))).toBe(42n);
		expect(valueOf(parseScalar(new Decimal('1.50'), type.double().type))).toBe(1.5);
		expect(parseScalar(3.5, type.integer().type).ok).toBe(false);
	});

	test('should accept only declared enum values', () => {
		const status = type.enumOf(['active', 'archived']).type;
		expect(valueOf(parseScalar('archived', status))).toBe('archived');
		expect(parseScalar('deleted', status).ok).toBe(false);
	});

	test('should parse temporal kinds', () => {
		expect(valueOf(parseScalar('2024-05', type.yearMonth().type))).toBeInstanceOf(YearMonth);
		expect(valueOf(parseScalar(2024, type.year().type))).toBeInstanceOf(Year);
	});

	test('should return a value already of the target kind unchanged', () => {
		const date = LocalDate.of(2024, 1, 31);
		const duration = Duration.ofHours(1);
		const dateTime = LocalDateTime.of(2024, 1, 31, 8, 0);
		expect(valueOf(parseScalar(date, type.date().type))).toBe(date);
		expect(valueOf(parseScalar(duration, type.duration().type))).toBe(duration);
		expect(valueOf(parseScalar(dateTime, type.dateTime().type))).toBe(dateTime);
	});

	test('should not support durations from text, containers or structs', () => {
		expect(parseScalar('PT1H', type.duration().type).ok).toBe(false);
		expect(parseScalar(['1'], type.list(type.integer()).type).ok).toBe(false);
		expect(parseScalar({ a: 1 }, type.record(type.integer()).type).ok).toBe(false);
	});

	test('should be idempotent for every parsed scalar', () => {
		const samples = [
			{ input: '30', target: type.integer().type },
			{ input: '30', target: type.long().type },
			{ input: '2.5', target: type.double().type },
			{ input: '2.50', target: type.decimal().type },
			{ input: 'false', target: type.boolean().type },
			{ input: '2024-02-29', target: type.date().type },
			{ input: '2024-05-01T10:15:30Z', target: type.instant().type }
		];
		for (const { input, target } of samples) {
			const once = valueOf(parseScalar(input, target));
			expect(valueOf(parseScalar(once, target))).toBe(once);
		}
	});
});
