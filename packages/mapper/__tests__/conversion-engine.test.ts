import { describe, test, expect } from 'vitest';
import { ConversionEngine } from '../src/conversion-engine';
import type { ConversionResult } from '../src/conversion-result';
import { scalarRule, sequenceRule } from '../src/conversion-rules';
import { CustomMapperRegistry } from '../src/custom-mapper-registry';
import { ConversionFailedError } from '../src/mapper-error';
import { type } from '../src/type-builder';
import { inferType } from '../src/type-descriptor';

class Relationship {
	constructor(public readonly value: string) {}
}

function valueOf<T>(result: ConversionResult<T>): T {
	if (!result.ok) {
		throw new Error('expected a converted value');
	}
	return result.value;
}

function captureError<E extends Error>(fn: () => unknown, ErrorClass: new (...args: never[]) => E): E {
	try {
		fn();
	} catch (error) {
		if (error instanceof ErrorClass) return error;
		throw error;
	}
	throw new Error(`expected ${ErrorClass.name} to be thrown`);
}

const engine = new ConversionEngine(new CustomMapperRegistry());

describe('ConversionEngine', () => {
	describe('absent values', () => {
		test('should convert to null for nullable targets', () => {
			expect(valueOf(engine.convert(null, type.string().type, type.string().nullable().type))).toBeNull();
			expect(valueOf(engine.convert(undefined, type.string().type, type.any().type))).toBeNull();
		});

		test('should be unconvertible for non-nullable targets', () => {
			expect(engine.convert(null, type.string().type, type.string().type).ok).toBe(false);
		});
	});

	describe('identity', () => {
		test('should return the same value when types match ignoring top-level nullability', () => {
			const tags = ['a'];
			expect(valueOf(engine.convert(tags, type.list(type.string()).type, type.list(type.string()).nullable().type))).toBe(
				tags
			);
		});

		test('should return any value as-is for any targets', () => {
			const value = { a: 1 };
			expect(valueOf(engine.convert(value, inferType(value), type.any().type))).toBe(value);
		});
	});

	describe('sequences', () => {
		test('should convert every element', () => {
			const result = engine.convert(['1', '2', '3'], type.list(type.string()).type, type.list(type.integer()).type);
			expect(valueOf(result)).toEqual([1, 2, 3]);
		});

		test('should convert an empty sequence to an empty sequence', () => {
			expect(valueOf(engine.convert([], type.list(type.string()).type, type.list(type.integer()).type))).toEqual([]);
		});

		test('should infer element types when the declared element type is unknown', () => {
			const source = [1, '2'];
			expect(valueOf(engine.convert(source, inferType(source), type.list(type.string()).type))).toEqual(['1', '2']);
		});

		test('should recurse through nested sequences', () => {
			const result = engine.convert(
				[['1'], ['2', '3']],
				type.list(type.list(type.string())).type,
				type.list(type.list(type.long())).type
			);
			expect(valueOf(result)).toEqual([[1n], [2n, 3n]]);
		});

		test('should fail at the path of the first unconvertible element', () => {
			const error = captureError(
				() =>
					engine.convert(
						[['1'], ['2', 'x']],
						type.list(type.list(type.string())).type,
						type.list(type.list(type.integer())).type
					),
				ConversionFailedError
			);
			expect(error.path).toBe('[1][1]');
			expect(error.actualValue).toBe('x');
			expect(error.parameterType).toBe('integer');
			expect(error.fieldType).toBe('string');
		});

		test('should be unconvertible when the value is not an array', () => {
			expect(engine.convert('abc', type.list(type.string()).type, type.list(type.integer()).type).ok).toBe(false);
		});
	});

	describe('sets', () => {
		test('should deduplicate converted values', () => {
			const result = valueOf(
				engine.convert(new Set(['1', '01', '2']), type.set(type.string()).type, type.set(type.integer()).type)
			);
			expect(result).toEqual(new Set([1, 2]));
		});

		test('should convert an empty set to an empty set', () => {
			const result = valueOf(engine.convert(new Set(), type.set(type.string()).type, type.set(type.integer()).type));
			expect(result).toBeInstanceOf(Set);
			expect(result).toEqual(new Set());
		});
	});

	describe('keyed mappings', () => {
		test('should convert keys and values independently', () => {
			const source = new Map([
				['1', 'true'],
				['2', 'false']
			]);
			const result = engine.convert(
				source,
				type.map(type.string(), type.string()).type,
				type.map(type.integer(), type.boolean()).type
			);
			expect(valueOf(result)).toEqual(
				new Map([
					[1, true],
					[2, false]
				])
			);
		});

		test('should convert records into maps and maps into records', () => {
			expect(
				valueOf(engine.convert({ a: '1' }, type.record(type.string()).type, type.map(type.string(), type.integer()).type))
			).toEqual(new Map([['a', 1]]));
			expect(
				valueOf(engine.convert(new Map([[1, 'x']]), type.map(type.integer(), type.string()).type, type.record(type.string()).type))
			).toEqual({ '1': 'x' });
		});

		test('should convert an empty mapping to an empty mapping', () => {
			expect(
				valueOf(engine.convert(new Map(), type.map(type.string(), type.string()).type, type.map(type.string(), type.integer()).type))
			).toEqual(new Map());
			expect(valueOf(engine.convert({}, type.record(type.string()).type, type.record(type.integer()).type))).toEqual({});
		});

		test('should fail at a map value', () => {
			const error = captureError(
				() =>
					engine.convert(
						new Map([['k', 'x']]),
						type.map(type.string(), type.string()).type,
						type.map(type.string(), type.integer()).type
					),
				ConversionFailedError
			);
			expect(error.path).toBe('[k]');
		});

		test('should fail at a map key', () => {
			const error = captureError(
				() =>
					engine.convert(
						new Map([['a', 'x']]),
						type.map(type.string(), type.string()).type,
						type.map(type.integer(), type.string()).type
					),
				ConversionFailedError
			);
			expect(error.path).toBe('{a}');
			expect(error.actualValue).toBe('a');
		});
	});

	describe('custom mappers', () => {
		test('should apply a registered mapper for nominally different types', () => {
			const registry = new CustomMapperRegistry().register('string', Relationship, (s: string) => new Relationship(s));
			const result = valueOf(
				new ConversionEngine(registry).convert('friend', type.string().type, type.instance(Relationship).type)
			);
			expect(result).toEqual(new Relationship('friend'));
		});

		test('should take precedence over the scalar table', () => {
			const registry = new CustomMapperRegistry().register('string', 'integer', (s: string) => s.length);
			expect(valueOf(new ConversionEngine(registry).convert('123', type.string().type, type.integer().type))).toBe(3);
		});

		test('should fall through to the scalar table when the mapper returns nothing', () => {
			const registry = new CustomMapperRegistry().register('string', 'integer', () => undefined);
			expect(valueOf(new ConversionEngine(registry).convert('5', type.string().type, type.integer().type))).toBe(5);
		});

		test('should apply inside containers', () => {
			const registry = new CustomMapperRegistry().register(Relationship, 'string', (r: Relationship) => r.value);
			const result = new ConversionEngine(registry).convert(
				[new Relationship('a'), new Relationship('b')],
				type.list(type.instance(Relationship)).type,
				type.list(type.string()).type
			);
			expect(valueOf(result)).toEqual(['a', 'b']);
		});

		test('should let mapper exceptions propagate unchanged', () => {
			const failure = new Error('mapper failed');
			const registry = new CustomMapperRegistry().register('string', 'integer', () => {
				throw failure;
			});
			expect(() => new ConversionEngine(registry).convert('5', type.string().type, type.integer().type)).toThrow(failure);
		});
	});

	describe('scalars', () => {
		test('should parse text into scalar kinds', () => {
			expect(valueOf(engine.convert('30', type.string().type, type.integer().type))).toBe(30);
		});

		test('should be unconvertible when no rule produces a value', () => {
			expect(engine.convert('PT1H', type.string().type, type.duration().type).ok).toBe(false);
			expect(engine.convert('abc', type.string().type, type.integer().type).ok).toBe(false);
		});
	});

	describe('structures', () => {
		class Point {
			constructor(
				public readonly x: number,
				public readonly y: number
			) {}
		}

		test('should delegate objects to the structure mapper', () => {
			const calls: unknown[][] = [];
			const nested = new ConversionEngine(new CustomMapperRegistry(), {
				mapStructure: (source, target, declaration) => {
					calls.push([source, target, declaration]);
					return new Point(1, 2);
				}
			});
			const source = { x: 1, y: 2 };

			expect(valueOf(nested.convert(source, inferType(source), type.struct(Point).type))).toEqual(new Point(1, 2));
			expect(calls).toEqual([[source, Point, undefined]]);
		});

		test('should be unconvertible without a structure mapper', () => {
			const source = { x: 1, y: 2 };
			expect(engine.convert(source, inferType(source), type.struct(Point).type).ok).toBe(false);
		});
	});

	describe('rules', () => {
		test('should try the default rules in cascade order', () => {
			expect(engine.ruleNames).toEqual(['sequence', 'set', 'keyed-mapping', 'custom-mapper', 'structure', 'scalar']);
		});

		test('should use only the given rules', () => {
			const scalarsOnly = new ConversionEngine(new CustomMapperRegistry(), { rules: [scalarRule] });
			expect(scalarsOnly.convert(['1'], type.list(type.string()).type, type.list(type.integer()).type).ok).toBe(false);
			const sequencesOnly = new ConversionEngine(new CustomMapperRegistry(), { rules: [sequenceRule] });
			expect(() =>
				sequencesOnly.convert(['1'], type.list(type.string()).type, type.list(type.integer()).type)
			).toThrow(ConversionFailedError);
			expect(
				valueOf(sequencesOnly.convert(['1'], type.list(type.string()).type, type.list(type.string()).nullable().type))
			).toEqual(['1']);
		});
	});
});
