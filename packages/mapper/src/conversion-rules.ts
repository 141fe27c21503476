/**
 * Conversion Rules
 *
 * Each rule claims a pair of types and converts a value between them.
 * The engine tries rules in a fixed order; the first converted result wins.
 * Container rules recurse through the engine for every element, key and value,
 * and fail the whole conversion as soon as one of them cannot be converted.
 */

import { parseScalar } from './coercion';
import { converted, UNCONVERTIBLE, type ConversionResult } from './conversion-result';
import type { CustomMapperRegistry } from './custom-mapper-registry';
import { ConversionFailedError } from './mapper-error';
import {
	elementTypeOf,
	formatType,
	inferType,
	isKeyedType,
	isSequenceType,
	isSetType,
	keyTypeOf,
	typeIdOf,
	valueTypeOf
} from './type-descriptor';
import type { StructTarget, TypeDescriptor } from './types';

/**
 * What a rule may call back into while converting.
 */
export interface ConversionContext {
	readonly registry: CustomMapperRegistry;
	convert(value: unknown, fromType: TypeDescriptor, toType: TypeDescriptor): ConversionResult;
	/** Map an object onto a declared struct; absent when nested structures are disabled */
	readonly mapStructure?: StructureMapper;
}

/**
 * Maps a source object onto a target struct. `declaration` describes the source
 * when its own class carries no declaration.
 */
export type StructureMapper = (source: object, target: StructTarget, declaration?: StructTarget) => unknown;

export interface ConversionRule {
	readonly name: string;
	applies(fromType: TypeDescriptor, toType: TypeDescriptor): boolean;
	convert(value: unknown, fromType: TypeDescriptor, toType: TypeDescriptor, context: ConversionContext): ConversionResult;
}

/**
 * Source type of one element: the declared element type when it says something,
 * the element's runtime type otherwise.
 */
function sourceTypeOf(value: unknown, declared: TypeDescriptor): TypeDescriptor {
	if (declared.kind === 'unknown' || declared.kind === 'any') {
		return value === null || value === undefined ? declared : inferType(value);
	}
	return declared;
}

/**
 * Convert one element of a container, failing at `segment` when it cannot be converted.
 */
function convertElement(
	context: ConversionContext,
	value: unknown,
	declaredType: TypeDescriptor,
	toType: TypeDescriptor,
	segment: string
): unknown {
	const fromType = sourceTypeOf(value, declaredType);
	let result: ConversionResult;
	try {
		result = context.convert(value, fromType, toType);
	} catch (error) {
		if (error instanceof ConversionFailedError) {
			throw error.under(segment);
		}
		throw error;
	}

	if (!result.ok) {
		throw new ConversionFailedError({
			targetName: formatType(toType),
			parameterType: formatType(toType),
			fieldType: formatType(fromType),
			path: segment,
			value
		});
	}
	return result.value;
}

function formatKey(key: unknown): string {
	return typeof key === 'string' ? key : String(key);
}

function entriesOf(value: unknown): [unknown, unknown][] | undefined {
	if (value instanceof Map) {
		return [...value.entries()];
	}
	if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
		return Object.entries(value);
	}
	return undefined;
}

/** Ordered sequence → Array */
export const sequenceRule: ConversionRule = {
	name: 'sequence',
	applies: (fromType, toType) => isSequenceType(fromType) && isSequenceType(toType),
	convert(value, fromType, toType, context) {
		if (!Array.isArray(value)) {
			return UNCONVERTIBLE;
		}
		const declared = elementTypeOf(fromType);
		const target = elementTypeOf(toType);
		return converted(value.map((item, index) => convertElement(context, item, declared, target, `[${index}]`)));
	}
};

/** Unordered set → Set, deduplicated by the converted values */
export const setRule: ConversionRule = {
	name: 'set',
	applies: (fromType, toType) => isSetType(fromType) && isSetType(toType),
	convert(value, fromType, toType, context) {
		if (!(value instanceof Set) && !Array.isArray(value)) {
			return UNCONVERTIBLE;
		}
		const declared = elementTypeOf(fromType);
		const target = elementTypeOf(toType);
		const result = new Set<unknown>();
		let index = 0;
		for (const item of value) {
			result.add(convertElement(context, item, declared, target, `[${index}]`));
			index++;
		}
		return converted(result);
	}
};

/** Keyed mapping → Map for `map` targets, plain object for `record` targets */
export const keyedMappingRule: ConversionRule = {
	name: 'keyed-mapping',
	applies: (fromType, toType) => isKeyedType(fromType) && isKeyedType(toType),
	convert(value, fromType, toType, context) {
		const entries = entriesOf(value);
		if (!entries) {
			return UNCONVERTIBLE;
		}

		const fromKey = keyTypeOf(fromType);
		const fromValue = valueTypeOf(fromType);
		const toKey = keyTypeOf(toType);
		const toValue = valueTypeOf(toType);

		const pairs = entries.map(([key, item]): [unknown, unknown] => {
			const label = formatKey(key);
			return [
				convertElement(context, key, fromKey, toKey, `{${label}}`),
				convertElement(context, item, fromValue, toValue, `[${label}]`)
			];
		});

		if (toType.kind === 'record') {
			const record: Record<string, unknown> = {};
			for (const [key, item] of pairs) {
				record[formatKey(key)] = item;
			}
			return converted(record);
		}
		return converted(new Map(pairs));
	}
};

/** Registered mapper for nominally different types */
export const customMapperRule: ConversionRule = {
	name: 'custom-mapper',
	applies: (fromType, toType) => typeIdOf(fromType) !== typeIdOf(toType),
	convert(value, fromType, toType, context) {
		const mapper = context.registry.lookup(typeIdOf(fromType), typeIdOf(toType));
		if (!mapper) {
			return UNCONVERTIBLE;
		}
		const result = mapper(value);
		return result === null || result === undefined ? UNCONVERTIBLE : converted(result);
	}
};

/** Recursive mapping of an object onto a declared struct */
export const structureRule: ConversionRule = {
	name: 'structure',
	applies: (_fromType, toType) => toType.kind === 'struct' && toType.ref !== undefined,
	convert(value, fromType, toType, context) {
		if (!context.mapStructure || toType.ref === undefined || typeof value !== 'object' || value === null) {
			return UNCONVERTIBLE;
		}
		const declaration = fromType.kind === 'struct' ? fromType.ref : undefined;
		return converted(context.mapStructure(value, toType.ref, declaration));
	}
};

/** Built-in scalar table */
export const scalarRule: ConversionRule = {
	name: 'scalar',
	applies: () => true,
	convert: (value, _fromType, toType) => parseScalar(value, toType)
};

export const DEFAULT_RULES: readonly ConversionRule[] = Object.freeze([
	sequenceRule,
	setRule,
	keyedMappingRule,
	customMapperRule,
	structureRule,
	scalarRule
]);
