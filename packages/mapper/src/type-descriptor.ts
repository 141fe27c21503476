/**
 * Type Descriptor utilities: construction, comparison, formatting,
 * and inference from runtime values.
 */

import Decimal from 'decimal.js';
import { StructType, structName, structOf } from './struct';
import { temporalKindOf } from './temporal';
import type { Constructor, StructTarget, TypeDescriptor, TypeId, TypeKind } from './types';

interface DescriptorOptions {
	nullable?: boolean;
	args?: readonly TypeDescriptor[];
	ref?: StructTarget;
	values?: readonly string[];
}

export function createDescriptor(kind: TypeKind, options: DescriptorOptions = {}): TypeDescriptor {
	const descriptor: TypeDescriptor = {
		kind,
		nullable: options.nullable ?? false,
		args: Object.freeze([...(options.args ?? [])]),
		...(options.ref !== undefined ? { ref: options.ref } : {}),
		...(options.values !== undefined ? { values: options.values } : {})
	};
	return Object.freeze(descriptor);
}

export function withNullability(type: TypeDescriptor, nullable: boolean): TypeDescriptor {
	if (type.nullable === nullable) {
		return type;
	}
	return Object.freeze({ ...type, nullable });
}

/** Type of an absent value */
export const UNKNOWN_TYPE: TypeDescriptor = createDescriptor('unknown', { nullable: true });

export const STRING_TYPE: TypeDescriptor = createDescriptor('string');

// --- Identity & Comparison ---

/**
 * Nominal identity of a type, ignoring type arguments and nullability.
 * `list<string>` and `list<integer>` share the identity `'list'`.
 */
export function typeIdOf(type: TypeDescriptor): TypeId {
	if ((type.kind === 'struct' || type.kind === 'object') && type.ref !== undefined) {
		return nominalId(type.ref);
	}
	return type.kind;
}

/**
 * A class-backed declaration is identified by its class, so that keys given as the
 * class and keys given as its declaration agree.
 */
export function nominalId(target: StructTarget): TypeId {
	if (target instanceof StructType) {
		return target.$ctor ?? target;
	}
	return target;
}

/**
 * Structural equality. Top-level nullability is ignored when asked;
 * type arguments always compare their nullability.
 */
export function sameType(a: TypeDescriptor, b: TypeDescriptor, ignoreNullability = false): boolean {
	// A declared class and an undeclared reference to it are the same type
	const kindsMatch = a.kind === b.kind || (isNominal(a) && isNominal(b));
	if (!kindsMatch || typeIdOf(a) !== typeIdOf(b)) {
		return false;
	}
	if (!ignoreNullability && a.nullable !== b.nullable) {
		return false;
	}
	if ((a.values ?? []).join('|') !== (b.values ?? []).join('|')) {
		return false;
	}
	return a.args.length === b.args.length && a.args.every((arg, index) => {
		const other = b.args[index];
		return other !== undefined && sameType(arg, other);
	});
}

function isNominal(type: TypeDescriptor): boolean {
	return type.kind === 'struct' || type.kind === 'object';
}

// --- Container Classification ---

export function isSequenceType(type: TypeDescriptor): boolean {
	return type.kind === 'list';
}

export function isSetType(type: TypeDescriptor): boolean {
	return type.kind === 'set';
}

export function isKeyedType(type: TypeDescriptor): boolean {
	return type.kind === 'map' || type.kind === 'record';
}

export function elementTypeOf(type: TypeDescriptor): TypeDescriptor {
	return type.args[0] ?? UNKNOWN_TYPE;
}

export function keyTypeOf(type: TypeDescriptor): TypeDescriptor {
	return type.kind === 'record' ? STRING_TYPE : (type.args[0] ?? UNKNOWN_TYPE);
}

export function valueTypeOf(type: TypeDescriptor): TypeDescriptor {
	return (type.kind === 'record' ? type.args[0] : type.args[1]) ?? UNKNOWN_TYPE;
}

// --- Formatting ---

/**
 * Human-readable form used in error messages, e.g. `map<string, list<integer>>?`.
 */
export function formatType(type: TypeDescriptor): string {
	return type.nullable && type.kind !== 'unknown' && type.kind !== 'any'
		? `${formatBase(type)}?`
		: formatBase(type);
}

function formatBase(type: TypeDescriptor): string {
	switch (type.kind) {
		case 'list':
		case 'set':
		case 'map':
		case 'record':
			return `${type.kind}<${type.args.map(formatType).join(', ')}>`;
		case 'enum':
			return `enum(${(type.values ?? []).join('|')})`;
		case 'struct':
		case 'object':
			return type.ref !== undefined ? structName(type.ref) : type.kind;
		default:
			return type.kind;
	}
}

// --- Inference ---

export function isConstructor(value: unknown): value is Constructor {
	return typeof value === 'function' && value.prototype !== undefined;
}

/**
 * Derive a descriptor from a runtime value. Container elements are left as `unknown`;
 * the conversion engine infers them one by one.
 */
export function inferType(value: unknown): TypeDescriptor {
	if (value === null || value === undefined) {
		return UNKNOWN_TYPE;
	}

	switch (typeof value) {
		case 'string':
			return createDescriptor('string');
		case 'boolean':
			return createDescriptor('boolean');
		case 'bigint':
			return createDescriptor('long');
		case 'number':
			return createDescriptor(Number.isInteger(value) ? 'integer' : 'double');
		case 'object':
			return inferObjectType(value);
		default:
			return createDescriptor('unknown');
	}
}

function inferObjectType(value: object): TypeDescriptor {
	if (Decimal.isDecimal(value)) {
		return createDescriptor('decimal');
	}

	const temporal = temporalKindOf(value);
	if (temporal !== undefined) {
		return createDescriptor(temporal);
	}

	if (Array.isArray(value)) {
		return createDescriptor('list', { args: [UNKNOWN_TYPE] });
	}
	if (value instanceof Set) {
		return createDescriptor('set', { args: [UNKNOWN_TYPE] });
	}
	if (value instanceof Map) {
		return createDescriptor('map', { args: [UNKNOWN_TYPE, UNKNOWN_TYPE] });
	}

	const proto: unknown = Object.getPrototypeOf(value);
	if (proto === null || proto === Object.prototype) {
		return createDescriptor('record', { args: [UNKNOWN_TYPE] });
	}

	const ctor = value.constructor;
	if (!isConstructor(ctor)) {
		return createDescriptor('unknown');
	}
	return structOf(ctor) !== undefined
		? createDescriptor('struct', { ref: ctor })
		: createDescriptor('object', { ref: ctor });
}

/**
 * Name of a source value's type for error messages.
 */
export function typeNameOf(value: unknown): string {
	return formatType(inferType(value));
}
