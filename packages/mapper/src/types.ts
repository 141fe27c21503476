/**
 * Mapper Types
 *
 * Core type definitions for the object mapper.
 * Type descriptors describe values and parameters at runtime.
 * Field definitions describe how a struct declares one constructor parameter.
 */

import type { StructType } from './struct';

// --- Type Kinds ---

export type NumericKind = 'integer' | 'long' | 'double' | 'decimal';

export type TemporalKind =
	| 'year'
	| 'year-month'
	| 'date'
	| 'date-time'
	| 'instant'
	| 'zoned-date-time'
	| 'offset-date-time'
	| 'duration';

export type ScalarKind = 'string' | 'boolean' | NumericKind | TemporalKind;

export type ContainerKind = 'list' | 'set' | 'map' | 'record';

/**
 * Classifier of a type descriptor.
 *
 * - `struct`: a type declared with `Mapper.defineStruct`
 * - `object`: an undeclared object value, identified by its constructor
 * - `any`: accepts every value as-is
 * - `unknown`: inferred from an absent value
 */
export type TypeKind = ScalarKind | ContainerKind | 'enum' | 'struct' | 'object' | 'any' | 'unknown';

/**
 * Any class that can be instantiated with `new`.
 */
export type Constructor<T = unknown> = new (...args: never[]) => T;

/**
 * Something that identifies a constructible target: a declared class or a struct declaration.
 */
export type StructTarget<T = unknown> = Constructor<T> | StructType<T>;

// --- Type Descriptor ---

/**
 * Runtime description of a value's or parameter's type.
 * Descriptors are frozen and compared structurally.
 */
export interface TypeDescriptor {
	readonly kind: TypeKind;
	/** Whether null/undefined is an acceptable value */
	readonly nullable: boolean;
	/** Ordered type arguments: element for list/set, key and value for map, value for record */
	readonly args: readonly TypeDescriptor[];
	/** Nominal identity for `struct` and `object` kinds */
	readonly ref?: StructTarget;
	/** Allowed literals for the `enum` kind */
	readonly values?: readonly string[];
}

/**
 * Identity used to key custom mappers: a kind name for scalars and containers,
 * the class for class-backed types, the declaration for plain-object structs.
 * Never carries type arguments.
 */
export type TypeId = TypeKind | Constructor | StructType;

// --- Field Definition ---

/**
 * Defines a single field of a struct: one constructor parameter on the target side,
 * one readable property on the source side.
 */
export interface FieldDef {
	readonly type: TypeDescriptor;
	/** The constructor supplies its own value when the argument is undefined */
	readonly hasDefault: boolean;
	/** Value passed when the argument is absent; without it the constructor's own default applies */
	readonly defaultValue?: unknown;
	/** Name of the target parameter this field binds to when used as a source */
	readonly alias?: string;
}

// --- Introspection Descriptors ---

/**
 * A readable field of a source instance.
 */
export interface FieldDescriptor {
	readonly name: string;
	readonly alias?: string;
	readonly type: TypeDescriptor;
	get(source: object): unknown;
}

/**
 * One parameter of a target's primary constructor.
 */
export interface ParameterDescriptor {
	readonly name: string;
	readonly type: TypeDescriptor;
	readonly hasDefault: boolean;
}

/**
 * The primary constructor of a target type.
 */
export interface ConstructorDescriptor<T = unknown> {
	readonly name: string;
	readonly parameters: readonly ParameterDescriptor[];
	/** Invoke with arguments in parameter order */
	construct(args: readonly unknown[]): T;
}
