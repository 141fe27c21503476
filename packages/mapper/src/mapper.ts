/**
 * Mapper Factory
 *
 * Declares the structs the object mapper works with.
 *
 * @example
 * ```typescript
 * class User {
 *   constructor(
 *     public readonly name: string,
 *     public readonly age: number,
 *     public readonly tags: string[] = []
 *   ) {}
 * }
 *
 * // Target: constructor parameters in order
 * Mapper.defineStruct(User, {
 *   name: type.string(),
 *   age: type.integer(),
 *   tags: type.list(type.string()).default(),
 * });
 *
 * // Plain-object struct
 * const Address = Mapper.defineStruct('Address', {
 *   street: type.string(),
 *   zip: type.string().nullable(),
 * });
 * ```
 */

import { StructType, structOf, type StructFieldsInput } from './struct';
import type { Constructor } from './types';

function defineStruct<T>(ctor: Constructor<T>, fields: StructFieldsInput): StructType<T>;
function defineStruct<T = Record<string, unknown>>(name: string, fields: StructFieldsInput): StructType<T>;
function defineStruct<T>(target: Constructor<T> | string, fields: StructFieldsInput): StructType<T> {
	if (typeof target === 'string') {
		if (target.trim() === '') {
			throw new Error('Struct name must not be empty.');
		}
		return StructType.forShape<T>(target, fields);
	}
	return StructType.forClass(target, fields);
}

/**
 * Struct declaration factory.
 */
export const Mapper = {
	/**
	 * Declare the primary constructor of a class, or a named plain-object shape.
	 * Keys are parameter names in constructor order. Re-declaring a class replaces
	 * its earlier declaration.
	 *
	 * @throws Error when two fields declare the same alias
	 */
	defineStruct,

	/**
	 * The declaration of a class, if it has one.
	 */
	structOf<T>(ctor: Constructor<T>): StructType<T> | undefined {
		return structOf(ctor);
	}
};
