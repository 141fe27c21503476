/**
 * Struct Declarations
 *
 * A struct declaration lists the primary-constructor parameters of a target type,
 * in order, with their types. The same declaration describes the readable fields
 * (and their aliases) when an instance of the type is used as a mapping source.
 */

import type { Constructor, FieldDef, StructTarget } from './types';
import type { TypeBuilder } from './type-builder';

/**
 * Input type for a struct declaration: keys are parameter names in constructor order.
 */
export type StructFieldsInput = Record<string, TypeBuilder>;

const declarations = new WeakMap<Constructor, StructType>();

/**
 * A declared struct. Class-backed structs construct with `new` and positional arguments;
 * shape structs build a plain object.
 */
export class StructType<T = unknown> {
	private constructor(
		public readonly $name: string,
		public readonly $fields: Readonly<Record<string, FieldDef>>,
		public readonly $ctor: Constructor<T> | undefined,
		private readonly factory: (args: readonly unknown[]) => T
	) {}

	/** @internal */
	public static forClass<T>(ctor: Constructor<T>, fields: StructFieldsInput): StructType<T> {
		const struct = new StructType<T>(ctor.name, resolveFields(ctor.name, fields), ctor, (args) =>
			Reflect.construct(ctor, args)
		);
		// Re-declaring a class replaces the earlier declaration
		declarations.set(ctor, struct);
		return struct;
	}

	/** @internal */
	public static forShape<T>(name: string, fields: StructFieldsInput): StructType<T> {
		const defs = resolveFields(name, fields);
		const names = Object.keys(defs);
		return new StructType<T>(name, defs, undefined, (args) => {
			const shape: Record<string, unknown> = {};
			names.forEach((fieldName, index) => {
				if (args[index] !== undefined) {
					shape[fieldName] = args[index];
				}
			});
			return shape as T;
		});
	}

	/**
	 * Construct an instance. Undefined arguments take the declared default value, if any.
	 * Constructor exceptions propagate unchanged.
	 */
	public create(args: readonly unknown[]): T {
		const resolved = Object.values(this.$fields).map((def, index) => {
			const arg = args[index];
			return arg === undefined && 'defaultValue' in def ? def.defaultValue : arg;
		});
		return this.factory(resolved);
	}
}

/**
 * Validate and freeze the field definitions of a struct.
 * Two fields aliased to the same parameter would make source lookup ambiguous.
 */
function resolveFields(structName: string, fields: StructFieldsInput): Readonly<Record<string, FieldDef>> {
	const defs: Record<string, FieldDef> = {};
	const aliasOwners = new Map<string, string>();

	for (const [name, builder] of Object.entries(fields)) {
		const def = builder._def;
		if (def.alias !== undefined) {
			const owner = aliasOwners.get(def.alias);
			if (owner !== undefined) {
				throw new Error(
					`Alias '${def.alias}' is declared on both '${owner}' and '${name}' of ${structName}. ` +
						`Each alias can only be declared once.`
				);
			}
			aliasOwners.set(def.alias, name);
		}
		defs[name] = def;
	}

	return Object.freeze(defs);
}

/**
 * Find the declaration of a class, if it has one.
 */
export function structOf<T>(ctor: Constructor<T>): StructType<T> | undefined {
	return declarations.get(ctor) as StructType<T> | undefined;
}

/**
 * Resolve a class or declaration to its declaration.
 */
export function resolveStruct<T>(target: StructTarget<T>): StructType<T> | undefined {
	return target instanceof StructType ? target : structOf(target);
}

export function structName(target: StructTarget): string {
	return target instanceof StructType ? target.$name : target.name;
}
