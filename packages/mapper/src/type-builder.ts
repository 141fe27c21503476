/**
 * Type Builders
 *
 * Factory functions for type descriptors and field definitions.
 *
 * @example
 * ```typescript
 * // Target side: constructor parameters
 * const UserStruct = Mapper.defineStruct(User, {
 *   name: type.string(),
 *   age: type.integer().nullable(),
 *   tags: type.list(type.string()).default(),
 * });
 *
 * // Source side: bind `fullName` to the target parameter `name`
 * Mapper.defineStruct(UserResource, {
 *   fullName: type.string().mapTo('name'),
 * });
 * ```
 */

import { createDescriptor, withNullability } from './type-descriptor';
import type { FieldDef, ScalarKind, StructTarget, Constructor, TypeDescriptor } from './types';

/**
 * Immutable builder for one field definition. Every modifier returns a new builder.
 */
export class TypeBuilder {
	public readonly _def: FieldDef;

	public constructor(def: FieldDef) {
		this._def = Object.freeze(def);
	}

	public get type(): TypeDescriptor {
		return this._def.type;
	}

	/** Accept null/undefined values */
	public nullable(): TypeBuilder {
		return new TypeBuilder({ ...this._def, type: withNullability(this._def.type, true) });
	}

	/**
	 * Mark the parameter as having a default.
	 * Without a value the constructor's own default applies; with one, that value is passed.
	 */
	public default(): TypeBuilder;
	public default(value: unknown): TypeBuilder;
	public default(...value: unknown[]): TypeBuilder {
		return value.length > 0
			? new TypeBuilder({ ...this._def, hasDefault: true, defaultValue: value[0] })
			: new TypeBuilder({ ...this._def, hasDefault: true });
	}

	/** Bind this source field to the target parameter with the given name */
	public mapTo(parameterName: string): TypeBuilder {
		return new TypeBuilder({ ...this._def, alias: parameterName });
	}
}

/**
 * Either a builder or a bare descriptor, for type arguments.
 */
export type TypeInput = TypeBuilder | TypeDescriptor;

function resolve(input: TypeInput): TypeDescriptor {
	return input instanceof TypeBuilder ? input.type : input;
}

function build(type: TypeDescriptor): TypeBuilder {
	return new TypeBuilder({ type, hasDefault: false });
}

function scalar(kind: ScalarKind): () => TypeBuilder {
	return () => build(createDescriptor(kind));
}

/**
 * Type factory.
 */
export const type = {
	string: scalar('string'),
	boolean: scalar('boolean'),
	/** JS number holding a safe integer */
	integer: scalar('integer'),
	/** JS bigint in the signed 64-bit range */
	long: scalar('long'),
	double: scalar('double'),
	/** decimal.js Decimal */
	decimal: scalar('decimal'),
	year: scalar('year'),
	yearMonth: scalar('year-month'),
	date: scalar('date'),
	dateTime: scalar('date-time'),
	instant: scalar('instant'),
	zonedDateTime: scalar('zoned-date-time'),
	offsetDateTime: scalar('offset-date-time'),
	duration: scalar('duration'),

	/** Closed set of string literals */
	enumOf(values: readonly string[]): TypeBuilder {
		return build(createDescriptor('enum', { values: Object.freeze([...values]) }));
	},

	list(element: TypeInput): TypeBuilder {
		return build(createDescriptor('list', { args: [resolve(element)] }));
	},

	set(element: TypeInput): TypeBuilder {
		return build(createDescriptor('set', { args: [resolve(element)] }));
	},

	map(key: TypeInput, value: TypeInput): TypeBuilder {
		return build(createDescriptor('map', { args: [resolve(key), resolve(value)] }));
	},

	/** Plain object with string keys */
	record(value: TypeInput): TypeBuilder {
		return build(createDescriptor('record', { args: [resolve(value)] }));
	},

	/** A declared struct; the class may be declared after this reference is made */
	struct(target: StructTarget): TypeBuilder {
		return build(createDescriptor('struct', { ref: target }));
	},

	/** Instances of an undeclared class, matched by identity only */
	instance(ctor: Constructor): TypeBuilder {
		return build(createDescriptor('object', { ref: ctor }));
	},

	any(): TypeBuilder {
		return build(createDescriptor('any', { nullable: true }));
	}
};
