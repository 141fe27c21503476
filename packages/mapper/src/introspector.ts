/**
 * Type Introspection
 *
 * The mapper never inspects classes directly. It asks a `TypeIntrospector` for the
 * readable fields of a source instance and the primary constructor of a target type.
 * `DeclaredTypeIntrospector` answers from struct declarations plus the runtime shape
 * of the source value.
 */

import { resolveStruct, StructType, structName, structOf } from './struct';
import { formatType, inferType, isConstructor } from './type-descriptor';
import type { ConstructorDescriptor, FieldDescriptor, StructTarget } from './types';

export interface TypeIntrospector {
	/**
	 * Readable fields of a source instance.
	 * @param declaration - Declaration to read field types and aliases from, when the
	 * source's own class is not declared (e.g. a plain object described by a shape struct)
	 */
	fieldsOf(source: object, declaration?: StructTarget): readonly FieldDescriptor[];

	/** Primary constructor of a target type, or undefined when it exposes none */
	constructorOf<T>(target: StructTarget<T>): ConstructorDescriptor<T> | undefined;

	/** Display name of a source value's type */
	describe(source: object, declaration?: StructTarget): string;
}

function readField(name: string): (source: object) => unknown {
	return (source) => Reflect.get(source, name);
}

function declarationOf(source: object, declaration?: StructTarget): StructType | undefined {
	if (declaration !== undefined) {
		return resolveStruct(declaration);
	}
	const ctor: unknown = source.constructor;
	return isConstructor(ctor) ? structOf(ctor) : undefined;
}

export class DeclaredTypeIntrospector implements TypeIntrospector {
	/**
	 * Declared fields first, in declaration order, then every other own enumerable
	 * property with a type inferred from its current value.
	 */
	public fieldsOf(source: object, declaration?: StructTarget): readonly FieldDescriptor[] {
		const struct = declarationOf(source, declaration);
		const fields: FieldDescriptor[] = [];
		const declared = new Set<string>();

		if (struct) {
			for (const [name, def] of Object.entries(struct.$fields)) {
				declared.add(name);
				fields.push({
					name,
					type: def.type,
					get: readField(name),
					...(def.alias !== undefined ? { alias: def.alias } : {})
				});
			}
		}

		for (const name of Object.keys(source)) {
			if (declared.has(name)) continue;
			fields.push({ name, type: inferType(Reflect.get(source, name)), get: readField(name) });
		}

		return fields;
	}

	public constructorOf<T>(target: StructTarget<T>): ConstructorDescriptor<T> | undefined {
		const struct = resolveStruct(target);
		if (!struct) {
			return undefined;
		}

		return {
			name: struct.$name,
			parameters: Object.entries(struct.$fields).map(([name, def]) => ({
				name,
				type: def.type,
				hasDefault: def.hasDefault
			})),
			construct: (args) => struct.create(args)
		};
	}

	public describe(source: object, declaration?: StructTarget): string {
		if (declaration !== undefined) {
			return structName(declaration);
		}
		const type = inferType(source);
		// Plain objects read better as 'object' than as their inferred record type
		return type.kind === 'record' ? 'object' : formatType(type);
	}
}
