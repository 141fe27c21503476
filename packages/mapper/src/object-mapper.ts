/**
 * Object Mapper
 *
 * Builds a new instance of a declared target type from an arbitrary source object.
 * Every constructor parameter is resolved against the source's fields (alias first,
 * then name), checked for absence, and converted to the parameter's type.
 * Construction either fully succeeds or the call throws; no partial result exists.
 *
 * @example
 * ```typescript
 * class User {
 *   constructor(public readonly name: string, public readonly age: number) {}
 * }
 * Mapper.defineStruct(User, { name: type.string(), age: type.integer() });
 *
 * const mapper = new ObjectMapper();
 * const user = mapper.map({ name: 'John Doe', age: '30' }, User);
 * // -> User { name: 'John Doe', age: 30 }
 * ```
 */

import { Logger } from '@remap/logging';
import { ConversionEngine } from './conversion-engine';
import type { ConversionResult } from './conversion-result';
import { DEFAULT_RULES, structureRule, type ConversionRule, type StructureMapper } from './conversion-rules';
import { CustomMapperRegistry } from './custom-mapper-registry';
import { DeclaredTypeIntrospector, type TypeIntrospector } from './introspector';
import {
	ConversionFailedError,
	NoConstructorError,
	NonNullableViolationError,
	UnresolvedFieldError
} from './mapper-error';
import { structName } from './struct';
import { formatType, inferType, sameType } from './type-descriptor';
import type { FieldDescriptor, ParameterDescriptor, StructTarget, TypeDescriptor } from './types';

export interface ObjectMapperOptions {
	/** Source of field and constructor metadata (default: DeclaredTypeIntrospector) */
	introspector?: TypeIntrospector;
	logger?: Logger;
	/** Map objects onto struct-typed parameters recursively (default: true) */
	nestedStructures?: boolean;
	/** Conversion rules in the order they are tried (default: DEFAULT_RULES) */
	rules?: readonly ConversionRule[];
}

/**
 * What one mapping call is resolving, for error context.
 */
interface MappingScope {
	readonly source: object;
	readonly sourceName: string;
	readonly targetName: string;
	readonly fields: readonly FieldDescriptor[];
}

function isAbsent(value: unknown): value is null | undefined {
	return value === null || value === undefined;
}

export class ObjectMapper {
	private readonly engine: ConversionEngine;
	private readonly introspector: TypeIntrospector;
	private readonly log: Logger;

	public constructor(
		public readonly registry: CustomMapperRegistry = new CustomMapperRegistry(),
		options: ObjectMapperOptions = {}
	) {
		const nested = options.nestedStructures ?? true;
		const rules = options.rules ?? DEFAULT_RULES;

		this.introspector = options.introspector ?? new DeclaredTypeIntrospector();
		this.log = options.logger ?? new Logger('ObjectMapper');
		const mapStructure: StructureMapper = (source, target, declaration) => this.map(source, target, declaration);
		this.engine = new ConversionEngine(
			registry,
			nested ? { rules, mapStructure } : { rules: rules.filter((rule) => rule !== structureRule) }
		);
	}

	/**
	 * Map a source object onto a new instance of the target type.
	 *
	 * @param declaration - Declaration describing the source, for plain objects whose
	 * field types or aliases should come from a shape struct
	 * @throws NoConstructorError when the target was never declared
	 * @throws UnresolvedFieldError when no source field matches a parameter
	 * @throws NonNullableViolationError when a required parameter's source value is absent
	 * @throws ConversionFailedError when a value cannot be converted to its parameter type
	 */
	public map<T>(source: object, target: StructTarget<T>, declaration?: StructTarget): T {
		const ctor = this.introspector.constructorOf(target);
		if (!ctor) {
			throw new NoConstructorError(structName(target));
		}

		const scope: MappingScope = {
			source,
			sourceName: this.introspector.describe(source, declaration),
			targetName: ctor.name,
			fields: this.introspector.fieldsOf(source, declaration)
		};

		const debug = this.log.isDebugEnabled();
		if (debug) {
			this.log.debug('Mapping Started', {
				source: scope.sourceName,
				target: scope.targetName,
				parameters: ctor.parameters.map((parameter) => parameter.name)
			});
		}
		const args = ctor.parameters.map((parameter) => this.resolveArgument(parameter, scope));
		const result = ctor.construct(args);
		if (debug) {
			this.log.debug('Mapping Finished', { source: scope.sourceName, target: scope.targetName });
		}

		return result;
	}

	/**
	 * Map every source in order. Fails on the first source that cannot be mapped.
	 */
	public mapMany<T>(sources: readonly object[], target: StructTarget<T>, declaration?: StructTarget): T[] {
		return sources.map((source) => this.map(source, target, declaration));
	}

	/** The conversion engine used for parameter values */
	public get conversionEngine(): ConversionEngine {
		return this.engine;
	}

	private resolveArgument(parameter: ParameterDescriptor, scope: MappingScope): unknown {
		const field = this.findField(parameter, scope);
		const value = field.get(scope.source);

		if (isAbsent(value)) {
			return this.resolveAbsent(parameter, field, value, scope);
		}

		const fromType = field.type.kind === 'unknown' || field.type.kind === 'any' ? inferType(value) : field.type;
		if (parameter.type.kind === 'any' || sameType(fromType, parameter.type, true)) {
			return value;
		}

		return this.convert(value, fromType, parameter, field, scope);
	}

	/**
	 * Alias matches win over name matches, even when a different field carries the name.
	 */
	private findField(parameter: ParameterDescriptor, scope: MappingScope): FieldDescriptor {
		const field =
			scope.fields.find((candidate) => candidate.alias === parameter.name) ??
			scope.fields.find((candidate) => candidate.name === parameter.name);

		if (!field) {
			throw new UnresolvedFieldError(scope.targetName, parameter.name, formatType(parameter.type), scope.sourceName);
		}
		return field;
	}

	/**
	 * A nullable parameter receives null. An undefined value for a parameter with a
	 * default stays undefined, which lets the constructor or the declared default supply
	 * the value. A null value is never replaced by a default.
	 */
	private resolveAbsent(
		parameter: ParameterDescriptor,
		field: FieldDescriptor,
		value: null | undefined,
		scope: MappingScope
	): null | undefined {
		if (parameter.type.nullable) {
			return null;
		}
		if (value === undefined && parameter.hasDefault) {
			return undefined;
		}
		throw new NonNullableViolationError(
			scope.targetName,
			parameter.name,
			formatType(parameter.type),
			field.name,
			formatType(field.type),
			value
		);
	}

	private convert(
		value: unknown,
		fromType: TypeDescriptor,
		parameter: ParameterDescriptor,
		field: FieldDescriptor,
		scope: MappingScope
	): unknown {
		const failure = {
			targetName: scope.targetName,
			parameterName: parameter.name,
			parameterType: formatType(parameter.type),
			fieldName: field.name,
			fieldType: formatType(fromType)
		};

		let result: ConversionResult;
		try {
			result = this.engine.convert(value, fromType, parameter.type);
		} catch (error) {
			if (error instanceof ConversionFailedError) {
				// Keep the leaf value; the path points at it
				throw new ConversionFailedError(
					{ ...failure, path: error.location, value: error.actualValue },
					{ cause: error }
				);
			}
			throw error;
		}

		if (!result.ok) {
			throw new ConversionFailedError({ ...failure, value });
		}
		return result.value;
	}
}
