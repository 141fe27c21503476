/**
 * @remap/mapper - Constructor-driven object mapping
 *
 * Copies data from a source object into a newly constructed target whose shape
 * differs in field names, nesting, container types and scalar representations.
 *
 * @example
 * ```typescript
 * import { Mapper, ObjectMapper, type } from '@remap/mapper';
 *
 * class User {
 *   constructor(public readonly name: string, public readonly age: number) {}
 * }
 * class UserResource {
 *   constructor(public readonly fullName: string, public readonly stringAge: string) {}
 * }
 *
 * Mapper.defineStruct(User, { name: type.string(), age: type.integer() });
 * Mapper.defineStruct(UserResource, {
 *   fullName: type.string().mapTo('name'),
 *   stringAge: type.string().mapTo('age'),
 * });
 *
 * new ObjectMapper().map(new UserResource('John Doe', '30'), User);
 * // -> User { name: 'John Doe', age: 30 }
 * ```
 */

// Declarations
export { Mapper } from './mapper';
export { type, TypeBuilder, type TypeInput } from './type-builder';
export { StructType, type StructFieldsInput } from './struct';

// Mapping
export { ObjectMapper, type ObjectMapperOptions } from './object-mapper';
export { DeclaredTypeIntrospector, type TypeIntrospector } from './introspector';
export { ConversionEngine, type ConversionEngineOptions } from './conversion-engine';
export {
	DEFAULT_RULES,
	sequenceRule,
	setRule,
	keyedMappingRule,
	customMapperRule,
	structureRule,
	scalarRule,
	type ConversionRule,
	type ConversionContext,
	type StructureMapper
} from './conversion-rules';
export { converted, UNCONVERTIBLE, type ConversionResult } from './conversion-result';
export { CustomMapperRegistry, type CustomMapper, type TypeKey } from './custom-mapper-registry';

// Scalars and types
export {
	parseScalar,
	parseInteger,
	parseLong,
	parseDouble,
	parseDecimal,
	parseBoolean,
	parseTemporal
} from './coercion';
export { inferType, formatType, sameType, createDescriptor, typeIdOf } from './type-descriptor';

// Errors
export {
	MapperError,
	NoConstructorError,
	UnresolvedFieldError,
	NonNullableViolationError,
	ConversionFailedError,
	type ConversionFailure
} from './mapper-error';

// Configuration
export { readMapperConfig, createObjectMapperFromConfig, MapperConfigSchema, type MapperConfig } from './mapper-config';

export type {
	TypeKind,
	ScalarKind,
	NumericKind,
	TemporalKind,
	ContainerKind,
	TypeDescriptor,
	TypeId,
	Constructor,
	StructTarget,
	FieldDef,
	FieldDescriptor,
	ParameterDescriptor,
	ConstructorDescriptor
} from './types';
