/**
 * Custom Mapper Registry
 *
 * Stores user conversion functions keyed by (source type, target type) identity.
 * Consulted by the conversion engine when no structural rule applies.
 *
 * Read-mostly: lookups may run while mappings are in flight, but registering
 * concurrently with mapping is not synchronised.
 *
 * @example
 * ```typescript
 * const registry = new CustomMapperRegistry()
 *   .register(Relationship, 'string', (r: Relationship) => r.value)
 *   .register('string', Relationship, (s: string) => new Relationship(s));
 * ```
 */

import { Logger } from '@remap/logging';
import { StructType } from './struct';
import { nominalId } from './type-descriptor';
import type { Constructor, TypeId, TypeKind } from './types';

/**
 * Conversion function. Returning null or undefined means "cannot convert",
 * which lets the built-in scalar table try next.
 *
 * Declared through a method signature so that a mapper for a specific source type
 * is accepted where a mapper of `unknown` is stored (method parameters are bivariant).
 */
export type CustomMapper<F = unknown, T = unknown> = {
	map(source: F): T | null | undefined;
}['map'];

/**
 * A type as given when registering: kind name, class, or struct declaration.
 */
export type TypeKey = TypeKind | Constructor | StructType;

function toTypeId(key: TypeKey): TypeId {
	if (key instanceof StructType || typeof key === 'function') {
		return nominalId(key);
	}
	return key;
}

function keyName(key: TypeKey): string {
	if (key instanceof StructType) return key.$name;
	return typeof key === 'function' ? key.name : key;
}

export class CustomMapperRegistry {
	private readonly mappers = new Map<TypeId, Map<TypeId, CustomMapper>>();
	private readonly log: Logger;

	public constructor(logger?: Logger) {
		this.log = logger ?? new Logger('CustomMapperRegistry');
	}

	/**
	 * Register a mapper. A later registration for the same pair replaces the earlier one.
	 */
	public register<F, T>(from: TypeKey, to: TypeKey, mapper: CustomMapper<F, T>): this {
		const fromId = toTypeId(from);
		const toId = toTypeId(to);

		let targets = this.mappers.get(fromId);
		if (!targets) {
			targets = new Map();
			this.mappers.set(fromId, targets);
		}

		if (targets.has(toId)) {
			this.log.debug('Custom Mapper Replaced', { from: keyName(from), to: keyName(to) });
		}
		targets.set(toId, mapper);
		return this;
	}

	public lookup(from: TypeKey, to: TypeKey): CustomMapper | undefined {
		return this.mappers.get(toTypeId(from))?.get(toTypeId(to));
	}

	public has(from: TypeKey, to: TypeKey): boolean {
		return this.lookup(from, to) !== undefined;
	}

	/** Number of registered pairs */
	public get size(): number {
		let count = 0;
		for (const targets of this.mappers.values()) {
			count += targets.size;
		}
		return count;
	}
}
