/**
 * Conversion Engine
 *
 * Converts one value from a source type to a target type by trying an ordered
 * list of rules. `UNCONVERTIBLE` is the signal to fall through; only the
 * orchestrator turns it into an error.
 *
 * @example
 * ```typescript
 * const engine = new ConversionEngine(registry);
 * engine.convert(['1', '2'], type.list(type.string()).type, type.list(type.integer()).type);
 * // -> { ok: true, value: [1, 2] }
 * ```
 */

import { converted, UNCONVERTIBLE, type ConversionResult } from './conversion-result';
import { DEFAULT_RULES, type ConversionContext, type ConversionRule, type StructureMapper } from './conversion-rules';
import type { CustomMapperRegistry } from './custom-mapper-registry';
import { sameType } from './type-descriptor';
import type { TypeDescriptor } from './types';

export interface ConversionEngineOptions {
	/** Rules in the order they are tried. Defaults to `DEFAULT_RULES`. */
	rules?: readonly ConversionRule[];
	/** Maps an object onto a nested struct. Without it, the structure rule never converts. */
	mapStructure?: StructureMapper;
}

export class ConversionEngine {
	private readonly rules: readonly ConversionRule[];
	private readonly context: ConversionContext;

	public constructor(
		public readonly registry: CustomMapperRegistry,
		options: ConversionEngineOptions = {}
	) {
		this.rules = options.rules ?? DEFAULT_RULES;
		this.context = {
			registry,
			convert: (value, fromType, toType) => this.convert(value, fromType, toType),
			...(options.mapStructure ? { mapStructure: options.mapStructure } : {})
		};
	}

	/**
	 * Convert a value. Failures inside containers throw `ConversionFailedError`
	 * with the path of the failing element; everything else that cannot be
	 * converted returns `UNCONVERTIBLE`.
	 */
	public convert(value: unknown, fromType: TypeDescriptor, toType: TypeDescriptor): ConversionResult {
		if (value === null || value === undefined) {
			return toType.nullable ? converted(null) : UNCONVERTIBLE;
		}

		if (toType.kind === 'any' || sameType(fromType, toType, true)) {
			return converted(value);
		}

		for (const rule of this.rules) {
			if (!rule.applies(fromType, toType)) {
				continue;
			}
			const result = rule.convert(value, fromType, toType, this.context);
			if (result.ok) {
				return result;
			}
		}
		return UNCONVERTIBLE;
	}

	/** Names of the rules in the order they are tried */
	public get ruleNames(): string[] {
		return this.rules.map((rule) => rule.name);
	}
}
