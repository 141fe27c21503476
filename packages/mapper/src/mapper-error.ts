/**
 * Mapper Errors
 *
 * Error classes for mapping failures with structured context.
 * Every error names the target and, where one is involved, the constructor parameter.
 *
 * @example
 * ```typescript
 * throw new MapperError('User', 'age', 'coercion failed', 'integer', 'abc');
 * // MapperError: [User.age] coercion failed - expected integer, got: "abc"
 * ```
 */

/**
 * Base class of all mapping failures.
 */
export class MapperError extends Error {
	public override readonly name: string = 'MapperError';

	/**
	 * @param targetName - Name of the target type being constructed
	 * @param parameterName - Constructor parameter that failed, if any
	 * @param reason - Description of why the mapping failed
	 * @param expectedType - Expected type, formatted (optional)
	 * @param actualValue - The value that caused the error (optional)
	 */
	public constructor(
		public readonly targetName: string,
		public readonly parameterName: string | undefined,
		public readonly reason: string,
		public readonly expectedType?: string,
		public readonly actualValue?: unknown,
		options?: ErrorOptions
	) {
		super(MapperError.formatMessage(targetName, parameterName, reason, expectedType, actualValue), options);

		// Maintains proper stack trace for where error was thrown (V8 engines)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}

	private static formatMessage(
		targetName: string,
		parameterName: string | undefined,
		reason: string,
		expectedType?: string,
		actualValue?: unknown
	): string {
		const location = parameterName !== undefined ? `${targetName}.${parameterName}` : targetName;
		let message = `[${location}] ${reason}`;

		if (expectedType !== undefined) {
			message += ` - expected ${expectedType}`;
		}

		if (actualValue !== undefined) {
			message += `, got: ${MapperError.formatValue(actualValue)}`;
		}

		return message;
	}

	/**
	 * Format a value for display in error message.
	 */
	public static formatValue(value: unknown): string {
		if (value === null) {
			return 'null';
		}
		if (value === undefined) {
			return 'undefined';
		}
		if (typeof value === 'string') {
			return `"${value}"`;
		}
		if (typeof value === 'bigint') {
			return `${value}n`;
		}
		if (value instanceof Map || value instanceof Set) {
			return `${value.constructor.name}(${value.size})`;
		}
		if (typeof value === 'object') {
			try {
				return JSON.stringify(value);
			} catch {
				return '[object]';
			}
		}
		return String(value);
	}
}

/**
 * The target type exposes no primary constructor (it was never declared as a struct).
 */
export class NoConstructorError extends MapperError {
	public override readonly name: string = 'NoConstructorError';

	public constructor(targetName: string) {
		super(targetName, undefined, 'no primary constructor is declared for this type');
	}
}

/**
 * No source field matches a constructor parameter by alias or by name.
 */
export class UnresolvedFieldError extends MapperError {
	public override readonly name: string = 'UnresolvedFieldError';

	public constructor(
		targetName: string,
		parameterName: string,
		public readonly parameterType: string,
		public readonly sourceName: string
	) {
		super(targetName, parameterName, `no field of ${sourceName} matches by alias or name`, parameterType);
	}
}

/**
 * The resolved source value is absent but the parameter requires one.
 */
export class NonNullableViolationError extends MapperError {
	public override readonly name: string = 'NonNullableViolationError';

	public constructor(
		targetName: string,
		parameterName: string,
		public readonly parameterType: string,
		public readonly fieldName: string,
		public readonly fieldType: string,
		actualValue: null | undefined
	) {
		super(
			targetName,
			parameterName,
			`source field '${fieldName}: ${fieldType}' is absent and the parameter is not nullable`,
			parameterType,
			actualValue
		);
	}
}

/**
 * Context of a conversion failure.
 *
 * `path` locates the failing value inside the converted one:
 * `[2]` for a list/set element, `{key}` for a map key, `[key]` for a map value,
 * `.name` for a field of a nested struct. Empty at the top level.
 */
export interface ConversionFailure {
	readonly targetName: string;
	readonly parameterName?: string;
	readonly parameterType: string;
	readonly fieldName?: string;
	readonly fieldType: string;
	readonly path?: string;
	readonly value?: unknown;
}

/**
 * The conversion cascade produced no value, at the top level or inside a container.
 */
export class ConversionFailedError extends MapperError {
	public override readonly name: string = 'ConversionFailedError';
	public readonly parameterType: string;
	public readonly fieldName: string | undefined;
	public readonly fieldType: string;
	public readonly path: string;

	public constructor(failure: ConversionFailure, options?: ErrorOptions) {
		const path = failure.path ?? '';
		const source = failure.fieldName !== undefined ? `'${failure.fieldName}: ${failure.fieldType}'` : failure.fieldType;
		super(
			failure.targetName,
			failure.parameterName,
			`cannot convert ${source}${path ? ` at ${path}` : ''}`,
			failure.parameterType,
			failure.value,
			options
		);
		this.parameterType = failure.parameterType;
		this.fieldName = failure.fieldName;
		this.fieldType = failure.fieldType;
		this.path = path;
	}

	/**
	 * Location of the failing value relative to the value this error was raised for.
	 * A parameter name set by a nested mapping becomes part of the path.
	 */
	public get location(): string {
		return this.parameterName !== undefined ? `.${this.parameterName}${this.path}` : this.path;
	}

	/**
	 * Re-raise this failure one container level up.
	 */
	public under(segment: string): ConversionFailedError {
		return new ConversionFailedError(
			{
				targetName: this.targetName,
				parameterType: this.parameterType,
				fieldType: this.fieldType,
				path: segment + this.location,
				value: this.actualValue
			},
			{ cause: this }
		);
	}
}
