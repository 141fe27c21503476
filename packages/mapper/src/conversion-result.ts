/**
 * Two-state outcome of a conversion attempt.
 *
 * A converted value may itself be null (for nullable targets), so "no conversion"
 * is its own state rather than a null payload.
 */
export type ConversionResult<T = unknown> = { readonly ok: true; readonly value: T } | { readonly ok: false };

export const UNCONVERTIBLE: ConversionResult<never> = Object.freeze({ ok: false } as const);

export function converted<T>(value: T): ConversionResult<T> {
	return { ok: true, value };
}
