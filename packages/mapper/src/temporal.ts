/**
 * Temporal kinds backed by js-joda.
 *
 * Each entry recognises values of its kind and, where the kind is parseable,
 * parses ISO text into it. `duration` is recognised but never parsed.
 */

import {
	Duration,
	Instant,
	LocalDate,
	LocalDateTime,
	OffsetDateTime,
	Year,
	YearMonth,
	ZonedDateTime
} from '@js-joda/core';
import '@js-joda/timezone';
import type { TemporalKind } from './types';

export interface TemporalType {
	readonly kind: TemporalKind;
	is(value: unknown): boolean;
	readonly parse?: (text: string) => unknown;
}

export const TEMPORAL_TYPES: readonly TemporalType[] = [
	{ kind: 'year', is: (v) => v instanceof Year, parse: (text) => Year.parse(text) },
	{ kind: 'year-month', is: (v) => v instanceof YearMonth, parse: (text) => YearMonth.parse(text) },
	{ kind: 'date', is: (v) => v instanceof LocalDate, parse: (text) => LocalDate.parse(text) },
	{ kind: 'date-time', is: (v) => v instanceof LocalDateTime, parse: (text) => LocalDateTime.parse(text) },
	{ kind: 'instant', is: (v) => v instanceof Instant, parse: (text) => Instant.parse(text) },
	{ kind: 'zoned-date-time', is: (v) => v instanceof ZonedDateTime, parse: (text) => ZonedDateTime.parse(text) },
	{ kind: 'offset-date-time', is: (v) => v instanceof OffsetDateTime, parse: (text) => OffsetDateTime.parse(text) },
	{ kind: 'duration', is: (v) => v instanceof Duration }
];

const byKind = new Map<TemporalKind, TemporalType>(TEMPORAL_TYPES.map((t) => [t.kind, t]));
const temporalKinds: ReadonlySet<string> = new Set(TEMPORAL_TYPES.map((t) => t.kind));

export function temporalType(kind: TemporalKind): TemporalType | undefined {
	return byKind.get(kind);
}

export function isTemporalKind(kind: string): kind is TemporalKind {
	return temporalKinds.has(kind);
}

/**
 * Find the temporal kind of a runtime value, if it is a js-joda temporal.
 */
export function temporalKindOf(value: unknown): TemporalKind | undefined {
	return TEMPORAL_TYPES.find((t) => t.is(value))?.kind;
}
