// ──────────────────────────────────────────
// Modeling: date normalizer
// ──────────────────────────────────────────

import { format, getISODay, getMonth, getYear, isValid, parse } from 'date-fns';
import { WeekdayName } from '../../shared/types';

export interface DateStrategy {
  name: string;
  shape: RegExp;
  pattern: string;
}

/** Tried in order; the first one that yields a real calendar date wins. */
export const DATE_STRATEGIES: readonly DateStrategy[] = [
  { name: 'year-month-day', shape: /^\d{4}-\d{2}-\d{2}$/, pattern: 'yyyy-MM-dd' },
  { name: 'day-month-year', shape: /^\d{2}-\d{2}-\d{4}$/, pattern: 'dd-MM-yyyy' },
];

export const NORMALIZED_PATTERN = 'yyyy-MM-dd';

// Monday = 0 … Sunday = 6
export const WEEKDAY_NAMES: readonly WeekdayName[] = [
  'Lunes',
  'Martes',
  'Miércoles',
  'Jueves',
  'Viernes',
  'Sábado',
  'Domingo',
];

const REFERENCE_DATE = new Date(2000, 0, 1);

export function parseDate(value: string | null, strategies: readonly DateStrategy[] = DATE_STRATEGIES): Date | null {
  if (value === null) return null;
  for (const strategy of strategies) {
    if (!strategy.shape.test(value)) continue;
    const parsed = parse(value, strategy.pattern, REFERENCE_DATE);
    if (isValid(parsed)) return parsed;
  }
  return null;
}

export function normalizeDate(value: string | null, strategies?: readonly DateStrategy[]): string | null {
  const parsed = parseDate(value, strategies);
  return parsed ? format(parsed, NORMALIZED_PATTERN) : null;
}

export interface CalendarFields {
  anio: number | null;
  mes: number | null;
  dia_semana: WeekdayName | null;
}

/** Expects a date already normalized to yyyy-MM-dd. */
export function calendarFields(normalized: string | null): CalendarFields {
  const date = normalized === null ? null : parse(normalized, NORMALIZED_PATTERN, REFERENCE_DATE);
  if (date === null || !isValid(date)) {
    return { anio: null, mes: null, dia_semana: null };
  }
  return {
    anio: getYear(date),
    mes: getMonth(date) + 1,
    dia_semana: WEEKDAY_NAMES[getISODay(date) - 1],
  };
}
