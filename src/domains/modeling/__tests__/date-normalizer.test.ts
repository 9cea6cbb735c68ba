import { describe, it, expect } from 'vitest';
import { DATE_STRATEGIES, calendarFields, normalizeDate, parseDate } from '../date-normalizer';

describe('normalizeDate', () => {
  it('accepts year-month-day', () => {
    expect(normalizeDate('2024-03-15')).toBe('2024-03-15');
  });

  it('falls back to day-month-year', () => {
    expect(normalizeDate('15-03-2024')).toBe('2024-03-15');
  });

  it('returns null when no layout yields a real date', () => {
    expect(normalizeDate('2024-13-45')).toBeNull();
    expect(normalizeDate('31-04-2024')).toBeNull();
    expect(normalizeDate('03-15-2024')).toBeNull();
    expect(normalizeDate('2024/03/15')).toBeNull();
    expect(normalizeDate('2024-3-5')).toBeNull();
    expect(normalizeDate('')).toBeNull();
    expect(normalizeDate(null)).toBeNull();
  });

  it('honours leap years', () => {
    expect(normalizeDate('29-02-2024')).toBe('2024-02-29');
    expect(normalizeDate('2023-02-29')).toBeNull();
  });

  it('tries strategies in the order given', () => {
    const dayFirstOnly = DATE_STRATEGIES.filter((s) => s.name === 'day-month-year');
    expect(parseDate('2024-03-15', dayFirstOnly)).toBeNull();
    expect(normalizeDate('15-03-2024', dayFirstOnly)).toBe('2024-03-15');
  });
});

describe('calendarFields', () => {
  it('derives year, month and Monday-first weekday names', () => {
    expect(calendarFields('2024-03-15')).toEqual({ anio: 2024, mes: 3, dia_semana: 'Viernes' });
    expect(calendarFields('2024-03-11')).toEqual({ anio: 2024, mes: 3, dia_semana: 'Lunes' });
    expect(calendarFields('2024-03-17')).toEqual({ anio: 2024, mes: 3, dia_semana: 'Domingo' });
    expect(calendarFields('2024-12-31')).toEqual({ anio: 2024, mes: 12, dia_semana: 'Martes' });
  });

  it('is all null for a missing date', () => {
    expect(calendarFields(null)).toEqual({ anio: null, mes: null, dia_semana: null });
  });
});
