import { describe, it, expect } from 'vitest';
import { MART_COLUMNS, buildDataMart } from '../aggregation';
import { enrich, tx } from '../../../__tests__/fixtures';

describe('buildDataMart', () => {
  const enriched = enrich([
    tx({ order_id: 1, fecha: '2024-03-16', tienda_id: 'T2', cantidad: 2, precio_unitario: 10 }),
    tx({ order_id: 2, fecha: '2024-03-15', cantidad: 1, precio_unitario: 10.1 }),
    tx({ order_id: 3, fecha: '15-03-2024', cantidad: 3, precio_unitario: 0.1 }),
    tx({ order_id: 4, fecha: 'garbage', cantidad: 5, precio_unitario: 1 }),
    tx({ order_id: 5, fecha: '2024-03-15', producto_id: 'P9', cantidad: null, precio_unitario: 4 }),
  ]);

  it('produces one row per distinct key, sorted with nulls last', () => {
    const mart = buildDataMart(enriched);

    expect(mart.columns).toEqual(MART_COLUMNS);
    expect(mart.rows).toEqual([
      {
        fecha: '2024-03-15',
        anio: 2024,
        mes: 3,
        dia_semana: 'Viernes',
        ciudad: 'Bogotá',
        region: 'Andina',
        categoria: 'Lácteos',
        num_transacciones: 2,
        unidades_vendidas: 4,
        ingresos_totales: 10.4,
      },
      {
        fecha: '2024-03-15',
        anio: 2024,
        mes: 3,
        dia_semana: 'Viernes',
        ciudad: 'Bogotá',
        region: 'Andina',
        categoria: null,
        num_transacciones: 1,
        unidades_vendidas: 0,
        ingresos_totales: 0,
      },
      {
        fecha: '2024-03-16',
        anio: 2024,
        mes: 3,
        dia_semana: 'Sábado',
        ciudad: 'Cali',
        region: 'Pacífica',
        categoria: 'Lácteos',
        num_transacciones: 1,
        unidades_vendidas: 2,
        ingresos_totales: 20,
      },
      {
        fecha: null,
        anio: null,
        mes: null,
        dia_semana: null,
        ciudad: 'Bogotá',
        region: 'Andina',
        categoria: 'Lácteos',
        num_transacciones: 1,
        unidades_vendidas: 5,
        ingresos_totales: 5,
      },
    ]);
  });

  it('conserves the transaction count across groups', () => {
    const mart = buildDataMart(enriched);
    const total = mart.column('num_transacciones').reduce((s, n) => s + n, 0);
    expect(total).toBe(enriched.length);
  });

  it('is deterministic for a fixed input', () => {
    expect(buildDataMart(enriched).rows).toEqual(buildDataMart(enriched).rows);
  });

  it('is empty for an empty table', () => {
    expect(buildDataMart(enrich([])).length).toBe(0);
  });
});
