import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Knex } from 'knex';
import { MartRepo } from '../mart.repo';
import { Table } from '../../../shared/table';
import { BusinessSummary, MartRow } from '../../../shared/types';
import { MART_COLUMNS } from '../aggregation';

// ── Mock chain builders ─────────────────────────────────────────────

function makeTrx() {
  const tables = new Map<string, { del: ReturnType<typeof vi.fn>; insert: ReturnType<typeof vi.fn> }>();
  const table = (name: string) => {
    let entry = tables.get(name);
    if (!entry) {
      entry = { del: vi.fn().mockResolvedValue(0), insert: vi.fn().mockResolvedValue([]) };
      tables.set(name, entry);
    }
    return entry;
  };
  const trx = Object.assign(vi.fn(table), { batchInsert: vi.fn().mockResolvedValue([]) });
  return { trx, table };
}

function makeDb() {
  const { trx, table } = makeTrx();
  const query = vi.fn();
  const db = Object.assign(query, {
    transaction: vi.fn(async (cb: (t: typeof trx) => Promise<void>) => cb(trx)),
  });
  return { db: db as unknown as Knex, query, trx, table };
}

const martRow: MartRow = {
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
};

const summary: BusinessSummary = {
  ingresos_totales: 10.4,
  total_transacciones: 2,
  ticket_promedio: 5.2,
  clientes_unicos: 1,
  ciudad_top: 'Bogotá',
  categoria_top: 'Lácteos',
};

describe('MartRepo', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('replaces the previous load inside one transaction', async () => {
    const { db, trx, table } = makeDb();
    const generatedAt = new Date('2024-03-20T12:00:00Z');

    await new MartRepo(db).replaceRun({
      runId: 'run-1',
      generatedAt,
      mart: new Table<MartRow>(MART_COLUMNS, [martRow]),
      summary,
    });

    expect(table('mart_ventas').del).toHaveBeenCalledTimes(1);
    expect(table('resumen_ventas').del).toHaveBeenCalledTimes(1);
    expect(trx.batchInsert).toHaveBeenCalledWith(
      'mart_ventas',
      [{ run_id: 'run-1', generated_at: generatedAt, ...martRow }],
      500
    );
    expect(table('resumen_ventas').insert).toHaveBeenCalledWith({
      run_id: 'run-1',
      generated_at: generatedAt,
      ...summary,
    });
  });

  it('skips the batch insert for an empty mart', async () => {
    const { db, trx, table } = makeDb();

    await new MartRepo(db).replaceRun({
      runId: 'run-2',
      generatedAt: new Date(),
      mart: Table.empty<MartRow>(MART_COLUMNS),
      summary,
    });

    expect(trx.batchInsert).not.toHaveBeenCalled();
    expect(table('resumen_ventas').insert).toHaveBeenCalledTimes(1);
  });

  it('only writes, inside the transaction', async () => {
    const { db, query, trx } = makeDb();

    await new MartRepo(db).replaceRun({
      runId: 'run-3',
      generatedAt: new Date(),
      mart: new Table<MartRow>(MART_COLUMNS, [martRow]),
      summary,
    });

    expect(query).not.toHaveBeenCalled();
    expect(trx.mock.calls).toEqual([['mart_ventas'], ['resumen_ventas'], ['resumen_ventas']]);
    expect(trx.batchInsert).toHaveBeenCalledTimes(1);
  });
});
