// ──────────────────────────────────────────
// Migration: data mart and summary tables
// ──────────────────────────────────────────

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('mart_ventas', (t) => {
    t.increments('id').primary();
    t.uuid('run_id').notNullable();
    t.timestamp('generated_at', { useTz: true }).notNullable();
    t.date('fecha');
    t.integer('anio');
    t.integer('mes');
    t.string('dia_semana', 20);
    t.string('ciudad', 255);
    t.string('region', 255);
    t.string('categoria', 255);
    t.integer('num_transacciones').notNullable();
    t.integer('unidades_vendidas').notNullable();
    t.decimal('ingresos_totales', 14, 2).notNullable();
    t.index(['run_id']);
    t.index(['fecha']);
  });

  await knex.schema.createTable('resumen_ventas', (t) => {
    t.increments('id').primary();
    t.uuid('run_id').notNullable().unique();
    t.timestamp('generated_at', { useTz: true }).notNullable();
    t.decimal('ingresos_totales', 14, 2).notNullable();
    t.integer('total_transacciones').notNullable();
    t.decimal('ticket_promedio', 14, 2);
    t.integer('clientes_unicos').notNullable();
    t.string('ciudad_top', 255);
    t.string('categoria_top', 255);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('resumen_ventas');
  await knex.schema.dropTableIfExists('mart_ventas');
}
