// ──────────────────────────────────────────
// Script: Generate sample input — ventas_crudas.csv,
// productos.csv and tiendas.csv with deliberate defects
//
// Usage:
//   npx tsx scripts/generate-sample.ts
//
// Env vars:
//   INPUT_DIR        — default . (where the files are written)
//   SAMPLE_ROWS      — default 1000 transactions
//   SAMPLE_SEED      — default 42
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import fs from 'fs';
import { faker } from '@faker-js/faker';
import { format } from 'date-fns';
import { stringify } from 'csv-stringify/sync';
import { loadConfig } from '../src/config';

const ROWS = parseInt(process.env.SAMPLE_ROWS || '1000', 10);
const SEED = parseInt(process.env.SAMPLE_SEED || '42', 10);

// ── Catalogs ────────────────────────────────────────────────────────

const CATEGORIES = ['Lácteos', 'Panadería', 'Bebidas', 'Aseo', 'Frutas y Verduras', 'Carnes', 'Snacks'];
const STORES = [
  { ciudad: 'Bogotá', region: 'Andina' },
  { ciudad: 'Medellín', region: 'Andina' },
  { ciudad: 'Cali', region: 'Pacífica' },
  { ciudad: 'Barranquilla', region: 'Caribe' },
  { ciudad: 'Cartagena', region: 'Caribe' },
  { ciudad: 'Bucaramanga', region: 'Andina' },
];

function buildProducts(): string[][] {
  return Array.from({ length: 40 }, (_, i) => [
    `P${String(i + 1).padStart(3, '0')}`,
    faker.commerce.productName(),
    faker.helpers.arrayElement(CATEGORIES),
    faker.company.name(),
  ]);
}

function buildStores(): string[][] {
  return STORES.map((s, i) => [`T${String(i + 1).padStart(2, '0')}`, `SuperMart ${s.ciudad}`, s.ciudad, s.region]);
}

// ── Transactions ────────────────────────────────────────────────────

function buildTransactions(productIds: string[], storeIds: string[]): string[][] {
  const rows: string[][] = [];
  const customers = Array.from({ length: 150 }, () => `C${faker.string.numeric(5)}`);

  for (let i = 0; i < ROWS; i++) {
    const date = faker.date.between({ from: '2024-01-01T00:00:00', to: '2024-12-31T23:59:59' });
    const roll = faker.number.float({ min: 0, max: 1 });

    // ~50% ISO dates, ~45% day-first, ~5% garbage
    const fecha =
      roll < 0.5 ? format(date, 'yyyy-MM-dd') : roll < 0.95 ? format(date, 'dd-MM-yyyy') : '2024-13-45';

    rows.push([
      String(10_000 + i),
      // a few unknown products and stores
      faker.number.float({ min: 0, max: 1 }) < 0.02 ? 'P999' : faker.helpers.arrayElement(productIds),
      String(faker.number.int({ min: 1, max: 12 })),
      faker.number.float({ min: 0.5, max: 45, precision: 0.01 }).toFixed(2),
      faker.number.float({ min: 0, max: 1 }) < 0.05 ? '' : faker.helpers.arrayElement(customers),
      faker.number.float({ min: 0, max: 1 }) < 0.02 ? 'T99' : faker.helpers.arrayElement(storeIds),
      fecha,
    ]);
  }

  // Re-emit ~3% of rows with the same order_id
  const duplicates = faker.helpers.arrayElements(rows, Math.ceil(rows.length * 0.03));
  for (const dup of duplicates) {
    rows.push([dup[0], dup[1], String(faker.number.int({ min: 1, max: 12 })), dup[3], dup[4], dup[5], dup[6]]);
  }
  return rows;
}

// ── Main ────────────────────────────────────────────────────────────

function generate() {
  faker.seed(SEED);
  const config = loadConfig();
  fs.mkdirSync(config.inputDir, { recursive: true });

  const products = buildProducts();
  const stores = buildStores();
  const transactions = buildTransactions(
    products.map((p) => p[0]),
    stores.map((s) => s[0])
  );

  fs.writeFileSync(
    config.files.products,
    stringify(products, { header: true, columns: ['producto_id', 'nombre', 'categoria', 'proveedor'] })
  );
  fs.writeFileSync(
    config.files.stores,
    stringify(stores, { header: true, columns: ['tienda_id', 'nombre_tienda', 'ciudad', 'region'] })
  );
  fs.writeFileSync(
    config.files.transactions,
    stringify(transactions, {
      header: true,
      columns: ['order_id', 'producto_id', 'cantidad', 'precio_unitario', 'cliente_id', 'tienda_id', 'fecha'],
    })
  );

  console.log(`[Sample] ${products.length} products, ${stores.length} stores, ${transactions.length} transactions`);
  console.log(`[Sample] Written to ${config.inputDir}`);
}

try {
  generate();
} catch (err) {
  console.error('[Sample] Error:', err);
  process.exit(1);
}
