// ──────────────────────────────────────────
// Table: ordered, immutable rows + column list,
// with hash join and group-by primitives
// ──────────────────────────────────────────

import { JoinCardinalityError } from './errors';

export type Cell = string | number | null;
export type Row = Record<string, Cell>;

export class Table<R extends Row> {
  readonly columns: readonly string[];
  readonly rows: readonly R[];

  constructor(columns: readonly string[], rows: readonly R[]) {
    this.columns = Object.freeze([...columns]);
    this.rows = Object.freeze(rows.map((row) => ({ ...row })));
  }

  static empty<R extends Row>(columns: readonly string[] = []): Table<R> {
    return new Table<R>(columns, []);
  }

  get length(): number {
    return this.rows.length;
  }

  get isEmpty(): boolean {
    return this.rows.length === 0;
  }

  map<S extends Row>(fn: (row: R, index: number) => S, columns: readonly string[] = this.columns): Table<S> {
    return new Table<S>(columns, this.rows.map(fn));
  }

  filter(fn: (row: R, index: number) => boolean): Table<R> {
    return new Table<R>(this.columns, this.rows.filter(fn));
  }

  column<K extends keyof R & string>(name: K): R[K][] {
    return this.rows.map((row) => row[name]);
  }

  /**
   * Hash index from stringified key to every row carrying it.
   * Rows with a null key are not indexed.
   */
  indexBy(key: keyof R & string): Map<string, R[]> {
    const index = new Map<string, R[]>();
    for (const row of this.rows) {
      const value = row[key];
      if (value === null) continue;
      const k = String(value);
      const bucket = index.get(k);
      if (bucket) bucket.push(row);
      else index.set(k, [row]);
    }
    return index;
  }
}

// ── Join ──

export interface LeftJoinOptions<L extends Row> {
  /** Name used in cardinality errors, e.g. "productos". */
  relation: string;
  leftKey: keyof L & string;
  rightKey: string;
  /** Appended to right-side columns whose name already exists on the left or is reserved. */
  suffix: string;
  /** Names the caller adds after the join. */
  reserved?: readonly string[];
}

/**
 * Many-to-one left join. Every left row is kept; right columns are null when
 * nothing matches. A left key that hits more than one right row throws.
 */
export function leftJoin<L extends Row, R extends Row>(
  left: Table<L>,
  right: Table<R>,
  options: LeftJoinOptions<L>
): Table<L & Row> {
  const { relation, leftKey, rightKey, suffix, reserved = [] } = options;
  const index = right.indexBy(rightKey);

  const taken = new Set([...left.columns, ...reserved]);
  const rightColumns = right.columns
    .filter((c) => c !== rightKey)
    .map((source) => ({ source, target: taken.has(source) ? `${source}${suffix}` : source }));

  const rows = left.rows.map((row) => {
    const key = row[leftKey];
    const matches = key === null ? [] : index.get(String(key)) ?? [];
    if (matches.length > 1) {
      throw new JoinCardinalityError(relation, String(key), matches.length);
    }
    const match = matches[0];

    const attached: Row = {};
    for (const { source, target } of rightColumns) {
      attached[target] = match ? match[source] ?? null : null;
    }
    return { ...row, ...attached };
  });

  return new Table<L & Row>([...left.columns, ...rightColumns.map((c) => c.target)], rows);
}

// ── Group-by ──

export interface Group<A> {
  key: Cell[];
  value: A;
}

export interface Reducer<R extends Row, A> {
  init: () => A;
  step: (acc: A, row: R) => A;
}

/**
 * Groups rows by the key tuple. Null components form their own group.
 * Groups come back in first-encounter order.
 */
export function groupBy<R extends Row, A>(
  table: Table<R>,
  keys: readonly (keyof R & string)[],
  reducer: Reducer<R, A>
): Group<A>[] {
  const groups = new Map<string, Group<A>>();

  for (const row of table.rows) {
    const key: Cell[] = keys.map((k) => row[k]);
    // JSON keeps null, "null", 1 and "1" apart
    const id = JSON.stringify(key);
    const group = groups.get(id);
    if (group) {
      group.value = reducer.step(group.value, row);
    } else {
      groups.set(id, { key, value: reducer.step(reducer.init(), row) });
    }
  }

  return Array.from(groups.values());
}

/** Ascending; numbers before strings; nulls last. */
export function compareCells(a: Cell, b: Cell): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareKeys(a: readonly Cell[], b: readonly Cell[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = compareCells(a[i], b[i]);
    if (c !== 0) return c;
  }
  return a.length - b.length;
}
