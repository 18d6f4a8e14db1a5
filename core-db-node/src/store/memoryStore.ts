import {
  sameValue,
  type Filter,
  type Row,
  type SelectOptions,
  type SqlValue,
  type StoreTransaction,
  type WorkoutStore,
} from "./store";

type Tables = Map<string, Map<number, Row>>;

function copyTables(tables: Tables): Tables {
  const copy: Tables = new Map();
  for (const [name, rows] of tables) {
    const rowsCopy = new Map<number, Row>();
    for (const [key, row] of rows) rowsCopy.set(key, { ...row });
    copy.set(name, rowsCopy);
  }
  return copy;
}

function compareValues(a: SqlValue, b: SqlValue): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  return left < right ? -1 : left > right ? 1 : 0;
}

class MemoryTransaction implements StoreTransaction {
  constructor(
    private readonly tables: Tables,
    private readonly sequences: Map<string, number>
  ) {}

  private rows(table: string): Map<number, Row> {
    let rows = this.tables.get(table);
    if (!rows) {
      rows = new Map();
      this.tables.set(table, rows);
    }
    return rows;
  }

  private matching(table: string, where?: Filter): [number, Row][] {
    return [...this.rows(table)].filter(
      ([, row]) => !where || sameValue(row[where.column] ?? null, where.value)
    );
  }

  async insert(table: string, key: string, row: Row): Promise<number> {
    // like AUTO_INCREMENT, a key handed out is never handed out again
    const id = (this.sequences.get(table) ?? 0) + 1;
    this.sequences.set(table, id);
    this.rows(table).set(id, { ...row, [key]: id });
    return id;
  }

  async select(
    table: string,
    columns: readonly string[],
    where?: Filter,
    options: SelectOptions = {}
  ): Promise<Row[]> {
    let found = this.matching(table, where).map(([, row]) => row);

    const { orderBy } = options;
    if (orderBy) {
      found = [...found].sort((a, b) =>
        compareValues(a[orderBy] ?? null, b[orderBy] ?? null)
      );
    }
    if (options.limit !== undefined) found = found.slice(0, options.limit);

    return found.map((row) => {
      const picked: Row = {};
      for (const column of columns) {
        const value = row[column] ?? null;
        picked[column] = value instanceof Date ? new Date(value.getTime()) : value;
      }
      return picked;
    });
  }

  async update(table: string, where: Filter, row: Row): Promise<number> {
    const rows = this.rows(table);
    const targets = this.matching(table, where);
    for (const [id, existing] of targets) rows.set(id, { ...existing, ...row });
    return targets.length;
  }

  async remove(table: string, where: Filter): Promise<number> {
    const rows = this.rows(table);
    const targets = this.matching(table, where);
    for (const [id] of targets) rows.delete(id);
    return targets.length;
  }

  async count(table: string, where: Filter): Promise<number> {
    return this.matching(table, where).length;
  }
}

/**
 * In-process store. Transactions run one at a time; a failed transaction
 * restores the tables as they were when it started.
 */
export class MemoryStore implements WorkoutStore {
  private tables: Tables = new Map();
  private readonly sequences = new Map<string, number>();
  private queue: Promise<void> = Promise.resolve();

  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.isolated(work));
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async isolated<T>(
    work: (tx: StoreTransaction) => Promise<T>
  ): Promise<T> {
    const snapshot = copyTables(this.tables);
    try {
      return await work(new MemoryTransaction(this.tables, this.sequences));
    } catch (error) {
      this.tables = snapshot;
      throw error;
    }
  }

  /** Number of rows currently in `table`. */
  size(table: string): number {
    return this.tables.get(table)?.size ?? 0;
  }

  async close(): Promise<void> {
    this.tables.clear();
  }
}
