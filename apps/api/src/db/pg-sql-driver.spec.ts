import type { Submittable } from 'pg';
import {
  ExecutionTimeoutError,
  InternalError,
  SqlPermissionError,
  SqlSyntaxError,
  UnsafeStatementError,
} from '../common/errors';
import {
  type ConnectionSource,
  type DriverClient,
  PgSqlDriver,
  type RowCursor,
  classifyDatabaseError,
} from './pg-sql-driver';

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifyDatabaseError', () => {
  it.each([
    ['42601', SqlSyntaxError],
    ['42P01', SqlSyntaxError],
    ['42501', SqlPermissionError],
    ['57014', ExecutionTimeoutError],
    ['25006', UnsafeStatementError],
    ['08006', ExecutionTimeoutError],
    ['57P01', ExecutionTimeoutError],
    ['ECONNREFUSED', ExecutionTimeoutError],
  ])('maps code %s', (code, expected) => {
    expect(classifyDatabaseError(pgError('boom', code))).toBeInstanceOf(expected);
  });

  it('keeps the database message for rejected statements', () => {
    const err = classifyDatabaseError(pgError('relation "userz" does not exist', '42P01'));

    expect(err.kind).toBe('SyntaxError');
    expect(err.message).toBe('relation "userz" does not exist');
  });

  it('reports an unreachable host as a timeout naming the errno', () => {
    const err = classifyDatabaseError(pgError('connect ECONNREFUSED 127.0.0.1:1', 'ECONNREFUSED'));

    expect(err.kind).toBe('TimeoutError');
    expect(err.message).toBe('Database unreachable (ECONNREFUSED).');
  });

  it('treats a pool connect timeout as an execution timeout', () => {
    const err = classifyDatabaseError(new Error('timeout exceeded when trying to connect'));

    expect(err).toBeInstanceOf(ExecutionTimeoutError);
    expect(err.message).toBe('Timed out connecting to the database.');
  });

  it('wraps anything else as an internal error', () => {
    expect(classifyDatabaseError(new Error('unexpected'))).toBeInstanceOf(InternalError);
    expect(classifyDatabaseError('unexpected')).toBeInstanceOf(InternalError);
  });
});

type Outcome = { fields: string[]; rows: Record<string, unknown>[] } | Error;

class StubCursor implements RowCursor {
  requested?: number;
  closed = false;

  constructor(
    readonly text: string,
    private readonly outcome: Outcome,
  ) {}

  submit(): void {}

  read(
    maxRows: number,
    callback: (
      err: Error | undefined,
      rows: Record<string, unknown>[],
      result: { fields: Array<{ name: string }> },
    ) => void,
  ): void {
    this.requested = maxRows;
    if (this.outcome instanceof Error) {
      callback(this.outcome, [], { fields: [] });
      return;
    }
    const fields = this.outcome.fields.map((name) => ({ name }));
    callback(undefined, this.outcome.rows.slice(0, maxRows), { fields });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class StubClient implements DriverClient {
  readonly statements: string[] = [];
  released?: boolean;

  constructor(private readonly failOn: (text: string) => Error | undefined = () => undefined) {}

  query(text: string): Promise<unknown>;
  query<T extends Submittable>(submittable: T): T;
  query(arg: string | Submittable): Promise<unknown> | Submittable {
    if (typeof arg !== 'string') return arg;
    this.statements.push(arg);
    const failure = this.failOn(arg);
    return failure ? Promise.reject(failure) : Promise.resolve({});
  }

  release(destroy?: boolean): void {
    this.released = destroy ?? false;
  }
}

function driverFor(client: StubClient, outcome: Outcome): { driver: PgSqlDriver; cursors: StubCursor[] } {
  const cursors: StubCursor[] = [];
  const pool: ConnectionSource = { connect: async () => client };
  const driver = new PgSqlDriver(pool, (text) => {
    const cursor = new StubCursor(text, outcome);
    cursors.push(cursor);
    return cursor;
  });
  return { driver, cursors };
}

describe('PgSqlDriver', () => {
  const products = {
    fields: ['name'],
    rows: [{ name: 'Trail Runner 2' }, { name: 'Court Classic' }, { name: 'Harbor Slide' }],
  };

  it('runs the statement read-only with a local statement timeout', async () => {
    const client = new StubClient();
    const { driver, cursors } = driverFor(client, products);

    const result = await driver.execute('SELECT name FROM products', {
      timeoutMs: 1500,
      readOnly: true,
      maxRows: 10,
    });

    expect(client.statements).toEqual(['BEGIN READ ONLY', 'SET LOCAL statement_timeout = 1500', 'COMMIT']);
    expect(cursors.map((c) => c.text)).toEqual(['SELECT name FROM products']);
    expect(result).toEqual({ columns: ['name'], rows: products.rows, truncated: false });
    expect(client.released).toBe(false);
  });

  it('opens a read-write transaction when mutations are allowed', async () => {
    const client = new StubClient();
    const { driver } = driverFor(client, { fields: [], rows: [] });

    await driver.execute('DELETE FROM stores', { timeoutMs: 1000, readOnly: false, maxRows: 10 });

    expect(client.statements[0]).toBe('BEGIN READ WRITE');
  });

  it('fetches one row past the cap and reports the cut', async () => {
    const client = new StubClient();
    const { driver, cursors } = driverFor(client, products);

    const result = await driver.execute('SELECT name FROM products', {
      timeoutMs: 1000,
      readOnly: true,
      maxRows: 2,
    });

    expect(cursors[0].requested).toBe(3);
    expect(cursors[0].closed).toBe(true);
    expect(result.rows).toEqual([{ name: 'Trail Runner 2' }, { name: 'Court Classic' }]);
    expect(result.truncated).toBe(true);
  });

  it('takes column names from the first row when no fields are described', async () => {
    const client = new StubClient();
    const { driver } = driverFor(client, { fields: [], rows: [{ state: 'NY', total: 3 }] });

    const result = await driver.execute('SELECT state, total FROM totals', {
      timeoutMs: 1000,
      readOnly: true,
      maxRows: 10,
    });

    expect(result.columns).toEqual(['state', 'total']);
  });

  it('rolls back and classifies a failing statement', async () => {
    const client = new StubClient();
    const { driver } = driverFor(client, pgError('syntax error at or near "SELEC"', '42601'));

    await expect(
      driver.execute('SELEC 1', { timeoutMs: 1000, readOnly: true, maxRows: 10 }),
    ).rejects.toBeInstanceOf(SqlSyntaxError);
    expect(client.statements).toEqual(['BEGIN READ ONLY', 'SET LOCAL statement_timeout = 1000', 'ROLLBACK']);
    expect(client.released).toBe(false);
  });

  it('discards the connection when the rollback fails too', async () => {
    const client = new StubClient((text) => (text === 'ROLLBACK' ? new Error('connection lost') : undefined));
    const { driver } = driverFor(client, pgError('canceling statement due to statement timeout', '57014'));

    await expect(
      driver.execute('SELECT pg_catalog.now()', { timeoutMs: 1000, readOnly: true, maxRows: 10 }),
    ).rejects.toBeInstanceOf(ExecutionTimeoutError);
    expect(client.released).toBe(true);
  });

  it('fails with TimeoutError when the database refuses connections', async () => {
    const pool: ConnectionSource = {
      connect: async () => {
        throw pgError('connect ECONNREFUSED 127.0.0.1:1', 'ECONNREFUSED');
      },
    };
    const driver = new PgSqlDriver(pool);

    const failure = driver.execute('SELECT 1', { timeoutMs: 500, readOnly: true, maxRows: 10 });

    await expect(failure).rejects.toBeInstanceOf(ExecutionTimeoutError);
    await expect(failure).rejects.toThrow('Database unreachable (ECONNREFUSED).');
  });
});
