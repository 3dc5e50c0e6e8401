import type { SortboxDb } from '../db.js';
import { getRawDb } from '../db.js';
import type { ChangeNotifier } from './change-notifier.js';
import { ListenerError } from './change-notifier.js';

/**
 * Transaction state shared by every store on one database connection.
 *
 * Nested `run` calls become savepoints of the outermost transaction. While a
 * transaction is open, store notifications are queued; each notifier fires
 * once, in the order it first changed, after the outermost COMMIT. A
 * rollback discards the notifications queued since its BEGIN or SAVEPOINT.
 */
export class TransactionScope {
  private depth = 0;
  private pending: ChangeNotifier[] = [];

  constructor(private readonly db: SortboxDb) {}

  run<T>(fn: () => T): T {
    const raw = getRawDb(this.db);
    const savepoint = `sp_${this.depth}`;
    const queued = this.pending.length;

    raw.exec(this.depth === 0 ? 'BEGIN' : `SAVEPOINT ${savepoint}`);
    this.depth++;

    let result: T;
    try {
      result = fn();
    } catch (err: unknown) {
      this.depth--;
      raw.exec(this.depth === 0 ? 'ROLLBACK' : `ROLLBACK TO ${savepoint}; RELEASE ${savepoint}`);
      this.pending.length = queued;
      throw err;
    }

    this.depth--;
    if (this.depth > 0) {
      raw.exec(`RELEASE ${savepoint}`);
      return result;
    }

    raw.exec('COMMIT');
    this.flush();
    return result;
  }

  /** Notify now, or after the outermost commit when a transaction is open */
  changed(notifier: ChangeNotifier): void {
    if (this.depth === 0) {
      notifier.notify();
      return;
    }
    if (!this.pending.includes(notifier)) this.pending.push(notifier);
  }

  private flush(): void {
    const notifiers = this.pending;
    this.pending = [];

    const errors: unknown[] = [];
    for (const notifier of notifiers) errors.push(...notifier.deliver());
    if (errors.length > 0) throw new ListenerError(errors);
  }
}

const scopes = new WeakMap<SortboxDb, TransactionScope>();

/** The scope shared by all stores opened on `db` */
export function scopeFor(db: SortboxDb): TransactionScope {
  let scope = scopes.get(db);
  if (!scope) {
    scope = new TransactionScope(db);
    scopes.set(db, scope);
  }
  return scope;
}
