import type { SortboxDb } from '../db.js';
import { ChangeNotifier } from './change-notifier.js';
import type { ChangeListener, ListenerErrorHandler } from './change-notifier.js';
import { scopeFor } from './transaction-scope.js';
import type { TransactionScope } from './transaction-scope.js';

export interface StoreOptions {
  /**
   * Called with each error a change listener throws. Without it, the
   * mutating call throws a ListenerError after every listener has run.
   */
  onListenerError?: ListenerErrorHandler;
}

/** Shared plumbing for stores: a database handle and a subscriber list. */
export abstract class Store {
  private readonly notifier: ChangeNotifier;
  private readonly scope: TransactionScope;

  protected constructor(protected readonly db: SortboxDb, options: StoreOptions = {}) {
    this.notifier = new ChangeNotifier(options.onListenerError);
    this.scope = scopeFor(db);
  }

  /** Register a listener called after every successful mutation. Returns an unsubscribe function. */
  subscribe(listener: ChangeListener): () => void {
    return this.notifier.subscribe(listener);
  }

  /**
   * Run `fn` as one transaction. Listeners of every store on this database
   * are notified once each after the outermost transaction commits, and not
   * at all if it rolls back. Batches nest, across stores too.
   */
  batch<T>(fn: () => T): T {
    return this.scope.run(fn);
  }

  protected changed(): void {
    this.scope.changed(this.notifier);
  }
}
