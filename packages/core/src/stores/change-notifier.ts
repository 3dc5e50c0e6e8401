export type ChangeListener = () => void;

/** Receives an error thrown by a change listener; the remaining listeners still run */
export type ListenerErrorHandler = (error: unknown) => void;

/**
 * Error thrown after a notification when listeners failed and no
 * ListenerErrorHandler was given. The change itself has already been stored.
 */
export class ListenerError extends AggregateError {
  constructor(errors: readonly unknown[]) {
    super(errors, `${errors.length} change listener(s) failed`);
    this.name = 'ListenerError';
  }
}

/**
 * Subscriber list for "state changed" signals. Carries no payload:
 * listeners re-read the store they subscribed to.
 */
export class ChangeNotifier {
  private readonly listeners: ChangeListener[] = [];

  constructor(private readonly onListenerError?: ListenerErrorHandler) {}

  subscribe(listener: ChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  get listenerCount(): number {
    return this.listeners.length;
  }

  /** Call every listener, then throw a ListenerError if any failed and nothing handled it */
  notify(): void {
    const errors = this.deliver();
    if (errors.length > 0) throw new ListenerError(errors);
  }

  /**
   * Call every listener, even after one throws. Errors go to the handler when
   * there is one, and are returned otherwise.
   */
  deliver(): unknown[] {
    const errors: unknown[] = [];
    // Copy: a listener may unsubscribe while we iterate
    for (const cb of [...this.listeners]) {
      try {
        cb();
      } catch (err: unknown) {
        if (this.onListenerError) this.onListenerError(err);
        else errors.push(err);
      }
    }
    return errors;
  }
}
