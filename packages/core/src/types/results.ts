export type EntityKind = 'section' | 'task';

export type Result<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'not-found'; readonly entity: EntityKind; readonly id: string };

export type NotFound = Extract<Result<unknown>, { type: 'not-found' }>;

export function success<T>(data: T): Result<T> {
  return { type: 'success', data };
}

export function notFound(entity: EntityKind, id: string): Result<never> {
  return { type: 'not-found', entity, id };
}

export function describeNotFound(r: NotFound): string {
  return `Could not find ${r.entity} with id ${r.id}`;
}

export class NotFoundError extends Error {
  readonly entity: EntityKind;
  readonly id: string;

  constructor(r: NotFound) {
    super(describeNotFound(r));
    this.name = 'NotFoundError';
    this.entity = r.entity;
    this.id = r.id;
  }
}

/** Return the data of a successful result, throw NotFoundError otherwise */
export function unwrap<T>(r: Result<T>): T {
  if (r.type === 'not-found') throw new NotFoundError(r);
  return r.data;
}
