/**
 * Outcome of an insert-or-fetch guarded by a storage-level unique constraint.
 */
export type UpsertResult<T> =
  | { outcome: 'created'; value: T }
  | { outcome: 'existing'; value: T };
