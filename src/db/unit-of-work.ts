import type { Db } from './sqlite.js';

/**
 * Transactional boundary for one booking or cancellation.
 *
 * Work runs inside BEGIN IMMEDIATE, so the write lock is held from the first
 * statement: another connection waits (up to the busy timeout) instead of
 * interleaving. Any throw from the work rolls back every statement it ran.
 * Work must be synchronous; there is no await point inside a unit.
 */
export class UnitOfWork {
  constructor(private readonly db: Db) {}

  run<T>(work: () => T): T {
    return this.db.transaction(work).immediate();
  }
}
