import { Dialect } from '../abstract.js';

/**
 * SQLite dialect. RETURNING needs SQLite 3.35 or later.
 */
export class SqliteDialect extends Dialect {
  readonly name = 'sqlite';
  protected readonly identifierQuote = '"';

  supportsReturning(): boolean {
    return true;
  }
}
