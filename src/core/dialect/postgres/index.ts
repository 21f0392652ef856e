import { Dialect } from '../abstract.js';

/**
 * PostgreSQL dialect: numbered `$n` placeholders.
 */
export class PostgresDialect extends Dialect {
  readonly name = 'postgres';
  protected readonly identifierQuote = '"';

  protected formatPlaceholder(index: number): string {
    return `$${index}`;
  }

  supportsReturning(): boolean {
    return true;
  }
}
