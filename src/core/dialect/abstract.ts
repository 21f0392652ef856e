/**
 * Supported dialect names
 */
export type DialectName = 'sqlite' | 'postgres' | 'mysql';

/**
 * A SQL statement ready for a DbExecutor.
 */
export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

/**
 * Tracks bound parameters while a statement is being written.
 */
export interface CompilerContext {
  params: unknown[];
  addParameter(value: unknown): string;
}

/**
 * Base class for the SQL dialects the tree store writes for.
 * Statements are assembled by hand, so a dialect only has to answer how
 * identifiers are quoted, how parameters are written and which optional
 * clauses the engine understands.
 */
export abstract class Dialect {
  /** Dialect identifier */
  abstract readonly name: DialectName;

  /** Character wrapping identifiers; doubled when it occurs inside one */
  protected abstract readonly identifierQuote: string;

  quoteIdentifier(id: string): string {
    const quote = this.identifierQuote;
    return `${quote}${id.split(quote).join(quote + quote)}${quote}`;
  }

  /**
   * Whether INSERT ... RETURNING * hands back the stored row.
   */
  supportsReturning(): boolean {
    return false;
  }

  /**
   * Keyword opening a recursive common table expression.
   */
  recursiveWith(): string {
    return 'WITH RECURSIVE';
  }

  createCompilerContext(): CompilerContext {
    const params: unknown[] = [];
    return {
      params,
      addParameter: (value: unknown) => {
        params.push(value);
        return this.formatPlaceholder(params.length);
      }
    };
  }

  /**
   * Formats the placeholder of the parameter at 1-based `_index`.
   */
  protected formatPlaceholder(_index: number): string {
    void _index;
    return '?';
  }
}
