import { Dialect } from '../abstract.js';

/**
 * MySQL dialect (8.0 or later, for recursive common table expressions).
 * Generated keys are not handed back since there is no RETURNING clause.
 */
export class MySqlDialect extends Dialect {
  readonly name = 'mysql';
  protected readonly identifierQuote = '`';
}
