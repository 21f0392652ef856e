// Maps dialect keys ("sqlite", "postgres", ...) to Dialect instances.

import { Dialect, type DialectName } from './abstract.js';
import { PostgresDialect } from './postgres/index.js';
import { MySqlDialect } from './mysql/index.js';
import { SqliteDialect } from './sqlite/index.js';

export type DialectKey =
  | DialectName
  | (string & {}); // user-registered keys

type DialectFactoryFn = () => Dialect;

const BUILT_IN_DIALECTS: Record<DialectName, DialectFactoryFn> = {
  sqlite: () => new SqliteDialect(),
  postgres: () => new PostgresDialect(),
  mysql: () => new MySqlDialect(),
};

const isBuiltIn = (key: DialectKey): key is DialectName =>
  Object.prototype.hasOwnProperty.call(BUILT_IN_DIALECTS, key);

export class DialectFactory {
  private static overrides = new Map<DialectKey, DialectFactoryFn>();

  /**
   * Registers a dialect under `key`, replacing a built-in of the same name.
   */
  public static register(key: DialectKey, factory: DialectFactoryFn): void {
    this.overrides.set(key, factory);
  }

  /**
   * Creates the dialect registered under `key`.
   */
  public static create(key: DialectKey): Dialect {
    const factory = this.overrides.get(key) ?? (isBuiltIn(key) ? BUILT_IN_DIALECTS[key] : undefined);
    if (!factory) {
      const known = [...new Set<string>([...Object.keys(BUILT_IN_DIALECTS), ...this.overrides.keys()])];
      throw new Error(`Unknown dialect "${key}" (known: ${known.join(', ')})`);
    }
    return factory();
  }

  /**
   * Drops every registration; built-ins stay available.
   */
  public static clear(): void {
    this.overrides.clear();
  }
}

/**
 * Accepts a Dialect instance or a registered key.
 */
export const resolveDialectInput = (dialect: Dialect | DialectKey): Dialect =>
  typeof dialect === 'string' ? DialectFactory.create(dialect) : dialect;
