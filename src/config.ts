export type StoreKind = 'mongo' | 'memory';

export interface Config {
  port: number;
  store: StoreKind;
  mongoUri: string;
  dbName: string;
  transactions: boolean;
}

export class ConfigError extends Error {
  constructor(variable: string, detail: string) {
    super(`Invalid ${variable}: ${detail}`);
    this.name = 'ConfigError';
  }
}

function readPort(value: string | undefined): number {
  if (!value) return 3001;

  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError('PORT', `expected a port number, got "${value}"`);
  }
  return port;
}

function readStore(value: string | undefined): StoreKind {
  if (!value || value === 'mongo') return 'mongo';
  if (value === 'memory') return 'memory';
  throw new ConfigError('EXPENSE_STORE', `expected "mongo" or "memory", got "${value}"`);
}

function readFlag(name: string, value: string | undefined): boolean {
  if (!value) return false;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new ConfigError(name, `expected "true" or "false", got "${value}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    port: readPort(env.PORT),
    store: readStore(env.EXPENSE_STORE),
    mongoUri: env.MONGODB_URI || 'mongodb://localhost:27017',
    dbName: env.DB_NAME || 'expense_tracker',
    transactions: readFlag('MONGODB_TRANSACTIONS', env.MONGODB_TRANSACTIONS)
  };
}
