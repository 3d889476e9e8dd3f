import type { DatabaseConfig, DatabaseDialect } from './ingest/db';

export type AppConfig = {
  port: number;
  maxUploadBytes: number; // per file
  maxFiles: number; // per request
  delimiter?: string;
  database?: DatabaseConfig;
};

const DIALECTS: readonly string[] = ['mysql', 'postgres', 'sqlite'];

const isDialect = (value: string): value is DatabaseDialect => DIALECTS.includes(value);

const positiveNumber = (raw: string | undefined, fallback: number) => {
  const value = Number(raw);
  return raw && Number.isFinite(value) && value > 0 ? value : fallback;
};

const loadDatabase = (env: NodeJS.ProcessEnv): DatabaseConfig | undefined => {
  const dialect = env.DB_DIALECT?.toLowerCase();
  const connectionString = env.DB_URL;
  const query = env.DB_QUERY || (env.DB_TABLE ? `SELECT * FROM ${env.DB_TABLE}` : '');
  if (!dialect || !connectionString || !query) return undefined;
  if (!isDialect(dialect)) throw new Error(`Unsupported DB_DIALECT "${dialect}" (expected mysql, postgres or sqlite)`);
  return { dialect, connectionString, query };
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: positiveNumber(env.PORT, 8080),
  maxUploadBytes: positiveNumber(env.MAX_UPLOAD_MB, 25) * 1024 * 1024,
  maxFiles: Math.max(1, Math.floor(positiveNumber(env.MAX_UPLOAD_FILES, 10))),
  delimiter: env.CSV_DELIMITER === '\\t' ? '\t' : env.CSV_DELIMITER || undefined,
  database: loadDatabase(env)
});
