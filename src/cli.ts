#!/usr/bin/env node
import { Command } from 'commander';
import { Client } from 'pg';
import { loadConfigFile, resolveConfig, type ConfigFile } from './config.js';
import { formatDiagnostic } from './diagnostics.js';
import { runSeeder } from './index.js';
import type { Config } from './types.js';
import { parseList, resolveConfigPath, configFileExists } from './utils.js';

const program = new Command();

program
  .name('fkseed')
  .description('Fill a PostgreSQL database with fake rows that respect its constraints')
  .option('-c, --config <path>', 'Path to fkseed.config.json')
  .option('--schemas <schemas>', 'Comma-separated list of schemas to seed (default: public)')
  .option('--rows <number>', 'Rows per table (default: random between 10 and 1000)')
  .option('--seed <number>', 'Seed for deterministic randomness (default: 1337)')
  .option('--include <tables>', 'Comma-separated list of tables to include')
  .option('--exclude <tables>', 'Comma-separated list of tables to exclude')
  .option('--dry-run', 'Generate rows and roll back instead of committing')
  .option('--connection <connectionString>', 'Postgres connection string')
  .parse(process.argv);

type CliOptions = {
  config?: string;
  schemas?: string;
  rows?: string;
  seed?: string;
  include?: string;
  exclude?: string;
  dryRun?: boolean;
  connection?: string;
};

const options = program.opts<CliOptions>();

function loadConfig(): Config {
  const configPath = resolveConfigPath(options.config);
  if (options.config && !configFileExists(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  const fileConfig: ConfigFile = configFileExists(configPath) ? loadConfigFile(configPath) : {};

  const schemas = parseList(options.schemas);
  const rows = parseInteger(options.rows, '--rows');
  const seed = parseInteger(options.seed, '--seed');
  const includeTables = parseList(options.include);
  const excludeTables = parseList(options.exclude);
  const cliConfig: ConfigFile = {
    ...(schemas ? { schemas } : {}),
    ...(rows !== undefined ? { rows } : {}),
    ...(seed !== undefined ? { seed } : {}),
    ...(includeTables ? { includeTables } : {}),
    ...(excludeTables ? { excludeTables } : {}),
    ...(options.dryRun ? { dryRun: true } : {}),
    ...(options.connection ? { connectionString: options.connection } : {})
  };

  return resolveConfig(fileConfig, cliConfig);
}

function parseInteger(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid ${flag} value: ${value}`);
  }
  return parsed;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const connectionString =
    config.connectionString ??
    process.env.DATABASE_URL ??
    process.env.PG_CONNECTION_STRING;

  const client = new Client(
    connectionString
      ? { connectionString }
      : {
          host: config.connection?.host,
          port: config.connection?.port,
          user: config.connection?.user,
          password: config.connection?.password,
          database: config.connection?.database
        }
  );

  await client.connect();
  try {
    await client.query('BEGIN');
    const { summary, diagnostics } = await runSeeder(client, config);
    if (config.dryRun) {
      await client.query('ROLLBACK');
    } else {
      await client.query('COMMIT');
    }

    console.log('\nSeed summary');
    for (const row of summary) {
      const note = config.dryRun ? ' (dry-run)' : '';
      console.log(`- ${row.table}: ${row.generated} rows${note}`);
    }
    if (diagnostics.length) {
      console.log(`\n${diagnostics.length} diagnostics`);
      for (const diagnostic of diagnostics) {
        console.log(`- ${formatDiagnostic(diagnostic)}`);
      }
    }
  } catch (error) {
    await enrichAndLogError(error, client);
    await client.query('ROLLBACK');
    process.exitCode = 1;
  } finally {
    await client.end();
  }
}

type PgError = { code?: unknown; constraint?: unknown; message?: unknown };

function isPgError(error: unknown): error is PgError {
  return typeof error === 'object' && error !== null;
}

async function enrichAndLogError(error: unknown, client: Client): Promise<void> {
  if (isPgError(error) && error.code === '23505' && typeof error.constraint === 'string') {
    try {
      const result = await client.query<{ table_name: string }>(
        `select conrelid::regclass::text as table_name
         from pg_constraint
         where conname = $1`,
        [error.constraint]
      );
      const table = result.rows[0]?.table_name;
      if (table) {
        console.error(`Unique constraint violation on ${table} (${error.constraint}).`);
        return;
      }
    } catch (lookupError) {
      console.error('Could not resolve constraint owner:', lookupError);
    }
  }

  console.error(error instanceof Error ? error.message : error);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
