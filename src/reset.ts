import { applyCliOptions, loadBaseConfig, type CliOptions, type Configuration } from './config/index.js';
import { ExitCode, ResetError } from './errors.js';
import type { Logger } from './logger.js';
import {
  FIXTURE_ROOTS,
  findFixtureDirectories,
  runFixtureBatch,
  type BatchResult,
  type FixtureDirectories,
  type FixtureStage,
} from './services/fixtures.service.js';
import type { ConnectionSettings, MysqlClientService } from './services/mysql-client.service.js';
import type { Prompter } from './services/prompt.service.js';
import { SchemaSelectorService } from './services/schema-selector.service.js';

export interface ResetDependencies {
  cwd: string;
  env: NodeJS.ProcessEnv;
  createClient: (bin: string) => MysqlClientService;
  prompter: Prompter;
  logger: Logger;
}

export interface ResetSummary {
  fixtures: FixtureDirectories;
  deleted?: string;
  batches: BatchResult[];
}

/**
 * As root a failing batch means broken SQL; as anyone else it is usually a missing grant
 */
export function batchFailureHint(user: string, stage: FixtureStage): string {
  if (user === 'root') {
    return `Check the SQL files in ${stage}/ for errors.`;
  }
  return (
    `User '${user}' may lack the privileges the ${stage} scripts need (CREATE, DROP, INSERT, ...). ` +
    'Try again with --user root.'
  );
}

function requireFixtures(cwd: string): FixtureDirectories {
  const fixtures = findFixtureDirectories(cwd);
  if (!fixtures) {
    const looked = FIXTURE_ROOTS.map((root) => (root === '.' ? './create + ./insert' : `./${root}/create + ./${root}/insert`));
    throw new ResetError('No fixture directories found', ExitCode.FixturesMissing, {
      hint: `Looked for: ${looked.join(', ')}`,
    });
  }
  return fixtures;
}

async function requireClient(client: MysqlClientService): Promise<void> {
  const check = await client.isInstalled();
  if (!check.installed) {
    throw new ResetError(`The MySQL client '${client.bin}' is not installed`, ExitCode.ClientMissing, {
      details: check.error,
      hint: 'Install the MySQL client (e.g. apt install mysql-client, brew install mysql-client) or set DBRESET_MYSQL_BIN.',
    });
  }
}

async function resolvePassword(config: Configuration, prompter: Prompter): Promise<string> {
  if (config.password !== undefined) return config.password;
  return prompter.askHidden(`Password for ${config.user}@${config.host}: `);
}

/**
 * Decide which schema, if any, is deleted before the create scripts run
 */
async function chooseSchemaToDelete(
  config: Configuration,
  conn: ConnectionSettings,
  deps: ResetDependencies,
  client: MysqlClientService
): Promise<string | undefined> {
  if (config.deleteBeforeCreate === true) return config.database;
  if (config.deleteBeforeCreate === false) return undefined;

  // Unset: only ask when someone is there to answer
  if (!deps.prompter.interactive) return undefined;

  const wantsDelete = await deps.prompter.confirm('Delete an existing schema before loading fixtures?');
  if (!wantsDelete) return undefined;

  const selector = new SchemaSelectorService(client, deps.prompter, deps.logger);
  const selection = await selector.select(conn);
  switch (selection.status) {
    case 'selected':
      return selection.schema;
    case 'declined':
      throw new ResetError(`Deletion of '${selection.schema}' cancelled`, ExitCode.UserAborted);
    case 'invalid':
      throw new ResetError(selection.reason, ExitCode.InvalidSelection);
    case 'error':
      throw new ResetError('Could not list schemas', ExitCode.Connectivity, { details: selection.error });
  }
}

async function runStage(
  client: MysqlClientService,
  conn: ConnectionSettings,
  dir: string,
  stage: FixtureStage,
  logger: Logger
): Promise<BatchResult> {
  logger.info(`📦 Running ${stage} scripts from ${dir}...`);
  const result = await runFixtureBatch(client, conn, dir, stage);

  if (result.status === 'skipped') {
    logger.warn(`No SQL files in ${dir}, skipped`);
  } else if (result.status === 'failed') {
    throw new ResetError(`Running the ${stage} scripts failed`, ExitCode.BatchFailed, {
      details: result.error,
      hint: batchFailureHint(conn.user, stage),
    });
  } else {
    logger.success(`✅ Ran ${result.files.length} ${stage} file(s)`);
  }
  return result;
}

/**
 * Rebuild the database: check the environment, optionally drop a schema,
 * then run the create scripts and (unless skipped) the insert scripts.
 */
export async function runReset(options: CliOptions, deps: ResetDependencies): Promise<ResetSummary> {
  const { logger } = deps;

  const fixtures = requireFixtures(deps.cwd);
  logger.info(`🔍 Using fixtures in ${fixtures.root}`);

  const config = applyCliOptions(loadBaseConfig(deps.cwd, deps.env, logger.warn), options);

  const client = deps.createClient(config.mysqlBin);
  await requireClient(client);

  const conn: ConnectionSettings = {
    host: config.host,
    port: config.port,
    user: config.user,
    password: await resolvePassword(config, deps.prompter),
  };

  const listed = await client.listSchemas(conn);
  if (!listed.success) {
    throw new ResetError(`Could not connect to MySQL at ${conn.host}:${conn.port} as ${conn.user}`, ExitCode.Connectivity, {
      details: listed.error,
      hint: 'Check the password and that the server is running.',
    });
  }

  const summary: ResetSummary = { fixtures, batches: [] };

  const schema = await chooseSchemaToDelete(config, conn, deps, client);
  if (schema !== undefined) {
    logger.info(`🗑️  Deleting schema ${schema}...`);
    const dropped = await client.dropSchema(conn, schema);
    if (!dropped.success) {
      throw new ResetError(`Deleting schema '${schema}' failed`, ExitCode.BatchFailed, {
        details: dropped.error,
        hint:
          conn.user === 'root'
            ? undefined
            : `User '${conn.user}' may lack the DROP privilege. Try again with --user root.`,
      });
    }
    summary.deleted = schema;
  }

  summary.batches.push(await runStage(client, conn, fixtures.create, 'create', logger));

  if (config.skipInsert) {
    logger.info('Insert scripts skipped (--no-insert)');
  } else {
    summary.batches.push(await runStage(client, conn, fixtures.insert, 'insert', logger));
  }

  logger.success('✅ Database reset complete');
  return summary;
}
