#!/usr/bin/env node
import { config } from 'dotenv';
import { runCli } from './app.js';
import { ExitCode } from './errors.js';
import { consoleLogger } from './logger.js';
import { MysqlClientService } from './services/mysql-client.service.js';
import { TerminalPrompter } from './services/prompt.service.js';

// Load environment variables
config();

async function main() {
  const exitCode = await runCli(process.argv.slice(2), {
    cwd: process.cwd(),
    env: process.env,
    createClient: (bin) => new MysqlClientService(bin),
    prompter: new TerminalPrompter(),
    logger: consoleLogger,
  });
  process.exit(exitCode);
}

main().catch((err) => {
  console.error('❌ dbreset failed:', err);
  process.exit(ExitCode.Unexpected);
});
