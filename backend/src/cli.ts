#!/usr/bin/env node
import 'dotenv/config';
import { buildProgram, hasInputSelection, resolveRequest, type CliOptions } from './cli-options.js';
import { loadConfig } from './config.js';
import { ImportError } from './errors.js';
import { createLogger } from './logger.js';
import { runImportWithDatabase } from './services/import-runner.js';
import { consoleReporter } from './services/reporter.js';

async function main(argv: string[]): Promise<void> {
  const program = buildProgram();
  program.parse(argv);

  const options = program.opts<CliOptions>();
  if (!hasInputSelection(options)) {
    program.outputHelp();
    return;
  }

  const config = loadConfig();
  const request = resolveRequest(options, config.dataDir);
  if (!request) {
    program.outputHelp();
    return;
  }

  const logger = createLogger(config.logLevel);
  try {
    await runImportWithDatabase(config.database, request, { reporter: consoleReporter, logger });
  } catch (error) {
    if (error instanceof ImportError) {
      logger.fatal({ code: error.code, details: error.details }, error.message);
    } else {
      logger.fatal({ err: error }, 'import failed');
    }
    process.exitCode = 1;
  }
}

main(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
