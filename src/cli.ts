#!/usr/bin/env node
import { createBacktranslateCommand } from './commands/backtranslate';
import { processIO, type Command, type CommandIO } from './commands/io';
import { createMemoryCommand } from './commands/memory';
import { createModelsCommand } from './commands/models';
import { createTranslateCommand } from './commands/translate';
import { createTranslationRuntime, type RuntimeDependencies } from './container';
import { describeError } from './i18n/localize';
import type { ConfigurationOverrides } from './types/config';
import { getServiceConfiguration } from './utils/config';
import { ServiceLogger } from './utils/logger';

const USAGE = `Usage: roundtrip <command> [options]

Commands:
  translate [--source en] [--target ja] [--text TEXT | TEXT...]
  backtranslate [--source en] [--intermediate ja] [--json] [--text TEXT | TEXT...]
  models <status|verify|install|remove>
  memory <stats|clear>

Environment: TF_PROVIDER, TF_APP_HOME, TF_LOG_LEVEL, TF_LOCAL_URL, TF_LOCAL_AUTOSTART,
TF_LOCAL_TIMEOUT_SECONDS, TF_LOCAL_MODEL_DIR`;

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  io?: CommandIO;
  logger?: ServiceLogger;
  overrides?: ConfigurationOverrides;
  dependencies?: RuntimeDependencies;
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? processIO;
  const [name, ...args] = argv;

  if (!name || name === '--help' || name === '-h') {
    io.out(USAGE);
    return name ? 0 : 1;
  }

  const configuration = getServiceConfiguration(options.env ?? process.env, options.overrides);
  if (configuration.isFailure()) {
    io.err(describeError(configuration.error));
    return 2;
  }

  const config = configuration.value;
  const logger = options.logger ?? ServiceLogger.create({ level: config.logLevel });
  const runtime = await createTranslationRuntime(config, logger, options.dependencies);

  const commands: Record<string, Command> = {
    translate: createTranslateCommand(runtime.service, io, logger),
    backtranslate: createBacktranslateCommand(runtime.service, io, logger),
    models: createModelsCommand(runtime.localClient, io, logger),
    memory: createMemoryCommand(runtime.service, io, logger),
  };

  try {
    const command = commands[name];
    if (!command) {
      io.err(`Unknown command: ${name}\n${USAGE}`);
      return 2;
    }
    return await command(args);
  } finally {
    await runtime.dispose();
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    },
  );
}
