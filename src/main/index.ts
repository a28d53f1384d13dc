import { createInterface } from 'node:readline/promises';
import { parseArgs } from 'node:util';
import { configureLogging, getLogger } from './logger';
import { getBatchRenameConfig, getLoggingConfig, getStore } from './services/store';
import { runInteractive } from './cli-handlers';
import type { CliSession } from './cli-handlers';
import { BatchRenameWizard } from './wizard';

const logger = getLogger('main');

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      'config-dir': { type: 'string' },
    },
  });

  const store = getStore({ cwd: values['config-dir'] ?? process.env['BATCH_RENAMER_CONFIG_DIR'] });
  configureLogging(getLoggingConfig(store));

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const print = (message: string): void => {
    process.stdout.write(`${message}\n`);
  };

  const wizard = new BatchRenameWizard({
    config: getBatchRenameConfig(store),
    onProgress: print,
    onConfirm: async (message) => /^y(es)?$/i.test((await rl.question(`${message} (y/N) `)).trim()),
    onInputRequired: (prompt) => rl.question(`${prompt}: `),
  });

  const session: CliSession = { wizard, print, composer: null };
  logger.info(`Config file: ${store.path}`);
  await runInteractive(rl, session);
}

main().catch((error: unknown) => {
  logger.error(error);
  process.exitCode = 1;
});
