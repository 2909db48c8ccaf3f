/**
 * `kubegrid config`: Create and check the configuration file.
 */

import chalk from 'chalk';
import { errorMessage, getConfigPath, initConfig, loadConfig } from 'kubegrid-shared';

export function configInitAction(opts: { config?: string }): void {
  try {
    const written = initConfig(opts.config ?? getConfigPath());
    process.stdout.write(`Wrote default config to ${chalk.cyan(written)}\n`);
  } catch (err) {
    process.stderr.write(chalk.red(`${errorMessage(err)}\n`));
    process.exitCode = 1;
  }
}

/** Reports unreadable files, schema errors, bad key strings and duplicate bindings. */
export function configCheckAction(opts: { config?: string }): void {
  const loaded = loadConfig(opts.config);

  process.stdout.write(loaded.fromFile
    ? `Checked ${chalk.cyan(loaded.path)}\n`
    : chalk.gray(`No config loaded from ${loaded.path}; defaults in use\n`));

  for (const warning of loaded.warnings) {
    process.stdout.write(`${chalk.red('error')} ${warning}\n`);
  }

  if (loaded.warnings.length === 0) {
    process.stdout.write(chalk.green('Config OK\n'));
  } else {
    process.exitCode = 1;
  }
}
