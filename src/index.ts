// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import 'reflect-metadata';
import {container} from 'tsyringe-neo';

import {Flags as flags} from './commands/flags.js';
import {type AdapterLogger} from './core/logging/adapter-logger.js';
import {type Adapter} from './core/adapter.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {FlagSet} from './core/flags/flag-set.js';
import {AdapterError} from './core/errors/adapter-error.js';
import {IllegalArgumentError} from './core/errors/illegal-argument-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {errorMessage} from './core/helpers.js';
import {type ServerConfig} from './core/server/server-config.js';
import {getAdapterVersion} from '../version.js';

/**
 * Parse the command line, build the server configuration and print what was configured
 * @param argv - the process arguments, including the node binary and the script
 * @param context - receives the logger so the entrypoint can log once main returns
 * @throws UserBreak after printing the version or the help text
 */
export async function main(argv: string[], context?: {logger?: AdapterLogger}): Promise<ServerConfig> {
  try {
    Container.getInstance().init();
  } catch (error) {
    console.error(`Error initializing container: ${errorMessage(error)}`, error);
    throw new AdapterError('Error initializing container', error);
  }

  const logger = container.resolve<AdapterLogger>(InjectTokens.AdapterLogger);
  if (context) {
    // save the logger so that adapter.ts can use it once main returns
    context.logger = logger;
  }

  logger.debug('Initializing metrics adapter');
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2])) {
    logger.showUser(chalk.cyan('\n*************************** Metrics Adapter ***************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getAdapterVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  const adapter = container.resolve<Adapter>(InjectTokens.Adapter);
  const flagSet = new FlagSet('metrics-adapter');
  adapter.addFlags(flagSet);
  flagSet.add(flags.devMode, value => logger.setDevMode(value));

  logger.debug('Setting up flags');
  const rootCmd = yargs(hideBin(argv))
    .scriptName('metrics-adapter')
    .usage('Usage:\n  metrics-adapter [options]')
    .alias('h', 'help')
    .version(false)
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new IllegalArgumentError(message);
    });
  flagSet.applyTo(rootCmd);

  const parsed = await rootCmd.parseAsync();
  if (parsed.help === true) {
    throw new UserBreak('displayed help, exiting');
  }

  flagSet.parse(parsed);
  logger.debug(`supplied flags: ${flagSet.describeSupplied(parsed)}`);

  const config = await adapter.config();
  logger.showJSON('Server configuration', config.summary());
  return config;
}
