import { ToolkitError } from '@stackweaver/stack-lib';
import type { IIoHost, IoMessageLevel, IStackAssemblySource, PollingOptions, ToolkitClients } from '@stackweaver/toolkit-lib';
import { formatErrorMessage, Toolkit } from '@stackweaver/toolkit-lib';
import chalk from 'chalk';
import * as fs from 'fs-extra';
import { CliIoHost } from './io-host/cli-io-host';
import { CLI_PRIVATE_IO } from './io-host/messages';
import type { CommandLineArguments } from './parse-command-line-arguments';
import { parseCommandLineArguments } from './parse-command-line-arguments';
import type { ConfigurationProps } from './user-configuration';
import { Configuration, Settings } from './user-configuration';
import { IoHelper } from '../api-private';

export interface ExecOptions extends Omit<ConfigurationProps, 'commandLineArguments'> {
  /**
   * @default - a CliIoHost at the level given by `--verbose`
   */
  readonly ioHost?: IIoHost;

  /**
   * @default - AWS SDK clients for the configured region and profile
   */
  readonly clients?: Partial<ToolkitClients>;
}

/**
 * Run the command line and report a failure as a red message
 *
 * @returns the exit code
 */
export async function cli(args: string[] = process.argv.slice(2)): Promise<number> {
  try {
    await exec(args);
    return 0;
  } catch (e) {
    process.stderr.write(`${chalk.red(formatErrorMessage(e))}\n`);
    return 1;
  }
}

/**
 * Run one command
 */
export async function exec(args: string[], options: ExecOptions = {}): Promise<void> {
  const argv = await parseCommandLineArguments(args);
  const ioHost = options.ioHost ?? new CliIoHost({ logLevel: logLevelFromVerbosity(argv.verbose) });
  const ioHelper = IoHelper.fromIoHost(ioHost, argv.command);

  const configuration = await new Configuration({
    ...options,
    commandLineArguments: Settings.fromCommandLineArguments(argv),
  }).load(ioHelper);
  const settings = configuration.settings;

  const toolkit = new Toolkit({
    ioHost,
    sdkConfig: {
      region: settings.getString('region'),
      profile: settings.getString('profile'),
    },
    clients: options.clients,
  });

  const startTime = Date.now();
  try {
    await runCommand(toolkit, argv, settings);
    await ioHelper.notify(CLI_PRIVATE_IO.SW_CLI_I2000.msg(`${argv.command} finished`, {
      duration: Date.now() - startTime,
      success: true,
    }));
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e));
    await ioHelper.notify(CLI_PRIVATE_IO.SW_CLI_I2000.msg(`${argv.command} failed`, {
      duration: Date.now() - startTime,
      success: false,
      error,
    }));
    throw e;
  }
}

async function runCommand(toolkit: Toolkit, argv: CommandLineArguments, settings: Settings): Promise<void> {
  switch (argv.command) {
    case 'synth':
      await toolkit.synth(await assemblySource(toolkit, argv, settings), { format: argv.format });
      return;

    case 'deploy': {
      const deployOptions = {
        stackName: requireStackName(settings),
        concurrency: settings.getPositiveInteger('assetParallelism'),
        polling: pollingOptions(settings),
      };
      await toolkit.deploy(await assemblySource(toolkit, argv, settings), deployOptions);
      return;
    }

    case 'diff':
      await toolkit.diff(await assemblySource(toolkit, argv, settings), {
        stackName: requireStackName(settings),
      });
      return;

    case 'destroy':
      await toolkit.destroy({
        stackName: requireStackName(settings),
        force: argv.force,
        polling: pollingOptions(settings),
      });
      return;
  }
}

/**
 * `--assembly`, or an `app` that names a directory, reads an assembly that exists already.
 * Any other `app` is a command to execute.
 */
async function assemblySource(toolkit: Toolkit, argv: CommandLineArguments, settings: Settings): Promise<IStackAssemblySource> {
  if (argv.assembly) {
    return toolkit.fromAssemblyDirectory(argv.assembly);
  }

  const app = settings.getString('app');
  if (!app) {
    throw new ToolkitError(`--app is required either in command-line, in stackweaver.json or in ~/.stackweaver.json`, 'toolkit', undefined, 'user');
  }

  if (await isDirectory(app)) {
    return toolkit.fromAssemblyDirectory(app);
  }
  return toolkit.fromApp(app, { outdir: settings.getString('output') });
}

function requireStackName(settings: Settings): string {
  const stackName = settings.getString('stackName');
  if (!stackName) {
    throw new ToolkitError(`--stack-name is required either in command-line, in stackweaver.json or in ~/.stackweaver.json`, 'toolkit', undefined, 'user');
  }
  return stackName;
}

function pollingOptions(settings: Settings): PollingOptions {
  const pollIntervalSeconds = settings.getPositiveNumber('pollIntervalSeconds');
  return {
    pollIntervalMs: pollIntervalSeconds === undefined ? undefined : pollIntervalSeconds * 1000,
    maxPolls: settings.getPositiveInteger('maxPolls'),
  };
}

export function logLevelFromVerbosity(verbosity: number): IoMessageLevel {
  switch (verbosity) {
    case 0:
      return 'info';
    case 1:
      return 'debug';
    default:
      return 'trace';
  }
}

async function isDirectory(p: string): Promise<boolean> {
  return await fs.pathExists(p) && (await fs.stat(p)).isDirectory();
}
