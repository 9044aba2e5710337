import type { TemplateFormat } from '@stackweaver/stack-lib';
import { ToolkitError } from '@stackweaver/stack-lib';
import yargs from 'yargs';

export const COMMANDS = ['synth', 'deploy', 'diff', 'destroy'] as const;

export type Command = typeof COMMANDS[number];

export interface CommandLineArguments {
  readonly command: Command;
  readonly app?: string;
  readonly assembly?: string;
  readonly output?: string;
  readonly stackName?: string;
  readonly profile?: string;
  readonly region?: string;

  /**
   * Number of `--verbose` flags given
   */
  readonly verbose: number;

  /**
   * synth only
   */
  readonly format?: TemplateFormat;

  /**
   * deploy only
   */
  readonly concurrency?: number;

  /**
   * destroy only
   */
  readonly force: boolean;
}

export async function parseCommandLineArguments(args: string[]): Promise<CommandLineArguments> {
  const argv = await yargs(args)
    .scriptName('stackweaver')
    .usage('Usage: stackweaver -a <app-command> COMMAND')
    .option('app', {
      type: 'string',
      alias: 'a',
      desc: 'Command that writes the assembly into $STACKWEAVER_OUTDIR, or the directory of an assembly',
      requiresArg: true,
    })
    .option('assembly', {
      type: 'string',
      desc: 'Directory of an assembly that was synthesized before',
      requiresArg: true,
      conflicts: 'app',
    })
    .option('output', {
      type: 'string',
      alias: 'o',
      desc: 'Where the app writes its assembly (default: stackweaver.out)',
      requiresArg: true,
    })
    .option('stack-name', {
      type: 'string',
      alias: 's',
      desc: 'Name of the CloudFormation stack',
      requiresArg: true,
    })
    .option('profile', {
      type: 'string',
      desc: 'Use the indicated AWS profile',
      requiresArg: true,
    })
    .option('region', {
      type: 'string',
      desc: 'The AWS region of the stack',
      requiresArg: true,
    })
    .option('verbose', {
      type: 'count',
      alias: 'v',
      desc: 'Show debug logs (specify multiple times to increase verbosity)',
    })
    .command('synth', 'Renders the template of the app', y => y
      .option('format', {
        choices: ['json', 'yaml'],
        desc: 'How to render the template',
        default: 'json',
      }))
    .command('deploy', 'Publishes the assets of the app and deploys its stack', y => y
      .option('concurrency', {
        type: 'number',
        desc: 'Maximum number of simultaneous asset uploads',
        requiresArg: true,
      }))
    .command('diff', 'Compares the app with the deployed stack')
    .command('destroy', 'Deletes the stack', y => y
      .option('force', {
        type: 'boolean',
        alias: 'f',
        desc: 'Do not ask for confirmation before deleting the stack',
        default: false,
      }))
    .demandCommand(1, 'Specify a command: synth, deploy, diff or destroy')
    .strict()
    .help()
    .alias('h', 'help')
    .fail((msg, err) => {
      throw err ?? new ToolkitError(msg, 'toolkit', undefined, 'user');
    })
    .parseAsync();

  const command = argv._[0];
  if (!isCommand(command)) {
    throw new ToolkitError(`Unknown command: ${command}`, 'toolkit', undefined, 'user');
  }

  return {
    command,
    app: argv.app,
    assembly: argv.assembly,
    output: argv.output,
    stackName: argv['stack-name'],
    profile: argv.profile,
    region: argv.region,
    verbose: argv.verbose,
    format: argv.format === 'yaml' || argv.format === 'json' ? argv.format : undefined,
    concurrency: typeof argv.concurrency === 'number' ? argv.concurrency : undefined,
    force: argv.force === true,
  };
}

function isCommand(x: unknown): x is Command {
  return COMMANDS.some(c => c === x);
}
