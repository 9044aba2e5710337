import { ToolkitError } from '@stackweaver/stack-lib';
import type { IIoHost, IoMessage, IoMessageLevel, IoRequest } from '@stackweaver/toolkit-lib';
import { isCI, isMessageRelevantForLevel, styleForLevel } from '@stackweaver/toolkit-lib';
import chalk from 'chalk';
import * as promptly from 'promptly';

export interface CliIoHostProps {
  /**
   * Determines the verbosity of the output.
   *
   * @default 'info'
   */
  readonly logLevel?: IoMessageLevel;

  /**
   * Overrides the automatic TTY detection.
   *
   * When TTY is disabled, the CLI will have no interactions.
   *
   * @default - Determined from the current process
   */
  readonly isTTY?: boolean;

  /**
   * Whether the CLI is running in CI mode.
   *
   * In CI mode, all non-error output goes to stdout instead of stderr.
   *
   * @default - Determined from the environment, specifically based on `process.env.CI`
   */
  readonly isCI?: boolean;
}

/**
 * The IoHost of the command line: prints to the terminal and asks the user for confirmations.
 */
export class CliIoHost implements IIoHost {
  public readonly logLevel: IoMessageLevel;
  public readonly isTTY: boolean;
  public readonly isCI: boolean;

  constructor(props: CliIoHostProps = {}) {
    this.logLevel = props.logLevel ?? 'info';
    this.isTTY = props.isTTY ?? process.stdout.isTTY ?? false;
    this.isCI = props.isCI ?? isCI();
  }

  public async notify(msg: IoMessage<unknown>): Promise<void> {
    if (!isMessageRelevantForLevel(msg, this.logLevel)) {
      return;
    }
    this.selectStream(msg.level).write(this.formatMessage(msg));
  }

  /**
   * Confirmations are yes/no questions whose default response is to go ahead.
   * Answering no aborts the command. Every other request gets its default response.
   */
  public async requestResponse<T, U>(msg: IoRequest<T, U>): Promise<U> {
    if (typeof msg.defaultResponse !== 'boolean') {
      await this.notify(msg);
      return msg.defaultResponse;
    }

    if (!this.isTTY || this.isCI) {
      throw new ToolkitError(`${msg.message}: a confirmation is required, but the terminal is not interactive. Use --force to skip it`, 'toolkit', undefined, 'user');
    }

    const confirmed = await promptly.confirm(`${chalk.cyan(msg.message)} (y/n)`);
    if (!confirmed) {
      throw new ToolkitError('Aborted by user', 'toolkit', undefined, 'user');
    }
    return msg.defaultResponse;
  }

  private formatMessage(msg: IoMessage<unknown>): string {
    const message = msg.level === 'debug' || msg.level === 'trace'
      ? `[${formatTime(msg.time)}] ${msg.message}`
      : msg.message;
    return `${styleForLevel(msg.level)(message)}\n`;
  }

  private selectStream(level: IoMessageLevel): NodeJS.WriteStream {
    switch (level) {
      case 'error':
      case 'warn':
        return process.stderr;
      case 'result':
        return process.stdout;
      default:
        return this.isCI ? process.stdout : process.stderr;
    }
  }
}

/**
 * `HH:MM:SS` in local time
 */
function formatTime(d: Date): string {
  return [d.getHours(), d.getMinutes(), d.getSeconds()].map(n => String(n).padStart(2, '0')).join(':');
}
