import * as os from 'os';
import * as path from 'path';
import { ToolkitError } from '@stackweaver/stack-lib';
import * as fs from 'fs-extra';
import type { IoHelper } from '../api-private';
import { CLI_PRIVATE_IO } from './io-host/messages';

export const PROJECT_CONFIG = 'stackweaver.json';
export const USER_DEFAULTS = '~/.stackweaver.json';

/**
 * Keys a configuration file may set
 */
export const SETTINGS_KEYS = [
  'app',
  'output',
  'stackName',
  'pollIntervalSeconds',
  'maxPolls',
  'assetParallelism',
  'region',
  'profile',
] as const;

export type SettingsMap = { [key: string]: unknown };

/**
 * The values taken from the command line that overlap with settings
 */
export interface SettingsArguments {
  readonly app?: string;
  readonly output?: string;
  readonly stackName?: string;
  readonly concurrency?: number;
  readonly region?: string;
  readonly profile?: string;
}

export interface ConfigurationProps {
  /**
   * Settings from the command line, they take precedence over every file
   *
   * @default - no settings
   */
  readonly commandLineArguments?: Settings;

  /**
   * @default - stackweaver.json in the current working directory
   */
  readonly projectConfigFile?: string;

  /**
   * @default - .stackweaver.json in the home directory of the user
   */
  readonly userConfigFile?: string;
}

/**
 * All sources of settings, merged
 *
 * User defaults are overridden by the project file, which is overridden by the command line.
 */
export class Configuration {
  public settings = new Settings();

  private readonly commandLineArguments: Settings;
  private readonly projectConfigFile: string;
  private readonly userConfigFile: string;

  constructor(props: ConfigurationProps = {}) {
    this.commandLineArguments = props.commandLineArguments ?? new Settings();
    this.projectConfigFile = path.resolve(props.projectConfigFile ?? PROJECT_CONFIG);
    this.userConfigFile = props.userConfigFile ?? path.join(os.homedir(), USER_DEFAULTS.replace(/^~\//, ''));
  }

  /**
   * Load the configuration files
   */
  public async load(ioHelper: IoHelper): Promise<this> {
    const userConfig = await loadAndLog(this.userConfigFile, ioHelper);
    const projectConfig = await loadAndLog(this.projectConfigFile, ioHelper);

    this.settings = userConfig.merge(projectConfig).merge(this.commandLineArguments);
    return this;
  }
}

async function loadAndLog(fileName: string, ioHelper: IoHelper): Promise<Settings> {
  const settings = await Settings.fromFile(fileName);
  if (settings.empty) {
    return settings;
  }
  await ioHelper.notify(CLI_PRIVATE_IO.SW_CLI_I0100.msg(`Loaded settings from ${fileName}`, { file: fileName }));
  for (const key of settings.keys()) {
    if (!isSettingsKey(key)) {
      await ioHelper.notify(CLI_PRIVATE_IO.SW_CLI_W0101.msg(`${fileName}: unknown setting '${key}'`, { file: fileName }));
    }
  }
  return settings;
}

function isSettingsKey(key: string): boolean {
  return SETTINGS_KEYS.some(k => k === key);
}

/**
 * A set of settings, addressed by dotted paths
 *
 * Instances are immutable, `merge` returns a new instance.
 */
export class Settings {
  /**
   * Parse settings out of the command line arguments, leaving out what was not given
   */
  public static fromCommandLineArguments(argv: SettingsArguments): Settings {
    const settings: SettingsMap = {
      app: argv.app,
      output: argv.output,
      stackName: argv.stackName,
      assetParallelism: argv.concurrency,
      region: argv.region,
      profile: argv.profile,
    };
    return new Settings(withoutUndefined(settings));
  }

  /**
   * Read a JSON configuration file, a missing file gives empty settings
   */
  public static async fromFile(fileName: string): Promise<Settings> {
    if (!(await fs.pathExists(fileName))) {
      return new Settings();
    }
    let contents: unknown;
    try {
      contents = await fs.readJson(fileName);
    } catch (e) {
      throw new ToolkitError(`Could not read ${fileName}: ${e instanceof Error ? e.message : String(e)}`, 'toolkit', e, 'user');
    }
    if (!isSettingsMap(contents)) {
      throw new ToolkitError(`${fileName} must contain a JSON object`, 'toolkit', undefined, 'user');
    }
    return new Settings(contents);
  }

  constructor(private readonly settings: SettingsMap = {}) {
  }

  public get empty(): boolean {
    return Object.keys(this.settings).length === 0;
  }

  public keys(): string[] {
    return Object.keys(this.settings);
  }

  /**
   * A new Settings object with the values of `other` on top of these ones
   */
  public merge(other: Settings): Settings {
    return new Settings(deepMerge(this.settings, other.settings));
  }

  /**
   * Look up a value by a dotted path, like `a.b.c`
   */
  public get(dottedPath: string): unknown {
    let current: unknown = this.settings;
    for (const key of dottedPath.split('.')) {
      if (!isSettingsMap(current)) {
        return undefined;
      }
      current = current[key];
    }
    return current;
  }

  public getString(dottedPath: string): string | undefined {
    const value = this.get(dottedPath);
    if (value === undefined || typeof value === 'string') {
      return value;
    }
    throw new ToolkitError(`Setting '${dottedPath}' must be a string, got: ${JSON.stringify(value)}`, 'toolkit', undefined, 'user');
  }

  /**
   * @throws ToolkitError unless the value is a positive number
   */
  public getPositiveNumber(dottedPath: string): number | undefined {
    const value = this.get(dottedPath);
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      throw new ToolkitError(`Setting '${dottedPath}' must be a positive number, got: ${JSON.stringify(value)}`, 'toolkit', undefined, 'user');
    }
    return value;
  }

  /**
   * @throws ToolkitError unless the value is a positive whole number
   */
  public getPositiveInteger(dottedPath: string): number | undefined {
    const value = this.get(dottedPath);
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      throw new ToolkitError(`Setting '${dottedPath}' must be a positive integer, got: ${JSON.stringify(value)}`, 'toolkit', undefined, 'user');
    }
    return value;
  }
}

function isSettingsMap(x: unknown): x is SettingsMap {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function withoutUndefined(map: SettingsMap): SettingsMap {
  const ret: SettingsMap = {};
  for (const [key, value] of Object.entries(map)) {
    if (value !== undefined) {
      ret[key] = value;
    }
  }
  return ret;
}

function deepMerge(target: SettingsMap, source: SettingsMap): SettingsMap {
  const ret: SettingsMap = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = ret[key];
    ret[key] = isSettingsMap(existing) && isSettingsMap(value) ? deepMerge(existing, value) : value;
  }
  return ret;
}
