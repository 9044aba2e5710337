export { cli, exec, logLevelFromVerbosity } from './cli/cli';
export type { ExecOptions } from './cli/cli';
export { CliIoHost } from './cli/io-host/cli-io-host';
export type { CliIoHostProps } from './cli/io-host/cli-io-host';
export * from './cli/user-configuration';
export * from './cli/parse-command-line-arguments';
