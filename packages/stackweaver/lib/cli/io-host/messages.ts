import type { Duration, ErrorPayload } from '@stackweaver/toolkit-lib';
import * as make from '../../api-private';

export interface CommandResult extends Duration, Partial<ErrorPayload> {
  readonly success: boolean;
}

export interface SettingsFile {
  /**
   * Absolute path of the configuration file
   */
  readonly file: string;
}

export const CLI_PRIVATE_IO = {
  SW_CLI_I0100: make.debug<SettingsFile>({
    code: 'SW_CLI_I0100',
    description: 'Settings were loaded from a configuration file',
    interface: 'SettingsFile',
  }),

  SW_CLI_W0101: make.warn<SettingsFile>({
    code: 'SW_CLI_W0101',
    description: 'A configuration file sets a key that is not known',
    interface: 'SettingsFile',
  }),

  SW_CLI_I2000: make.trace<CommandResult>({
    code: 'SW_CLI_I2000',
    description: 'Command has finished executing',
    interface: 'CommandResult',
  }),

  SW_CLI_E2001: make.error<ErrorPayload>({
    code: 'SW_CLI_E2001',
    description: 'Command failed',
    interface: 'ErrorPayload',
  }),
};
