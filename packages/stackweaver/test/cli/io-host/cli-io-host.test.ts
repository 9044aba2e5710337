import type { IoMessage, IoMessageLevel, IoRequest } from '@stackweaver/toolkit-lib';
import * as promptly from 'promptly';
import { CliIoHost } from '../../../lib/cli/io-host/cli-io-host';

jest.mock('promptly', () => ({
  confirm: jest.fn(),
}));

const confirm = jest.mocked(promptly.confirm);

let stdout: jest.SpyInstance;
let stderr: jest.SpyInstance;

beforeEach(() => {
  stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
  stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  confirm.mockReset();
});

afterEach(() => {
  jest.restoreAllMocks();
});

function message(level: IoMessageLevel, text: string, time: Date = new Date()): IoMessage<unknown> {
  return { time, level, action: 'deploy', code: 'SW_TOOLKIT_I0000', message: text, data: undefined };
}

function request<U>(text: string, defaultResponse: U): IoRequest<unknown, U> {
  return { ...message('info', text), defaultResponse };
}

describe('notify', () => {
  test('info goes to stderr', async () => {
    const host = new CliIoHost({ isCI: false, isTTY: false });

    await host.notify(message('info', 'Creating stack orders'));

    expect(stderr).toHaveBeenCalledWith('Creating stack orders\n');
    expect(stdout).not.toHaveBeenCalled();
  });

  test('results go to stdout', async () => {
    const host = new CliIoHost({ isCI: false, isTTY: false });

    await host.notify(message('result', '{}'));

    expect(stdout).toHaveBeenCalledWith('{}\n');
  });

  test('in CI, info goes to stdout', async () => {
    const host = new CliIoHost({ isCI: true, isTTY: false });

    await host.notify(message('info', 'Creating stack orders'));

    expect(stdout).toHaveBeenCalledWith('Creating stack orders\n');
  });

  test('debug messages are dropped at the default level', async () => {
    const host = new CliIoHost({ isCI: false, isTTY: false });

    await host.notify(message('debug', 'outdir: out'));

    expect(stderr).not.toHaveBeenCalled();
  });

  test('debug messages carry their time when shown', async () => {
    const host = new CliIoHost({ logLevel: 'debug', isCI: false, isTTY: false });

    await host.notify(message('debug', 'outdir: out', new Date(2024, 0, 1, 9, 5, 3)));

    expect(stderr).toHaveBeenCalledWith(expect.stringContaining('[09:05:03] outdir: out'));
  });
});

describe('requestResponse', () => {
  test('answers anything but a confirmation with its default response', async () => {
    const host = new CliIoHost({ isCI: false, isTTY: true });

    await expect(host.requestResponse(request('How many?', 4))).resolves.toBe(4);
    expect(confirm).not.toHaveBeenCalled();
  });

  test('asks the user for confirmations', async () => {
    confirm.mockResolvedValue(true);
    const host = new CliIoHost({ isCI: false, isTTY: true });

    await expect(host.requestResponse(request('Are you sure you want to delete: orders', true))).resolves.toBe(true);
    expect(confirm).toHaveBeenCalledWith(expect.stringContaining('Are you sure you want to delete: orders'));
  });

  test('declining a confirmation aborts', async () => {
    confirm.mockResolvedValue(false);
    const host = new CliIoHost({ isCI: false, isTTY: true });

    await expect(host.requestResponse(request('Are you sure you want to delete: orders', true))).rejects.toThrow('Aborted by user');
  });

  test('confirmations need an interactive terminal', async () => {
    const host = new CliIoHost({ isCI: false, isTTY: false });

    await expect(host.requestResponse(request('Are you sure you want to delete: orders', true)))
      .rejects.toThrow('Are you sure you want to delete: orders: a confirmation is required, but the terminal is not interactive. Use --force to skip it');
    expect(confirm).not.toHaveBeenCalled();
  });
});
