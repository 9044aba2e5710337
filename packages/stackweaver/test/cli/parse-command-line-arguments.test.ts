import { parseCommandLineArguments } from '../../lib/cli/parse-command-line-arguments';

test('stackweaver deploy takes the app, the stack name and the asset concurrency', async () => {
  const argv = await parseCommandLineArguments(['deploy', '--app', 'node app.js', '-s', 'orders', '--concurrency', '2']);

  expect(argv).toEqual({
    command: 'deploy',
    app: 'node app.js',
    assembly: undefined,
    output: undefined,
    stackName: 'orders',
    profile: undefined,
    region: undefined,
    verbose: 0,
    format: undefined,
    concurrency: 2,
    force: false,
  });
});

describe('stackweaver synth', () => {
  test('renders JSON by default', async () => {
    const argv = await parseCommandLineArguments(['synth', '-a', 'node app.js']);
    expect(argv.format).toBe('json');
  });

  test('--format yaml', async () => {
    const argv = await parseCommandLineArguments(['synth', '-a', 'node app.js', '--format', 'yaml']);
    expect(argv.format).toBe('yaml');
  });

  test('rejects an unknown format', async () => {
    await expect(parseCommandLineArguments(['synth', '--format', 'xml'])).rejects.toThrow(/xml/);
  });
});

test.each([
  [['destroy', '-s', 'orders'], false],
  [['destroy', '-s', 'orders', '--force'], true],
  [['destroy', '-s', 'orders', '-f'], true],
])('%j sets force to %s', async (args, force) => {
  const argv = await parseCommandLineArguments(args);
  expect(argv.force).toBe(force);
});

test.each([
  [['diff'], 0],
  [['diff', '-v'], 1],
  [['diff', '-vv'], 2],
  [['diff', '--verbose', '--verbose', '--verbose'], 3],
])('%j counts verbosity %d', async (args, verbose) => {
  const argv = await parseCommandLineArguments(args);
  expect(argv.verbose).toBe(verbose);
});

test('--assembly and --app cannot be combined', async () => {
  await expect(parseCommandLineArguments(['synth', '--app', 'node app.js', '--assembly', 'out'])).rejects.toThrow(/mutually exclusive/);
});

test('a command is required', async () => {
  await expect(parseCommandLineArguments([])).rejects.toThrow('Specify a command: synth, deploy, diff or destroy');
});

test('unknown commands are rejected', async () => {
  await expect(parseCommandLineArguments(['bootstrap'])).rejects.toThrow(/bootstrap/);
});

test('options of other commands are rejected', async () => {
  await expect(parseCommandLineArguments(['deploy', '--format', 'yaml'])).rejects.toThrow(/format/);
});
