import { jest } from '@jest/globals';
import cliMainRunner, { CLIRunners, parseCLIArguments } from '../cli';

const RUNNER_NAMES = ['propagate', 'print', 'version', 'help'] as const;

async function assertCalled(
  commandLineArguments: readonly string[],
  called: keyof CLIRunners
): Promise<void> {
  const propagate = jest.fn<(needHelp: boolean) => Promise<void>>();
  const print = jest.fn<(needHelp: boolean) => Promise<void>>();
  const version = jest.fn<() => Promise<void>>();
  const help = jest.fn<() => Promise<void>>();
  const mocks = { propagate, print, version, help };
  await cliMainRunner(mocks, commandLineArguments);
  RUNNER_NAMES.forEach((commandName) => {
    expect(mocks[commandName].mock.calls.length).toBe(commandName === called ? 1 : 0);
  });
}

describe('circuitc-cli/cli', () => {
  it('Can correctly parse', () => {
    expect(parseCLIArguments([])).toEqual({ type: 'propagate', needHelp: false });
    expect(parseCLIArguments(['propagate'])).toEqual({ type: 'propagate', needHelp: false });
    expect(parseCLIArguments(['print'])).toEqual({ type: 'print', needHelp: false });
    expect(parseCLIArguments(['print', '--help'])).toEqual({ type: 'print', needHelp: true });
    expect(parseCLIArguments(['propagate', '--help'])).toEqual({
      type: 'propagate',
      needHelp: true,
    });
    expect(parseCLIArguments(['propagate', '-h'])).toEqual({ type: 'propagate', needHelp: true });
    expect(parseCLIArguments(['version'])).toEqual({ type: 'version' });
    expect(parseCLIArguments(['dfasfsdf'])).toEqual({ type: 'help' });
    expect(parseCLIArguments(['help'])).toEqual({ type: 'help' });
  });

  it('Commands are correctly triggered', async () => {
    await assertCalled([], 'propagate');
    await assertCalled(['propagate'], 'propagate');
    await assertCalled(['print'], 'print');
    await assertCalled(['propagate', '--help'], 'propagate');
    await assertCalled(['print', '-h'], 'print');
    await assertCalled(['version'], 'version');
    await assertCalled(['dfasfsdf'], 'help');
    await assertCalled(['help'], 'help');
  });

  it('Passes the help flag to the command', async () => {
    const propagate = jest.fn<(needHelp: boolean) => Promise<void>>();
    const noop = jest.fn<() => Promise<void>>();
    await cliMainRunner(
      { propagate, print: noop, version: noop, help: noop },
      ['propagate', '--help']
    );
    expect(propagate.mock.calls).toEqual([[true]]);
    expect(noop.mock.calls.length).toBe(0);
  });
});
