import { parseArgs, parseHours, splitGlobalFlags } from '../../src/cli/args';
import { UsageError } from '../../src/domain/errors';

describe('parseArgs', () => {
  test('no command or help flags show help', () => {
    expect(parseArgs([])).toEqual({ name: 'help' });
    expect(parseArgs(['--help'])).toEqual({ name: 'help' });
    expect(parseArgs(['-h'])).toEqual({ name: 'help' });
  });

  test('simple commands', () => {
    expect(parseArgs(['start'])).toEqual({ name: 'start' });
    expect(parseArgs(['stop'])).toEqual({ name: 'stop' });
    expect(parseArgs(['reset'])).toEqual({ name: 'reset' });
  });

  test('status with and without --all', () => {
    expect(parseArgs(['status'])).toEqual({ name: 'status', all: false });
    expect(parseArgs(['status', '-a'])).toEqual({ name: 'status', all: true });
    expect(parseArgs(['status', '--all'])).toEqual({ name: 'status', all: true });
  });

  test('push defaults to an empty message and no hours', () => {
    expect(parseArgs(['push'])).toEqual({ name: 'push', message: '' });
  });

  test('push reads message and hours in either order', () => {
    expect(parseArgs(['push', '-m', 'x', '-t', '4.5'])).toEqual({ name: 'push', message: 'x', hours: 4.5 });
    expect(parseArgs(['push', '--time', '0', '--message', 'review'])).toEqual({
      name: 'push',
      message: 'review',
      hours: 0,
    });
  });

  test('token reads the email', () => {
    expect(parseArgs(['token', '-e', 'dev@example.com'])).toEqual({ name: 'token', email: 'dev@example.com' });
  });

  test('global flags are skipped wherever they appear', () => {
    expect(parseArgs(['--state-file', '/tmp/s.json', 'status', '--debug', '-a', '--log-file', 'x.log'])).toEqual({
      name: 'status',
      all: true,
    });
  });

  test('an option value that looks like a global flag stays a value', () => {
    expect(parseArgs(['push', '-m', '--debug', '-t', '1'])).toEqual({ name: 'push', message: '--debug', hours: 1 });
    expect(parseArgs(['push', '--message', '--state-file', '--debug'])).toEqual({ name: 'push', message: '--state-file' });
  });

  test('unknown commands and arguments are usage errors', () => {
    expect(() => parseArgs(['pause'])).toThrow(UsageError);
    expect(() => parseArgs(['pause'])).toThrow('Unknown command "pause". Run \'worklog help\' for usage.');
    expect(() => parseArgs(['start', 'now'])).toThrow(/takes no arguments/);
    expect(() => parseArgs(['status', '--verbose'])).toThrow(/Unexpected argument "--verbose" for status/);
  });

  test('splitGlobalFlags collects globals and leaves command tokens in order', () => {
    expect(splitGlobalFlags(['--debug', 'push', '-m', '--no-debug', '--config', 'c.json', '--no-debug'])).toEqual({
      globals: { debug: false, configPath: 'c.json' },
      args: ['push', '-m', '--no-debug'],
    });
    expect(splitGlobalFlags(['push', '-m', '--log-file', 'x.log'])).toEqual({
      globals: {},
      args: ['push', '-m', '--log-file', 'x.log'],
    });
  });

  test('options without a value are usage errors', () => {
    expect(() => parseArgs(['push', '-m'])).toThrow('Option -m expects a value.');
  });
});

describe('parseHours', () => {
  test('accepts non-negative decimals', () => {
    expect(parseHours('4.5')).toBe(4.5);
    expect(parseHours('0')).toBe(0);
    expect(parseHours('8')).toBe(8);
    expect(parseHours(' 7.25 ')).toBe(7.25);
  });

  test.each(['-1', 'abc', '', ' ', 'Infinity', '4,5', '0x10', '0b1', '1e3', '.5', '4.'])('rejects %p', (raw) => {
    expect(() => parseHours(raw)).toThrow(UsageError);
  });
});
