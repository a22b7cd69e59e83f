/**
 * Tests for compiling a command tree into a command-line parser.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import {
  compileParser,
  createParamOptions,
  type ParseOutcome,
} from '../../../../src/core/dispatch/compiler.js';
import { findParam, type ParamSpec } from '../../../../src/core/spec/types.js';
import { ErrorCodes, UsageError } from '../../../../src/utils/errors.js';
import { buildSampleSpecs, buildSampleTree, CapturedOutput, PROGRAM } from '../../../helpers/commands.js';

const specs = buildSampleSpecs();

function param(functionName: string, name: string): ParamSpec {
  const spec = specs.find((candidate) => candidate.name === functionName);
  const found = spec ? findParam(spec, name) : undefined;
  if (!found) throw new Error(`no parameter ${functionName}.${name}`);
  return found;
}

function commandValues(outcome: ParseOutcome): Record<string, unknown> {
  if (outcome.kind !== 'command') throw new Error(`expected a command, got exit ${outcome.exitCode}`);
  return Object.fromEntries(outcome.values);
}

describe('createParamOptions', () => {
  it('should give positionals no option', () => {
    expect(createParamOptions(param('greet_user', 'name'))).toEqual([]);
  });

  it('should store values under the parameter name', () => {
    const [option] = createParamOptions(param('greet_user', 'times'));
    expect(option?.flags).toBe('--times <INT>');
    expect(option?.attributeName()).toBe('times');
    expect(option?.description).toBe('Repetitions. [default: 1]');
  });

  it('should make switches plain flags', () => {
    const [option] = createParamOptions(param('greet_user', 'shout'));
    expect(option?.flags).toBe('--shout');
    expect(option?.isBoolean()).toBe(true);
  });

  it('should give compound parameters an inline and a file option that conflict', () => {
    const [inline, file] = createParamOptions(param('config_merge', 'base'));
    expect(inline?.flags).toBe('--base <STR>');
    expect(inline?.conflictsWith).toEqual(['base_file']);
    expect(file?.flags).toBe('--base-file <PATH>');
    expect(file?.attributeName()).toBe('base_file');
  });

  it('should use the io flag and metavar', () => {
    const [option] = createParamOptions(param('foo_bar', 'infile'));
    expect(option?.flags).toBe('-i <FILE>');
    expect(option?.mandatory).toBe(false);
  });
});

describe('CompiledParser', () => {
  let output: CapturedOutput;

  beforeEach(() => {
    output = new CapturedOutput();
  });

  async function parse(...argv: string[]): Promise<ParseOutcome> {
    return compileParser(buildSampleTree(), PROGRAM, output).parse(argv);
  }

  async function usageError(...argv: string[]): Promise<UsageError> {
    const error = await parse(...argv).catch((caught: unknown) => caught);
    if (error instanceof UsageError) return error;
    throw new Error(`expected a UsageError, got ${String(error)}`);
  }

  it('should select a command and collect its raw values', async () => {
    const outcome = await parse('foo', 'bar', '-i', 'a.txt', '-o', 'b.txt', '--threshold', '0.9');
    expect(outcome.kind === 'command' && outcome.spec.name).toBe('foo_bar');
    expect(commandValues(outcome)).toEqual({ infile: 'a.txt', outfile: 'b.txt', threshold: '0.9' });
  });

  it('should leave omitted options undefined', async () => {
    expect(commandValues(await parse('foo', 'bar'))).toEqual({
      infile: undefined,
      outfile: undefined,
      threshold: undefined,
    });
  });

  it('should collect positionals, switches and the return file', async () => {
    const outcome = await parse('greet', 'user', 'ann', '--shout', '--times', '3', '-o', 'out.txt');
    expect(commandValues(outcome)).toEqual({
      name: 'ann',
      times: '3',
      shout: true,
      title: undefined,
      retfile: 'out.txt',
    });
  });

  it('should collect file arguments of compound parameters', async () => {
    const outcome = await parse('config', 'merge', '--base-file', 'base.yaml', '--extra', '{a: 1}');
    expect(commandValues(outcome)).toEqual({
      base: undefined,
      base_file: 'base.yaml',
      extra: '{a: 1}',
      extra_file: undefined,
      retfile: undefined,
    });
  });

  it('should reject an unknown command with the usage of its parent', async () => {
    const error = await usageError('foo', 'baz');
    expect(error.code).toBe(ErrorCodes.UNKNOWN_COMMAND);
    expect(output.err).toContain("error: unknown command 'baz'");
    expect(output.err).toContain('Usage: prog foo [options] [command]');
    expect(output.err).toContain('bar [options]');
  });

  it('should reject a path that stops at an internal node', async () => {
    expect((await usageError('foo')).code).toBe(ErrorCodes.INCOMPLETE_COMMAND);
    expect((await usageError()).code).toBe(ErrorCodes.INCOMPLETE_COMMAND);
  });

  it('should reject a missing positional', async () => {
    expect((await usageError('greet', 'user')).code).toBe(ErrorCodes.MISSING_ARGUMENT);
  });

  it('should reject a missing required compound parameter', async () => {
    const error = await usageError('config', 'merge');
    expect(error.code).toBe(ErrorCodes.MISSING_ARGUMENT);
    expect(output.err).toContain('error: one of --base or --base-file is required');
  });

  it('should reject a compound parameter given both ways', async () => {
    const error = await usageError('config', 'merge', '--base', '{a: 1}', '--base-file', 'base.yaml');
    expect(error.code).toBe(ErrorCodes.CONFLICTING_ARGUMENTS);
  });

  it('should reject unknown options and surplus arguments', async () => {
    expect((await usageError('greet', 'user', 'ann', '--nope')).code).toBe(ErrorCodes.INVALID_ARGUMENT);
    expect((await usageError('greet', 'user', 'ann', 'bob')).code).toBe(ErrorCodes.INVALID_ARGUMENT);
  });

  it('should keep the commander code in the error details', async () => {
    const error = await usageError('greet', 'user');
    expect(error.details).toEqual({ commanderCode: 'commander.missingArgument' });
  });

  it('should print help for a command and exit cleanly', async () => {
    expect(await parse('foo', 'bar', '--help')).toEqual({ kind: 'exit', exitCode: 0 });
    expect(output.out).toContain('Usage: prog foo bar [options]');
    expect(output.out).toContain('--threshold <FLOAT>');
    expect(output.out).toContain('Minimum score. [default: 0.5]');
  });

  it('should print the version as name-version', async () => {
    expect(await parse('-v')).toEqual({ kind: 'exit', exitCode: 0 });
    expect(output.out).toBe('prog-1.0.0\n');
  });

  it('should list terminal commands', async () => {
    expect(await parse('-c')).toEqual({ kind: 'exit', exitCode: 0 });
    expect(output.out).toContain('  ... records filter  Filter records by score.');
  });

  it('should list terminal commands below an internal node', async () => {
    expect(await parse('foo', '--commands')).toEqual({ kind: 'exit', exitCode: 0 });
    expect(output.out).toBe(
      ['terminal commands:', '', '  prog foo ...', '', '  ... bar  Copy lines scoring above a threshold.', ''].join(
        '\n'
      )
    );
  });
});
