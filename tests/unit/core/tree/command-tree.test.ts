/**
 * Tests for the command tree.
 */
import { describe, it, expect } from 'vitest';
import { CommandTree } from '../../../../src/core/tree/command-tree.js';
import type { FunctionSpec } from '../../../../src/core/spec/types.js';
import { ErrorCodes, SpecificationError } from '../../../../src/utils/errors.js';

function spec(name: string): FunctionSpec {
  return { name, commandPath: name.split('_'), summary: `Run ${name}.`, params: [], ioChannels: {} };
}

function tree(...names: string[]): CommandTree {
  const builder = CommandTree.builder();
  for (const name of names) {
    const leaf = spec(name);
    builder.insert(leaf.commandPath, leaf);
  }
  return builder.build();
}

function insertError(existing: readonly string[], name: string): SpecificationError | undefined {
  const builder = CommandTree.builder();
  for (const other of existing) builder.insert(other.split('_'), spec(other));
  try {
    builder.insert(name.split('_'), spec(name));
  } catch (error) {
    if (error instanceof SpecificationError) return error;
    throw error;
  }
  return undefined;
}

describe('CommandTree', () => {
  it('should walk depth-first with children in alphabetical order', () => {
    const walked = [...tree('foo_bar', 'db_drop', 'foo_baz_qux').walk()].map((entry) => ({
      path: entry.path.join(' '),
      children: entry.children,
      leaf: entry.spec?.name,
    }));

    expect(walked).toEqual([
      { path: '', children: ['db', 'foo'], leaf: undefined },
      { path: 'db', children: ['drop'], leaf: undefined },
      { path: 'db drop', children: [], leaf: 'db_drop' },
      { path: 'foo', children: ['bar', 'baz'], leaf: undefined },
      { path: 'foo bar', children: [], leaf: 'foo_bar' },
      { path: 'foo baz', children: ['qux'], leaf: undefined },
      { path: 'foo baz qux', children: [], leaf: 'foo_baz_qux' },
    ]);
  });

  it('should walk a shared subtree only once', () => {
    const leaf = { children: new Map(), spec: spec('foo_bar') };
    const shared = new CommandTree({
      children: new Map([
        ['bar', leaf],
        ['baz', leaf],
      ]),
    });

    expect([...shared.walk()].map((entry) => entry.path.join(' '))).toEqual(['', 'bar']);
  });

  it('should list leaves under a prefix', () => {
    const commands = tree('foo_bar', 'db_drop', 'foo_baz_qux');
    expect(commands.leaves().map((leaf) => leaf.name)).toEqual(['db_drop', 'foo_bar', 'foo_baz_qux']);
    expect(commands.leaves(['foo']).map((leaf) => leaf.name)).toEqual(['foo_bar', 'foo_baz_qux']);
    expect(commands.leaves(['nope'])).toEqual([]);
    expect(commands.size).toBe(3);
  });

  it('should look up leaves and nodes', () => {
    const commands = tree('foo_bar');
    expect(commands.lookup(['foo', 'bar'])?.name).toBe('foo_bar');
    expect(commands.lookup(['foo'])).toBeUndefined();
    expect(commands.has(['foo'])).toBe(true);
    expect(commands.has(['foo', 'baz'])).toBe(false);
  });

  it('should reject a second command at the same path', () => {
    expect(insertError(['foo_bar'], 'foo_bar')?.code).toBe(ErrorCodes.DUPLICATE_COMMAND);
  });

  it('should reject a command below a terminal command', () => {
    const error = insertError(['foo_bar'], 'foo_bar_baz');
    expect(error?.code).toBe(ErrorCodes.COMMAND_PATH_CONFLICT);
    expect(error?.message).toBe('foo_bar_baz: command foo bar is a terminal command (foo_bar)');
  });

  it('should reject a terminal command where subcommands exist', () => {
    expect(insertError(['foo_bar_baz'], 'foo_bar')?.code).toBe(ErrorCodes.COMMAND_PATH_CONFLICT);
  });

  it('should not accept insertions once built', () => {
    const builder = CommandTree.builder();
    builder.build();
    expect(() => builder.insert(['foo', 'bar'], spec('foo_bar'))).toThrow('command tree has already been built');
  });
});
