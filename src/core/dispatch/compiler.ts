/**
 * Compiles a command tree into a commander program: one command per tree
 * node, leaves carrying one argument or option per parameter.
 *
 * Commander keeps parse state on its commands, so every parse runs on a
 * freshly compiled program.
 */
import { Command, CommanderError, Option } from 'commander';
import { ErrorCodes, UsageError, type ErrorCode } from '../../utils/errors.js';
import type { ProgramInfo } from '../manifest/schema.js';
import type { FunctionSpec, ParamSpec } from '../spec/types.js';
import type { CommandTree } from '../tree/command-tree.js';
import { formatCommandListing } from './command-listing.js';

/** Raw argument value: a string token, a switch state, or absent. */
export type RawArgument = string | boolean | undefined;

export interface ParsedCommand {
  readonly kind: 'command';
  readonly spec: FunctionSpec;
  /** Raw values keyed by parameter name, and by file destination for compound parameters. */
  readonly values: ReadonlyMap<string, RawArgument>;
}

/** Help, version or command listing was printed. */
export interface ParserExit {
  readonly kind: 'exit';
  readonly exitCode: number;
}

export type ParseOutcome = ParsedCommand | ParserExit;

export interface ParserOutput {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

export const processOutput: ParserOutput = {
  writeOut: (text) => {
    process.stdout.write(text);
  },
  writeErr: (text) => {
    process.stderr.write(text);
  },
};

const COMMANDS_LISTED = 'fncli.commandsListed';
const MISSING_COMPOUND = 'fncli.missingCompound';

const USAGE_CODES: Readonly<Record<string, ErrorCode>> = {
  'commander.unknownCommand': ErrorCodes.UNKNOWN_COMMAND,
  'commander.help': ErrorCodes.INCOMPLETE_COMMAND,
  'commander.missingArgument': ErrorCodes.MISSING_ARGUMENT,
  'commander.missingMandatoryOptionValue': ErrorCodes.MISSING_ARGUMENT,
  'commander.optionMissingArgument': ErrorCodes.MISSING_ARGUMENT,
  [MISSING_COMPOUND]: ErrorCodes.MISSING_ARGUMENT,
  'commander.conflictingOption': ErrorCodes.CONFLICTING_ARGUMENTS,
};

/**
 * Option whose parsed value is stored under a parameter name rather than
 * commander's camel-cased flag name.
 */
export class ParamOption extends Option {
  constructor(
    flags: string,
    description: string,
    readonly dest: string
  ) {
    super(flags, description);
    // `--no-x` names an ordinary parameter here, not a negation
    this.negate = false;
  }

  override attributeName(): string {
    return this.dest;
  }
}

/**
 * Options for the arguments of one parameter; positional parameters have
 * none.
 */
export function createParamOptions(param: ParamSpec): ParamOption[] {
  const flag = param.flag;
  if (param.group === 'positional' || flag === undefined) {
    return [];
  }

  if (param.group === 'switch') {
    return [new ParamOption(flag, param.description, param.name)];
  }

  if (param.group === 'compound' && param.fileFlag !== undefined && param.fileDest !== undefined) {
    const inline = new ParamOption(`${flag} <${param.metavar ?? 'STR'}>`, `${param.description} (inline)`, param.name);
    const file = new ParamOption(`${param.fileFlag} <PATH>`, `${param.description} (from file)`, param.fileDest);
    inline.conflicts(param.fileDest);
    return [inline, file];
  }

  const option = new ParamOption(`${flag} <${param.metavar ?? param.type.toUpperCase()}>`, param.description, param.name);
  if (param.required) {
    option.makeOptionMandatory();
  }
  return [option];
}

function leafDescription(spec: FunctionSpec): string {
  return [spec.summary, spec.description, spec.notes, spec.references]
    .filter((part): part is string => part !== undefined && part !== '')
    .join('\n\n');
}

export class CompiledParser {
  readonly program: Command;
  private selected: ParsedCommand | undefined;

  constructor(tree: CommandTree, info: ProgramInfo, output: ParserOutput = processOutput) {
    this.program = buildProgram(tree, info, output, (parsed) => {
      this.selected = parsed;
    });
  }

  /**
   * Parse user arguments (without the node executable and script).
   *
   * @throws UsageError when argv does not name a command or its arguments
   *   do not fit; commander has already printed the error and usage.
   */
  async parse(argv: readonly string[]): Promise<ParseOutcome> {
    this.selected = undefined;
    try {
      await this.program.parseAsync([...argv], { from: 'user' });
    } catch (error) {
      if (!(error instanceof CommanderError)) throw error;
      if (error.exitCode === 0) {
        return { kind: 'exit', exitCode: 0 };
      }
      throw new UsageError(USAGE_CODES[error.code] ?? ErrorCodes.INVALID_ARGUMENT, error.message, {
        commanderCode: error.code,
      });
    }
    if (!this.selected) {
      throw new UsageError(ErrorCodes.INCOMPLETE_COMMAND, 'no command selected');
    }
    return this.selected;
  }
}

export function compileParser(tree: CommandTree, info: ProgramInfo, output?: ParserOutput): CompiledParser {
  return new CompiledParser(tree, info, output);
}

/**
 * Build the commander program for a command tree.
 *
 * Walks the tree keeping a chain of commands for the current path prefix:
 * entries that are not ancestors of the visited node are popped, and the
 * node's command is created under the top of the chain.
 */
function buildProgram(
  tree: CommandTree,
  info: ProgramInfo,
  output: ParserOutput,
  select: (parsed: ParsedCommand) => void
): Command {
  const root = new Command(info.name)
    .version(`${info.name}-${info.version}`, '-v, --version', 'show version and exit')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.writeOut(text),
      writeErr: (text) => output.writeErr(text),
    })
    .showHelpAfterError()
    .enablePositionalOptions()
    .allowExcessArguments(false);
  if (info.description) {
    root.description(info.description);
  }
  addCommandsOption(root, tree, info, [], output);

  const chain: Array<{ token: string; command: Command }> = [{ token: '', command: root }];

  for (const { path, children, spec } of tree.walk()) {
    if (path.length === 0) continue;

    while (chain.length > path.length || chain.some((link, depth) => depth > 0 && link.token !== path[depth - 1])) {
      chain.pop();
    }
    const parent = chain[chain.length - 1];
    const token = path[path.length - 1];
    if (!parent || token === undefined) {
      throw new Error(`command chain broken at ${path.join(' ')}`);
    }

    const command = parent.command.command(token);
    chain.push({ token, command });

    if (children.length > 0) {
      addCommandsOption(command, tree, info, path, output);
    } else if (spec) {
      compileLeaf(command, spec, select);
    }
  }

  return root;
}

function addCommandsOption(
  command: Command,
  tree: CommandTree,
  program: ProgramInfo,
  path: readonly string[],
  output: ParserOutput
): void {
  command.option('-c, --commands', 'show terminal commands and exit');
  command.on('option:commands', () => {
    output.writeOut(formatCommandListing(program.name, tree, path));
    throw new CommanderError(0, COMMANDS_LISTED, '(commands)');
  });
}

function compileLeaf(command: Command, spec: FunctionSpec, select: (parsed: ParsedCommand) => void): void {
  command.summary(spec.summary).description(leafDescription(spec));

  const positionals = spec.params.filter((param) => param.group === 'positional');
  for (const param of positionals) {
    command.argument(`<${param.name}>`, param.description);
  }
  for (const param of spec.params) {
    createParamOptions(param).forEach((option) => command.addOption(option));
  }

  command.action(() => {
    const options = command.opts();
    const values = new Map<string, RawArgument>();

    positionals.forEach((param, index) => {
      values.set(param.name, toRawArgument(command.processedArgs[index]));
    });
    for (const param of spec.params) {
      if (param.group === 'positional') continue;
      values.set(param.name, toRawArgument(options[param.name]));
      if (param.fileDest !== undefined) {
        values.set(param.fileDest, toRawArgument(options[param.fileDest]));
      }
    }

    for (const param of spec.params) {
      if (
        param.group === 'compound' &&
        param.required &&
        values.get(param.name) === undefined &&
        param.fileDest !== undefined &&
        values.get(param.fileDest) === undefined
      ) {
        command.error(`error: one of ${param.flag ?? param.name} or ${param.fileFlag ?? param.fileDest} is required`, {
          code: MISSING_COMPOUND,
        });
      }
    }

    select({ kind: 'command', spec, values });
  });
}

function toRawArgument(value: unknown): RawArgument {
  return typeof value === 'string' || typeof value === 'boolean' ? value : undefined;
}
