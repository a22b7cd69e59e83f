/**
 * Runs one command line: parse, marshal arguments, call the command
 * function, marshal its return value.
 */
import {
  ApplicationError,
  ConversionError,
  ErrorCodes,
  FncliError,
  SystemError,
  UsageError,
  describeError,
} from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { loadManifest, type LoadedManifest } from '../manifest/manifest.js';
import { STANDARD_STREAM } from '../streams/text-streams.js';
import { formalParams, RETURN_FILE_PARAM, type FunctionSpec, type ParamSpec } from '../spec/types.js';
import { Chaperon } from '../types/chaperon.js';
import { coerceValue, TypeRegistry } from '../types/registry.js';
import type { Value } from '../types/values.js';
import { compileParser, processOutput, type ParserOutput, type RawArgument } from './compiler.js';
import { ModuleFunctionLoader, type CommandFunction, type FunctionLoader } from './loader.js';

export interface DispatcherOptions {
  registry?: TypeRegistry;
  loader?: FunctionLoader;
  output?: ParserOutput;
  logger?: Logger;
}

function withParam(param: ParamSpec, error: ConversionError): ConversionError {
  return new ConversionError(error.code, `${param.flag ?? param.name}: ${error.message}`, {
    ...error.details,
    param: param.name,
  });
}

/**
 * Turn raw command-line values into typed arguments keyed by parameter
 * name. Compound parameters are read from their file argument when given,
 * else from their inline argument.
 *
 * @throws ConversionError when a token or file does not hold a value of
 *   the parameter's type.
 */
export function resolveArguments(
  spec: FunctionSpec,
  values: ReadonlyMap<string, RawArgument>,
  registry: TypeRegistry = new TypeRegistry()
): Record<string, Value> {
  const args: Record<string, Value> = {};

  for (const param of formalParams(spec)) {
    const raw = values.get(param.name);
    const fileArgument = param.fileDest !== undefined ? values.get(param.fileDest) : undefined;

    try {
      if (param.group === 'switch') {
        args[param.name] = raw === true;
      } else if (typeof fileArgument === 'string') {
        args[param.name] = Chaperon.fromFile(registry, param.type, fileArgument).value;
      } else if (typeof raw === 'string') {
        args[param.name] = param.group === 'io' ? raw : Chaperon.fromLine(registry, param.type, raw).value;
      } else if (param.hasDefault) {
        args[param.name] = param.defaultValue;
      } else {
        throw new UsageError(ErrorCodes.MISSING_ARGUMENT, `${spec.name}: argument ${param.name} is required`, {
          param: param.name,
        });
      }
    } catch (error) {
      if (error instanceof ConversionError) throw withParam(param, error);
      throw error;
    }
  }

  return args;
}

/**
 * Call a command function with arguments keyed by parameter name.
 *
 * Every argument is checked against its declared type first, and the
 * return value against the return type afterwards. Omitted arguments take
 * their defaults.
 *
 * @returns the checked return value, or undefined for a function that
 *   returns nothing
 * @throws ApplicationError wrapping anything the function throws
 */
export async function invoke(
  spec: FunctionSpec,
  fn: CommandFunction,
  args: Readonly<Record<string, unknown>>
): Promise<Value | undefined> {
  const params = formalParams(spec);
  const known = new Set(params.map((param) => param.name));
  const unknown = Object.keys(args).find((name) => !known.has(name));
  if (unknown !== undefined) {
    throw new UsageError(ErrorCodes.INVALID_ARGUMENT, `${spec.name}: unknown argument ${unknown}`, {
      function: spec.name,
      param: unknown,
    });
  }

  const ordered = params.map((param): Value => {
    if (!Object.hasOwn(args, param.name)) {
      if (param.hasDefault) return param.defaultValue;
      throw new UsageError(ErrorCodes.MISSING_ARGUMENT, `${spec.name}: argument ${param.name} is required`, {
        function: spec.name,
        param: param.name,
      });
    }
    const value = args[param.name];
    if (value === null && param.hasDefault && param.defaultValue === null) {
      return null;
    }
    try {
      return coerceValue(value, param.type);
    } catch (error) {
      if (error instanceof ConversionError) throw withParam(param, error);
      throw error;
    }
  });

  let result: unknown;
  try {
    result = await Reflect.apply(fn, undefined, ordered);
  } catch (error) {
    throw new ApplicationError(ErrorCodes.APPLICATION_FAILED, `${spec.name}: ${describeError(error)}`, {
      function: spec.name,
    }, error);
  }

  if (!spec.returnSpec) {
    return undefined;
  }
  try {
    return coerceValue(result, spec.returnSpec.type);
  } catch (error) {
    if (error instanceof ConversionError) {
      throw new ConversionError(error.code, `${spec.name} returned an invalid value: ${error.message}`, {
        ...error.details,
        function: spec.name,
      });
    }
    throw error;
  }
}

export class Dispatcher {
  private readonly registry: TypeRegistry;
  private readonly loader: FunctionLoader;
  private readonly output: ParserOutput;
  private readonly log: Logger;

  constructor(
    private readonly manifest: LoadedManifest,
    options: DispatcherOptions = {}
  ) {
    this.registry = options.registry ?? new TypeRegistry();
    this.loader = options.loader ?? new ModuleFunctionLoader();
    this.output = options.output ?? processOutput;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Run one command line (user arguments only).
   *
   * @returns the exit code: 0 on success and after help, version or a
   *   command listing, 1 on any error
   */
  async run(argv: readonly string[]): Promise<number> {
    try {
      const outcome = await compileParser(this.manifest.tree, this.manifest.program, this.output).parse(argv);
      if (outcome.kind === 'exit') {
        return outcome.exitCode;
      }

      const { spec, values } = outcome;
      this.log.debug(`dispatching ${spec.commandPath.join(' ')}`, { function: spec.name });
      const args = resolveArguments(spec, values, this.registry);
      const fn = await this.loadFunction(spec);
      const result = await invoke(spec, fn, args);

      if (spec.returnSpec) {
        const retfile = values.get(RETURN_FILE_PARAM);
        new Chaperon(result, spec.returnSpec.type).toFile(
          this.registry,
          typeof retfile === 'string' ? retfile : STANDARD_STREAM
        );
      }
      return 0;
    } catch (error) {
      return this.report(error);
    }
  }

  private async loadFunction(spec: FunctionSpec): Promise<CommandFunction> {
    const entry = this.manifest.entries.get(spec.name);
    if (!entry) {
      throw new SystemError(ErrorCodes.MODULE_LOAD_ERROR, `no module recorded for ${spec.name}`);
    }
    return this.loader.load(entry, this.manifest.baseDir);
  }

  private report(error: unknown): number {
    // commander has printed the error together with the usage
    if (error instanceof UsageError && error.details?.['commanderCode'] !== undefined) {
      this.log.debug(`usage error ${error.code}`, { message: error.message });
      return 1;
    }
    if (error instanceof FncliError) {
      this.log.error(`[${error.code}] ${error.message}`, error);
      return 1;
    }
    this.log.error(describeError(error), error instanceof Error ? error : undefined);
    return 1;
  }
}

/**
 * Load a manifest and run one command line against it.
 */
export async function runManifest(
  manifestPath: string,
  argv: readonly string[],
  options: DispatcherOptions = {}
): Promise<number> {
  const manifest = await loadManifest(manifestPath, options.registry);
  return new Dispatcher(manifest, options).run(argv);
}
