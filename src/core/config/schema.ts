/**
 * Zod schema for fncli.config.yaml.
 */
import { z } from 'zod';
import type { Newline } from '../streams/text-streams.js';

/**
 * Treat a missing section as an empty object so that nested defaults apply.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

const NEWLINES: ReadonlyMap<string, Newline> = new Map([
  ['\n', '\n'],
  ['\\n', '\n'],
  ['\r\n', '\r\n'],
  ['\\r\\n', '\r\n'],
  ['\r', '\r'],
  ['\\r', '\r'],
]);

/** Newline written to output files, given literally or backslash-escaped. */
export const NewlineSchema = z.string().transform((value, ctx): Newline => {
  const newline = NEWLINES.get(value);
  if (newline === undefined) {
    ctx.addIssue({ code: 'custom', message: 'newline must be one of \\n, \\r\\n or \\r' });
    return z.NEVER;
  }
  return newline;
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Program metadata; name and version fall back to package.json. */
export const ProgramConfigSchema = z.object({
  name: z.string().min(1).optional(),
  version: z.string().min(1).optional(),
  description: z.string().optional(),
});

/**
 * Compiled output of the command sources. When set, manifest entries name
 * the emitted JavaScript module instead of the TypeScript source.
 */
export const EmitConfigSchema = z.object({
  root_dir: z.string().min(1).default('src'),
  out_dir: z.string().min(1).default('dist'),
});

export const ConfigSchema = withDefaults(
  z.object({
    program: withDefaults(ProgramConfigSchema),
    /** Globs of command modules, relative to the project root */
    sources: z.array(z.string()).min(1).default(['src/commands/**/*.ts']),
    exclude: z.array(z.string()).default([]),
    /** Manifest path, relative to the project root */
    manifest: z.string().min(1).default('fncli.manifest.json'),
    newline: NewlineSchema.default('\n'),
    log_level: LogLevelSchema.default('info'),
    emit: EmitConfigSchema.optional(),
  })
);

export type Config = z.output<typeof ConfigSchema>;
export type ProgramConfig = z.output<typeof ProgramConfigSchema>;
export type EmitConfig = z.output<typeof EmitConfigSchema>;
