/**
 * Zod schema for the build manifest.
 */
import { z } from 'zod';
import { TYPE_TAGS } from '../types/registry.js';

export const MANIFEST_FORMAT = 1;

const TypeTagSchema = z.enum(TYPE_TAGS);

/** A default value in its canonical line form. */
export const StoredValueSchema = z.object({
  type: TypeTagSchema,
  line: z.string(),
});

const IoShapeSchema = z.enum(['single', 'listed', 'indexed', 'directory', 'prefix', 'returned']);

const IoChannelSchema = z.enum(['input', 'output']);

const IoBindingSchema = z.object({
  shape: IoShapeSchema,
  params: z.array(z.string()),
});

export const StoredParamSchema = z.object({
  name: z.string().min(1),
  type: TypeTagSchema,
  group: z.enum(['positional', 'optional', 'switch', 'short', 'compound', 'io']),
  description: z.string(),
  required: z.boolean(),
  default: StoredValueSchema.optional(),
  flag: z.string().optional(),
  metavar: z.string().optional(),
  fileFlag: z.string().optional(),
  fileDest: z.string().optional(),
  channel: IoChannelSchema.optional(),
  shape: IoShapeSchema.optional(),
  synthetic: z.boolean().optional(),
});

export const StoredSpecSchema = z.object({
  name: z.string().min(1),
  commandPath: z.array(z.string().min(1)).min(2),
  summary: z.string(),
  description: z.string().optional(),
  notes: z.string().optional(),
  references: z.string().optional(),
  params: z.array(StoredParamSchema),
  returnSpec: z.object({ type: TypeTagSchema, description: z.string() }).optional(),
  ioChannels: z.object({
    input: IoBindingSchema.optional(),
    output: IoBindingSchema.optional(),
  }),
});

export const ProgramInfoSchema = z.object({
  name: z.string().min(1),
  version: z.string(),
  description: z.string().optional(),
});

export const ManifestEntrySchema = z.object({
  /** Module path relative to the manifest file. */
  module: z.string().min(1),
  exportName: z.string().min(1),
  spec: StoredSpecSchema,
});

export const ManifestSchema = z.object({
  format: z.literal(MANIFEST_FORMAT),
  program: ProgramInfoSchema,
  commands: z.array(ManifestEntrySchema),
});

export type StoredValue = z.infer<typeof StoredValueSchema>;
export type StoredParam = z.infer<typeof StoredParamSchema>;
export type StoredSpec = z.infer<typeof StoredSpecSchema>;
export type ProgramInfo = z.infer<typeof ProgramInfoSchema>;
export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;
export type Manifest = z.infer<typeof ManifestSchema>;
