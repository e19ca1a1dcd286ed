/**
 * Pipeline configuration for the command line: an optional JSON file,
 * overridden by whatever flags were given.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import type { Axis, PipelineOptions } from '@surfkit/kernel';

export const configSchema = z.object({
  vertexTolerance: z.number().positive().finite().optional(),
  areaEpsilon: z.number().positive().finite().optional(),
  countPolicy: z.enum(['advisory', 'strict']).optional(),
  trailingPolicy: z.enum(['lenient', 'strict']).optional(),
  filterDegenerate: z.boolean().optional(),
  dropDuplicateFaces: z.boolean().optional(),
  flipAxis: z.enum(['x', 'y', 'z']).nullable().optional(),
  compact: z.boolean().optional(),
}).strict();

export type FileConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Flags shared by every command that runs the pipeline. */
export interface PipelineFlags {
  config?: string;
  quiet?: boolean;
  tolerance?: number;
  areaEpsilon?: number;
  strictCount?: boolean;
  strictTrailing?: boolean;
  keepDegenerate?: boolean;
  dropDuplicateFaces?: boolean;
  flipAxis?: Axis;
  compact?: boolean;
}

export function parseConfig(text: string, source: string): FileConfig {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${source}: invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  const result = configSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`${source}: ${issues.join('; ')}`);
  }
  return result.data;
}

export function loadConfig(file: string): FileConfig {
  if (!fs.existsSync(file)) {
    throw new ConfigError(`Config file "${file}" not found`);
  }
  return parseConfig(fs.readFileSync(file, 'utf-8'), file);
}

/** Config file values, then flags; an absent flag never overrides the file. */
export function resolveOptions(flags: PipelineFlags): PipelineOptions {
  const base: PipelineOptions = flags.config ? loadConfig(flags.config) : {};
  const fromFlags: PipelineOptions = {};
  if (flags.tolerance !== undefined) fromFlags.vertexTolerance = flags.tolerance;
  if (flags.areaEpsilon !== undefined) fromFlags.areaEpsilon = flags.areaEpsilon;
  if (flags.strictCount) fromFlags.countPolicy = 'strict';
  if (flags.strictTrailing) fromFlags.trailingPolicy = 'strict';
  if (flags.keepDegenerate) fromFlags.filterDegenerate = false;
  if (flags.dropDuplicateFaces) fromFlags.dropDuplicateFaces = true;
  if (flags.flipAxis !== undefined) fromFlags.flipAxis = flags.flipAxis;
  if (flags.compact) fromFlags.compact = true;
  return { ...base, ...fromFlags };
}
