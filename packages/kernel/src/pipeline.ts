/**
 * Per-file pipeline: parse → deduplicate → repair.
 *
 * A pure function of the text and the options; safe to run for many files
 * at once with different tolerances.
 */

import type { ParsedSurf } from './parser.js';
import { parseSurf } from './parser.js';
import { buildIndexedMesh } from './dedup.js';
import type { RepairReport } from './repair.js';
import { repairMesh } from './repair.js';
import type { PipelineOptions } from './options.js';
import { resolvePipelineOptions } from './options.js';
import type { ValidationError } from './errors.js';

export interface ProcessedSurf extends RepairReport {
  source: string;
  declaredCount: number | null;
  /** Raw rows read, before dedup and repair. */
  parsedTriangles: number;
  /** Vertices after dedup, before repair. */
  uniqueVertices: number;
  warnings: ValidationError[];
}

export function processSurf(text: string, source: string, options: PipelineOptions = {}): ProcessedSurf {
  const opts = resolvePipelineOptions(options);
  const parsed: ParsedSurf = parseSurf(text, source, opts);
  const indexed = buildIndexedMesh(parsed.triangles, source, opts);
  const report = repairMesh(indexed, opts);
  return {
    ...report,
    source,
    declaredCount: parsed.declaredCount,
    parsedTriangles: parsed.triangles.length,
    uniqueVertices: indexed.vertexCount,
    warnings: parsed.warnings,
  };
}
