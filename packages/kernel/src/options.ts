/**
 * Pipeline tunables. Passed explicitly to every stage so that runs with
 * different tolerances never share state.
 */

import type { Axis } from './vec3.js';
import { AXES } from './vec3.js';
import type { Logger } from './logger.js';
import { consoleLogger } from './logger.js';

export const DEFAULT_VERTEX_TOLERANCE = 1e-12;
export const DEFAULT_AREA_EPSILON = 1e-10;

/** What to do when the `<N> triangles` header disagrees with the row count. */
export type CountPolicy = 'advisory' | 'strict';

/** What to do with non-blank content after the triangle section. */
export type TrailingPolicy = 'lenient' | 'strict';

export interface PipelineOptions {
  /** Per-axis distance below which two points are one vertex. */
  vertexTolerance?: number;
  /** Faces with area below this are degenerate. */
  areaEpsilon?: number;
  countPolicy?: CountPolicy;
  trailingPolicy?: TrailingPolicy;
  /** Set false to keep degenerate faces. */
  filterDegenerate?: boolean;
  dropDuplicateFaces?: boolean;
  /** Negate this coordinate on every vertex. Never applied unless named. */
  flipAxis?: Axis | null;
  /** Remove vertices no face references, renumbering faces. */
  compact?: boolean;
  logger?: Logger;
}

export interface ResolvedPipelineOptions {
  vertexTolerance: number;
  areaEpsilon: number;
  countPolicy: CountPolicy;
  trailingPolicy: TrailingPolicy;
  filterDegenerate: boolean;
  dropDuplicateFaces: boolean;
  flipAxis: Axis | null;
  compact: boolean;
  logger: Logger;
}

function positive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive finite number (got ${value})`);
  }
  return value;
}

/** Fill defaults and validate. */
export function resolvePipelineOptions(options: PipelineOptions = {}): ResolvedPipelineOptions {
  const flipAxis = options.flipAxis ?? null;
  if (flipAxis !== null && !AXES.includes(flipAxis)) {
    throw new RangeError(`flipAxis must be one of ${AXES.join(', ')} (got ${String(flipAxis)})`);
  }
  return {
    vertexTolerance: positive('vertexTolerance', options.vertexTolerance ?? DEFAULT_VERTEX_TOLERANCE),
    areaEpsilon: positive('areaEpsilon', options.areaEpsilon ?? DEFAULT_AREA_EPSILON),
    countPolicy: options.countPolicy ?? 'advisory',
    trailingPolicy: options.trailingPolicy ?? 'lenient',
    filterDegenerate: options.filterDegenerate ?? true,
    dropDuplicateFaces: options.dropDuplicateFaces ?? false,
    flipAxis,
    compact: options.compact ?? false,
    logger: options.logger ?? consoleLogger,
  };
}
