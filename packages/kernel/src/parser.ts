/**
 * Format B surface parser.
 *
 * Layout:
 *   <title or # comment lines>
 *   <N> triangles        (optional, may appear anywhere)
 *   Triangles
 *
 *   <id> x1 y1 z1 x2 y2 z2 x3 y3 z3
 *   ...
 *
 * The scan is an explicit state machine:
 *   SeekHeader → SeekSectionMarker → ReadingTriangles → Done
 * A count header seen first moves SeekHeader to SeekSectionMarker; the
 * marker moves either of them to ReadingTriangles. A triangle-shaped line
 * that cannot be read is an error, never a silent stop.
 */

import type { Vec3 } from './vec3.js';
import { FormatError, ParseError, ValidationError } from './errors.js';
import type { PipelineOptions } from './options.js';
import { resolvePipelineOptions } from './options.js';

export interface RawTriangle {
  /** Id as written; not required to be unique or contiguous. */
  id: number;
  vertices: [Vec3, Vec3, Vec3];
  /** 1-based line in the source text. */
  line: number;
}

export interface ParsedSurf {
  source: string;
  triangles: RawTriangle[];
  declaredCount: number | null;
  warnings: ValidationError[];
}

export type ParserState = 'SeekHeader' | 'SeekSectionMarker' | 'ReadingTriangles' | 'Done';

export const SECTION_KEYWORD = 'triangles';

/** Tokens per data row: id + 3 vertices × 3 axes. */
export const TOKENS_PER_TRIANGLE = 10;

const HEADER_RE = /^(\d+)\s+triangles$/i;
const INTEGER_RE = /^[-+]?\d+$/;
const NUMBER_RE = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/** Plain decimal or scientific notation; no hex, no Infinity, no NaN. */
export function isNumberToken(token: string): boolean {
  return NUMBER_RE.test(token);
}

function isSkippable(line: string): boolean {
  return line.length === 0 || line.startsWith('#');
}

function parseCoordinate(token: string, source: string, lineNo: number): number {
  if (!isNumberToken(token)) {
    throw new ParseError(source, lineNo, `coordinate "${token}" is not a number`, token);
  }
  const value = Number(token);
  if (!Number.isFinite(value)) {
    throw new ParseError(source, lineNo, `coordinate "${token}" is out of range`, token);
  }
  return value;
}

function parseRow(tokens: string[], source: string, lineNo: number): RawTriangle {
  if (tokens.length !== TOKENS_PER_TRIANGLE) {
    throw new ParseError(
      source,
      lineNo,
      `malformed triangle line: expected ${TOKENS_PER_TRIANGLE} tokens, got ${tokens.length}`
    );
  }
  const c = tokens.slice(1).map((t) => parseCoordinate(t, source, lineNo));
  return {
    id: Number.parseInt(tokens[0], 10),
    vertices: [
      [c[0], c[1], c[2]],
      [c[3], c[4], c[5]],
      [c[6], c[7], c[8]],
    ],
    line: lineNo,
  };
}

/**
 * Parse surface text into raw triangles in file order.
 *
 * @param source - File identity used in every error message
 */
export function parseSurf(text: string, source: string, options: PipelineOptions = {}): ParsedSurf {
  const opts = resolvePipelineOptions(options);
  const lines = text.split(/\r?\n/);
  const triangles: RawTriangle[] = [];
  let declaredCount: number | null = null;
  let state: ParserState = 'SeekHeader';

  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const line = lines[i].trim();
    const header = HEADER_RE.exec(line);

    switch (state) {
      case 'SeekHeader':
      case 'SeekSectionMarker': {
        if (header) {
          declaredCount = Number.parseInt(header[1], 10);
          state = 'SeekSectionMarker';
        } else if (line.toLowerCase() === SECTION_KEYWORD) {
          state = 'ReadingTriangles';
        }
        break;
      }

      case 'ReadingTriangles': {
        if (line.length === 0) {
          // The blank line after the marker is part of the format
          if (triangles.length > 0) state = 'Done';
          break;
        }
        if (header) {
          declaredCount = Number.parseInt(header[1], 10);
          state = 'Done';
          break;
        }
        const tokens = line.split(/\s+/);
        if (!INTEGER_RE.test(tokens[0])) {
          state = 'Done';
          if (opts.trailingPolicy === 'strict' && !isSkippable(line)) {
            throw new FormatError(source, `unexpected content after triangle section: "${line}"`, lineNo);
          }
          break;
        }
        triangles.push(parseRow(tokens, source, lineNo));
        break;
      }

      case 'Done': {
        if (header) {
          declaredCount = Number.parseInt(header[1], 10);
        } else if (opts.trailingPolicy === 'strict' && !isSkippable(line)) {
          throw new FormatError(source, `unexpected content after triangle section: "${line}"`, lineNo);
        }
        break;
      }
    }
  }

  if (state === 'SeekHeader' || state === 'SeekSectionMarker') {
    throw new FormatError(source, `no "Triangles" section marker found`);
  }

  const warnings: ValidationError[] = [];
  if (declaredCount !== null && declaredCount !== triangles.length) {
    const mismatch = new ValidationError(source, declaredCount, triangles.length);
    if (opts.countPolicy === 'strict') throw mismatch;
    opts.logger.warn(mismatch.message);
    warnings.push(mismatch);
  }

  return { source, triangles, declaredCount, warnings };
}
