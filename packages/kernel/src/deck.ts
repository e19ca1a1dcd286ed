/**
 * Scene description ("deck") parsing.
 *
 *   read_surf surf/body.surf                  # zero offset
 *   read_surf surf/arm.surf trans 10 0 0.5
 *
 * Text after `#` is a comment. Lines with any other command are ignored;
 * keywords after the path other than `trans` are ignored too.
 */

import type { Vec3 } from './vec3.js';
import { FormatError } from './errors.js';
import { isNumberToken } from './parser.js';

export const LOAD_COMMAND = 'read_surf';
export const TRANSLATE_KEYWORD = 'trans';

export interface DeckEntry {
  /** Path as written in the deck. */
  path: string;
  translation: Vec3;
  /** 1-based deck line. */
  line: number;
}

/**
 * Parse one deck line.
 *
 * @returns the entry, or null when the line is not a load command
 * @throws FormatError for a load command that cannot be read
 */
export function parseDeckLine(raw: string, line: number, source: string): DeckEntry | null {
  const hash = raw.indexOf('#');
  const text = (hash === -1 ? raw : raw.slice(0, hash)).trim();
  if (!text) return null;

  const tokens = text.split(/\s+/);
  if (tokens[0] !== LOAD_COMMAND) return null;
  if (tokens.length < 2) {
    throw new FormatError(source, `${LOAD_COMMAND} needs a file path`, line);
  }

  let translation: Vec3 = [0, 0, 0];
  const k = tokens.indexOf(TRANSLATE_KEYWORD, 2);
  if (k !== -1) {
    const values = tokens.slice(k + 1, k + 4);
    if (values.length < 3) {
      throw new FormatError(
        source,
        `${TRANSLATE_KEYWORD} needs 3 values (dx dy dz), got ${values.length}`,
        line
      );
    }
    const bad = values.find((t) => !isNumberToken(t));
    if (bad !== undefined) {
      throw new FormatError(source, `${TRANSLATE_KEYWORD} value "${bad}" is not a number`, line);
    }
    const huge = values.find((t) => !Number.isFinite(Number(t)));
    if (huge !== undefined) {
      throw new FormatError(source, `${TRANSLATE_KEYWORD} value "${huge}" is out of range`, line);
    }
    translation = [Number(values[0]), Number(values[1]), Number(values[2])];
  }

  return { path: tokens[1], translation, line };
}

/** Split deck text into lines paired with their 1-based numbers. */
export function deckLines(text: string): Array<[string, number]> {
  return text.split(/\r?\n/).map((l, i): [string, number] => [l, i + 1]);
}

/** All load commands in order. Fails on the first bad line. */
export function parseDeck(text: string, source: string): DeckEntry[] {
  const entries: DeckEntry[] = [];
  for (const [raw, line] of deckLines(text)) {
    const entry = parseDeckLine(raw, line, source);
    if (entry) entries.push(entry);
  }
  return entries;
}
