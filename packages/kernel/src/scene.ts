/**
 * Scene composition — many surface files, each placed by a translation,
 * combined into one scene with a global bounding box.
 *
 * Entries are processed in deck order. In fail-fast mode the first error
 * (deck line or mesh) aborts the scene; in lenient mode every failing line
 * is recorded in `skipped` and the rest still load. Either way the outcome
 * depends only on the inputs, never on timing.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Vec3, BoundingBox } from './vec3.js';
import { freezeBounds, mergeBounds } from './vec3.js';
import type { SurfMesh } from './mesh.js';
import { translateMesh } from './mesh.js';
import type { DeckEntry } from './deck.js';
import { deckLines, parseDeckLine } from './deck.js';
import type { ProcessedSurf } from './pipeline.js';
import { processSurf } from './pipeline.js';
import type { PipelineOptions } from './options.js';
import { resolvePipelineOptions } from './options.js';
import { FormatError, MissingFileError, SurfError, UnreadableFileError } from './errors.js';

export interface SceneObject {
  /** File base name. */
  readonly name: string;
  /** Path as written in the deck. */
  readonly path: string;
  readonly resolvedPath: string;
  /** Repaired and translated. */
  readonly mesh: SurfMesh;
  readonly translation: Vec3;
  readonly line: number;
  readonly report: Omit<ProcessedSurf, 'mesh'>;
}

export interface SkippedEntry {
  line: number;
  /** Declared path, when the line got far enough to have one. */
  path: string | null;
  error: SurfError;
}

/** Immutable object list with a lazily computed, cached bounding box. */
export class Scene {
  readonly objects: readonly SceneObject[];
  private cachedBounds: BoundingBox | null | undefined;

  constructor(objects: readonly SceneObject[] = []) {
    this.objects = Object.freeze([...objects]);
  }

  get bounds(): BoundingBox | null {
    if (this.cachedBounds === undefined) {
      this.cachedBounds = freezeBounds(this.objects.reduce<BoundingBox | null>(
        (box, o) => mergeBounds(box, o.mesh.bounds),
        null,
      ));
    }
    return this.cachedBounds;
  }

  get triangleCount(): number {
    return this.objects.reduce((n, o) => n + o.mesh.triangleCount, 0);
  }

  /** New scene with `object` appended; this one is unchanged. */
  with(object: SceneObject): Scene {
    return new Scene([...this.objects, object]);
  }
}

export interface ComposedScene {
  scene: Scene;
  skipped: SkippedEntry[];
}

/** File access for composition. Reads whole files; holds nothing open. */
export interface FileReader {
  exists(filePath: string): boolean;
  read(filePath: string): string;
}

export const nodeFileReader: FileReader = {
  exists: (filePath) => fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false,
  read: (filePath) => fs.readFileSync(filePath, 'utf-8'),
};

export type CompositionMode = 'fail-fast' | 'lenient';

export interface SceneOptions extends PipelineOptions {
  /** Directory deck paths are resolved against. Defaults to the working directory. */
  root?: string;
  mode?: CompositionMode;
  reader?: FileReader;
  /** Deck identity for error messages. */
  deckName?: string;
}

/** Resolve, read and process one deck entry. */
export function loadSceneObject(entry: DeckEntry, root: string, reader: FileReader, options: PipelineOptions): SceneObject {
  const resolvedPath = path.resolve(root, entry.path);
  if (!reader.exists(resolvedPath)) {
    throw new MissingFileError(entry.path, resolvedPath);
  }
  let text: string;
  try {
    text = reader.read(resolvedPath);
  } catch (err) {
    throw new UnreadableFileError(entry.path, resolvedPath, err);
  }
  const { mesh, ...report } = processSurf(text, entry.path, options);
  return {
    name: path.basename(entry.path),
    path: entry.path,
    resolvedPath,
    mesh: translateMesh(mesh, entry.translation),
    translation: entry.translation,
    line: entry.line,
    report,
  };
}

export function composeScene(deckText: string, options: SceneOptions = {}): ComposedScene {
  const opts = resolvePipelineOptions(options);
  const { logger } = opts;
  const root = options.root ?? process.cwd();
  const mode = options.mode ?? 'fail-fast';
  const reader = options.reader ?? nodeFileReader;
  const deckName = options.deckName ?? 'deck';

  let scene = new Scene();
  const skipped: SkippedEntry[] = [];
  let commands = 0;

  for (const [raw, line] of deckLines(deckText)) {
    let entry: DeckEntry | null = null;
    try {
      entry = parseDeckLine(raw, line, deckName);
      if (!entry) continue;
      commands++;
      const object = loadSceneObject(entry, root, reader, opts);
      scene = scene.with(object);
      logger.info(
        `loaded ${object.name} trans=(${object.translation.join(', ')}) tris=${object.mesh.triangleCount}`
      );
    } catch (err) {
      if (mode === 'fail-fast' || !(err instanceof SurfError)) throw err;
      if (!entry) commands++;
      skipped.push({ line, path: entry?.path ?? null, error: err });
      logger.warn(`skipped ${deckName}:${line}: ${err.message}`);
    }
  }

  if (commands === 0) {
    throw new FormatError(deckName, 'no read_surf commands found');
  }

  return { scene, skipped };
}

/** Read a deck from disk; paths resolve against its directory unless `root` is given. */
export function composeSceneFile(deckPath: string, options: SceneOptions = {}): ComposedScene {
  const reader = options.reader ?? nodeFileReader;
  const resolved = path.resolve(deckPath);
  if (!reader.exists(resolved)) {
    throw new MissingFileError(deckPath, resolved);
  }
  return composeScene(reader.read(resolved), {
    ...options,
    reader,
    root: options.root ?? path.dirname(resolved),
    deckName: options.deckName ?? deckPath,
  });
}
