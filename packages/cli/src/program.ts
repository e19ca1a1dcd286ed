/**
 * surfkit command line: inspect, clean and compose Format B surfaces.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  processSurf, serializeSurf, composeSceneFile, meshStats, normalBalance,
  nodeFileReader, MissingFileError, AXES,
  type Logger, type ProcessedSurf, type ComposedScene, type BoundingBox, type Vec3,
} from '@surfkit/kernel';
import { resolveOptions, type PipelineFlags } from './config.js';

/** Where commands write: results to `out`, progress and warnings to `err`. */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export const processIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return n;
}

function withPipelineOptions(cmd: Command): Command {
  return cmd
    .option('-c, --config <path>', 'JSON file with pipeline options')
    .option('-q, --quiet', 'Only print warnings and results')
    .option('--tolerance <n>', 'Vertex merge tolerance per axis', parseNumber)
    .option('--area-epsilon <n>', 'Drop faces with smaller area', parseNumber)
    .option('--strict-count', 'Fail when the triangle count header disagrees with the rows')
    .option('--strict-trailing', 'Fail on content after the triangle section')
    .option('--keep-degenerate', 'Keep zero-area faces')
    .option('--drop-duplicate-faces', 'Drop faces repeating an earlier vertex set')
    .addOption(new Option('--flip-axis <axis>', 'Negate one coordinate (inverts normals)').choices(AXES))
    .option('--compact', 'Remove vertices no face references');
}

function loggerFor(io: CliIO, quiet: boolean | undefined): Logger {
  return {
    info: (message) => { if (!quiet) io.err(`${message}\n`); },
    warn: (message) => io.err(`warning: ${message}\n`),
  };
}

function readSurface(file: string): string {
  const resolved = path.resolve(file);
  if (!nodeFileReader.exists(resolved)) {
    throw new MissingFileError(file, resolved);
  }
  return nodeFileReader.read(resolved);
}

// ─── Text reports ───────────────────────────────────────────────

function fmtVec(v: Vec3): string {
  return `[${v.join(', ')}]`;
}

function fmtBounds(b: BoundingBox | null): string {
  return b ? `${fmtVec(b.min)} .. ${fmtVec(b.max)}` : 'none';
}

export function formatReport(result: ProcessedSurf): string[] {
  const stats = meshStats(result.mesh);
  return [
    `source: ${result.source}`,
    `declared triangles: ${result.declaredCount ?? 'none'}`,
    `parsed triangles: ${result.parsedTriangles}`,
    `unique vertices: ${result.uniqueVertices}`,
    `dropped faces: ${result.droppedFaces}`,
    `duplicate faces: ${result.duplicateFaces}`,
    `removed vertices: ${result.removedVertices}`,
    `flipped axis: ${result.flippedAxis ?? 'none'}`,
    `vertices: ${stats.vertexCount}`,
    `triangles: ${stats.triangleCount}`,
    `area: min ${stats.minArea} max ${stats.maxArea} total ${stats.totalArea}`,
    `bounds: ${fmtBounds(stats.bounds)}`,
    `normal balance: ${fmtVec(normalBalance(result.mesh))}`,
  ];
}

export function formatScene({ scene, skipped }: ComposedScene): string[] {
  const lines = scene.objects.map((o) =>
    `${o.line}: ${o.name} trans ${fmtVec(o.translation)} tris ${o.mesh.triangleCount} bounds ${fmtBounds(o.mesh.bounds)}`
  );
  for (const s of skipped) {
    lines.push(`${s.line}: skipped ${s.path ?? '-'} (${s.error.name}: ${s.error.message})`);
  }
  lines.push(`objects: ${scene.objects.length}, triangles: ${scene.triangleCount}`);
  lines.push(`bounds: ${fmtBounds(scene.bounds)}`);
  return lines;
}

// ─── Commands ───────────────────────────────────────────────────

interface StatsFlags extends PipelineFlags {
  json?: boolean;
}

interface CleanFlags extends PipelineFlags {
  output?: string;
  title?: string;
}

interface SceneFlags extends PipelineFlags {
  root?: string;
  lenient?: boolean;
  json?: boolean;
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('surfkit')
    .description('Parse, deduplicate, repair and compose Format B triangle surfaces')
    .version('0.1.0')
    .configureOutput({
      writeOut: (text) => io.out(text),
      writeErr: (text) => io.err(text),
    });

  withPipelineOptions(
    program
      .command('stats')
      .description('Print what the pipeline read and repaired, plus mesh stats')
      .argument('<file>', 'Format B surface file')
      .option('--json', 'Print the report as JSON')
  ).action((file: string, flags: StatsFlags) => {
    const options = { ...resolveOptions(flags), logger: loggerFor(io, flags.quiet) };
    const result = processSurf(readSurface(file), file, options);
    if (flags.json) {
      const { mesh, warnings, ...report } = result;
      io.out(JSON.stringify({
        ...report,
        warnings: warnings.map((w) => w.message),
        stats: meshStats(mesh),
        normalBalance: normalBalance(mesh),
      }, null, 2) + '\n');
      return;
    }
    io.out(formatReport(result).join('\n') + '\n');
  });

  withPipelineOptions(
    program
      .command('clean')
      .description('Write the repaired surface as Format B with ids renumbered 1..M')
      .argument('<file>', 'Format B surface file')
      .option('-o, --output <path>', 'Output file (default: stdout)')
      .option('--title <text>', 'Leading comment line')
  ).action((file: string, flags: CleanFlags) => {
    const logger = loggerFor(io, flags.quiet);
    const result = processSurf(readSurface(file), file, { ...resolveOptions(flags), logger });
    const text = serializeSurf(result.mesh, { title: flags.title });
    if (!flags.output) {
      io.out(text);
      return;
    }
    fs.mkdirSync(path.dirname(path.resolve(flags.output)), { recursive: true });
    fs.writeFileSync(flags.output, text, 'utf-8');
    logger.info(
      `wrote ${result.mesh.triangleCount} triangles to ${flags.output} (dropped ${result.droppedFaces})`
    );
  });

  withPipelineOptions(
    program
      .command('scene')
      .description('Compose every read_surf entry of a deck into one scene')
      .argument('<deck>', 'Deck file with read_surf <path> [trans dx dy dz] lines')
      .option('--root <dir>', 'Resolve surface paths against this directory (default: the deck directory)')
      .option('--lenient', 'Skip and report failing entries instead of aborting')
      .option('--json', 'Print objects and bounds as JSON')
  ).action((deck: string, flags: SceneFlags) => {
    const composed = composeSceneFile(deck, {
      ...resolveOptions(flags),
      logger: loggerFor(io, flags.quiet),
      root: flags.root,
      mode: flags.lenient ? 'lenient' : 'fail-fast',
    });
    if (flags.json) {
      const { scene, skipped } = composed;
      io.out(JSON.stringify({
        objects: scene.objects.map((o) => ({
          name: o.name,
          path: o.path,
          line: o.line,
          translation: o.translation,
          triangles: o.mesh.triangleCount,
          bounds: o.mesh.bounds,
        })),
        skipped: skipped.map((s) => ({ line: s.line, path: s.path, error: s.error.message })),
        bounds: scene.bounds,
      }, null, 2) + '\n');
      return;
    }
    io.out(formatScene(composed).join('\n') + '\n');
  });

  return program;
}
