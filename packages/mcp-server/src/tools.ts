/**
 * MCP Tool Registrations — 8 tools wrapping the surface pipeline.
 *
 * Every tool returns JSON with { mesh_id | scene_id, type, readback } so the
 * LLM always knows the current state after every operation. Handlers are
 * exported so they can be exercised without a transport.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  processSurf, serializeSurf, composeSceneFile, nodeFileReader,
  stderrLogger, MissingFileError,
  type PipelineOptions,
} from '@surfkit/kernel';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as registry from './registry.js';

// ─── Parameter schemas ─────────────────────────────────────────

const pipelineShape = {
  vertex_tolerance: z.number().positive().finite().optional()
    .describe('Per-axis distance below which two points are one vertex (default 1e-12)'),
  area_epsilon: z.number().positive().finite().optional()
    .describe('Faces with smaller area are dropped as degenerate (default 1e-10)'),
  strict_count: z.boolean().optional()
    .describe('Fail when the "<N> triangles" header disagrees with the rows read (default: warn)'),
  strict_trailing: z.boolean().optional()
    .describe('Fail on non-blank content after the triangle section (default: ignore)'),
  keep_degenerate: z.boolean().optional().describe('Skip the degenerate-face filter'),
  drop_duplicate_faces: z.boolean().optional().describe('Drop faces repeating an earlier vertex set'),
  flip_axis: z.enum(['x', 'y', 'z']).optional()
    .describe('Negate this coordinate on every vertex. Inverts normals; only use when orientation is known wrong'),
  compact: z.boolean().optional().describe('Remove vertices no face references after repair'),
};

export const loadSurfShape = {
  path: z.string().min(1).describe('Path to a Format B surface file'),
  name: z.string().optional().describe('Optional name for the mesh (letters, digits, hyphens, underscores only)'),
  ...pipelineShape,
};

export const exportSurfShape = {
  mesh: z.string().describe('ID of mesh to export'),
  filename: z.string().optional().describe('Output filename (default: <mesh id>.surf)'),
  title: z.string().optional().describe('Text of the leading comment line'),
};

export const composeSceneShape = {
  deck: z.string().min(1).describe('Path to a deck with read_surf <path> [trans dx dy dz] lines'),
  root: z.string().optional().describe('Directory surface paths resolve against (default: the deck directory)'),
  lenient: z.boolean().optional().describe('Skip and report failing entries instead of aborting'),
  name: z.string().optional().describe('Optional name for the scene (letters, digits, hyphens, underscores only)'),
  ...pipelineShape,
};

export type PipelineParams = z.infer<z.ZodObject<typeof pipelineShape>>;
export type LoadSurfParams = z.infer<z.ZodObject<typeof loadSurfShape>>;
export type ExportSurfParams = z.infer<z.ZodObject<typeof exportSurfShape>>;
export type ComposeSceneParams = z.infer<z.ZodObject<typeof composeSceneShape>>;

/** Map snake_case tool parameters onto kernel options. */
export function pipelineOptionsFrom(params: PipelineParams): PipelineOptions {
  return {
    vertexTolerance: params.vertex_tolerance,
    areaEpsilon: params.area_epsilon,
    countPolicy: params.strict_count ? 'strict' : 'advisory',
    trailingPolicy: params.strict_trailing ? 'strict' : 'lenient',
    filterDegenerate: !params.keep_degenerate,
    dropDuplicateFaces: params.drop_duplicate_faces,
    flipAxis: params.flip_axis,
    compact: params.compact,
    // stdout carries the protocol
    logger: stderrLogger,
  };
}

export function exportDir(): string {
  return path.join(process.env.TMPDIR ?? '/tmp', 'surfkit');
}

// ─── Handlers ──────────────────────────────────────────────────

export function loadSurf(params: LoadSurfParams): registry.MeshResult {
  const resolved = path.resolve(params.path);
  if (!nodeFileReader.exists(resolved)) {
    throw new MissingFileError(params.path, resolved);
  }
  const text = nodeFileReader.read(resolved);
  const result = processSurf(text, params.path, pipelineOptionsFrom(params));
  return registry.create(params.path, result, params.name);
}

export function exportSurf(params: ExportSurfParams) {
  const mesh = registry.getMesh(params.mesh);
  const text = serializeSurf(mesh, { title: params.title });

  const dir = exportDir();
  fs.mkdirSync(dir, { recursive: true });
  const safeName = (params.filename ?? `${params.mesh}.surf`).replace(/[^a-zA-Z0-9_.-]/g, '_');
  if (/^\.*$/.test(safeName)) {
    throw new Error(`Invalid export filename "${params.filename}". It must contain a character other than dots.`);
  }
  const filePath = path.join(dir, safeName);
  fs.writeFileSync(filePath, text, 'utf-8');

  return {
    mesh_id: params.mesh,
    type: 'surf_export',
    file_path: filePath,
    file_size_bytes: Buffer.byteLength(text),
    triangle_count: mesh.triangleCount,
  };
}

export function composeScene(params: ComposeSceneParams): registry.SceneSummary {
  const { scene, skipped } = composeSceneFile(params.deck, {
    ...pipelineOptionsFrom(params),
    root: params.root,
    mode: params.lenient ? 'lenient' : 'fail-fast',
  });
  return registry.createScene(params.deck, scene, skipped, params.name);
}

function text(result: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(result) }] };
}

export function registerTools(server: McpServer): void {

  // ─── Meshes (5) ──────────────────────────────────────────────

  server.tool(
    'load_surf',
    'Parse a Format B surface file, merge duplicate vertices, drop degenerate faces and store the cleaned mesh. Returns counts of what was repaired plus mesh stats.',
    loadSurfShape,
    async (params) => text(loadSurf(params))
  );

  server.tool(
    'get_mesh',
    'Get the repair report and stats (counts, areas, bounds, normal balance) for a loaded mesh.',
    {
      mesh: z.string().describe('ID of mesh to query'),
      area_epsilon: z.number().positive().finite().optional()
        .describe('Area below which faces count as degenerate in the stats'),
    },
    async ({ mesh, area_epsilon }) => text(registry.describe(mesh, area_epsilon))
  );

  server.tool(
    'export_surf',
    'Write a loaded mesh as a cleaned Format B file with ids renumbered 1..M. Call load_surf first.',
    exportSurfShape,
    async (params) => text(exportSurf(params))
  );

  server.tool(
    'list_meshes',
    'List all loaded meshes with their repair reports.',
    {},
    async () => {
      const meshes = registry.list();
      return text({ count: meshes.length, meshes });
    }
  );

  server.tool(
    'delete_mesh',
    'Remove a mesh from the registry.',
    {
      mesh: z.string().describe('ID of mesh to delete'),
    },
    async ({ mesh }) => {
      registry.remove(mesh);
      return text({ deleted: mesh, remaining: registry.list().length });
    }
  );

  // ─── Scenes (3) ──────────────────────────────────────────────

  server.tool(
    'compose_scene',
    'Load every read_surf entry of a deck, apply each trans offset after repair, and return the objects plus the global bounding box.',
    composeSceneShape,
    async (params) => text(composeScene(params))
  );

  server.tool(
    'get_scene',
    'Get objects, skipped entries and bounds of a composed scene.',
    {
      scene: z.string().describe('ID of scene to query'),
    },
    async ({ scene }) => text(registry.getScene(scene))
  );

  server.tool(
    'list_scenes',
    'List all composed scenes.',
    {},
    async () => {
      const scenes = registry.listScenes();
      return text({ count: scenes.length, scenes });
    }
  );
}
