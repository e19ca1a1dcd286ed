// Public API
export type { Vec3, BoundingBox, Axis } from './vec3.js';
export { AXES, axisIndex, boundsOf, mergeBounds } from './vec3.js';

// Errors
export {
  SurfError, FormatError, ParseError, ValidationError,
  MissingFileError, UnreadableFileError, DegenerateMeshError,
} from './errors.js';

// Options + logging
export type { PipelineOptions, ResolvedPipelineOptions, CountPolicy, TrailingPolicy } from './options.js';
export { resolvePipelineOptions, DEFAULT_VERTEX_TOLERANCE, DEFAULT_AREA_EPSILON } from './options.js';
export type { Logger } from './logger.js';
export { consoleLogger, stderrLogger, silentLogger } from './logger.js';

// Mesh
export type { Face, SurfMesh } from './mesh.js';
export { createMesh, freezeMesh, faceVertices, translateMesh } from './mesh.js';

// Parse → dedup → repair
export type { RawTriangle, ParsedSurf, ParserState } from './parser.js';
export { parseSurf, SECTION_KEYWORD } from './parser.js';
export { VertexIndex, buildIndexedMesh } from './dedup.js';
export type { RepairReport, DegenerateFilterResult } from './repair.js';
export {
  repairMesh, filterDegenerate, dropDuplicateFaces,
  flipAxis, compactVertices, triangleArea,
} from './repair.js';
export type { ProcessedSurf } from './pipeline.js';
export { processSurf } from './pipeline.js';

// Export + diagnostics
export type { SurfWriteOptions } from './writer.js';
export { serializeSurf, formatScientific } from './writer.js';
export type { MeshStats, FaceFrame } from './stats.js';
export { meshStats, faceCentersAndNormals, normalBalance } from './stats.js';

// Scenes
export type { DeckEntry } from './deck.js';
export { parseDeck, parseDeckLine, LOAD_COMMAND } from './deck.js';
export type {
  SceneObject, SkippedEntry, ComposedScene, FileReader,
  CompositionMode, SceneOptions,
} from './scene.js';
export { Scene, composeScene, composeSceneFile, loadSceneObject, nodeFileReader } from './scene.js';
