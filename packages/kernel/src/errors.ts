/**
 * Error taxonomy for the surface pipeline.
 *
 * Every error names the file it came from and, where one exists, the line.
 * Callers branch on the class; the message is for humans.
 */

export class SurfError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Required structure is absent, or a line is malformed at the structural level. */
export class FormatError extends SurfError {
  readonly source: string;
  readonly line?: number;

  constructor(source: string, message: string, line?: number) {
    super(line === undefined ? `${source}: ${message}` : `${source}:${line}: ${message}`);
    this.source = source;
    this.line = line;
  }
}

/** A triangle-shaped line whose tokens cannot be read as a triangle. */
export class ParseError extends SurfError {
  readonly source: string;
  readonly line: number;
  readonly token?: string;

  constructor(source: string, line: number, message: string, token?: string) {
    super(`${source}:${line}: ${message}`);
    this.source = source;
    this.line = line;
    this.token = token;
  }
}

/** Declared triangle count disagrees with the rows actually read. */
export class ValidationError extends SurfError {
  readonly source: string;
  readonly declared: number;
  readonly parsed: number;

  constructor(source: string, declared: number, parsed: number) {
    super(`${source}: header declares ${declared} triangles but ${parsed} were read`);
    this.source = source;
    this.declared = declared;
    this.parsed = parsed;
  }
}

/** A scene entry points at a file that does not exist. */
export class MissingFileError extends SurfError {
  readonly declaredPath: string;
  readonly resolvedPath: string;

  constructor(declaredPath: string, resolvedPath: string) {
    super(`Surface file "${declaredPath}" not found (resolved to ${resolvedPath})`);
    this.declaredPath = declaredPath;
    this.resolvedPath = resolvedPath;
  }
}

/** A scene entry exists but could not be read; the I/O error is the `cause`. */
export class UnreadableFileError extends SurfError {
  readonly declaredPath: string;
  readonly resolvedPath: string;

  constructor(declaredPath: string, resolvedPath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Surface file "${declaredPath}" could not be read (${resolvedPath}): ${reason}`, { cause });
    this.declaredPath = declaredPath;
    this.resolvedPath = resolvedPath;
  }
}

/** Repair removed every face. */
export class DegenerateMeshError extends SurfError {
  readonly source: string;
  readonly dropped: number;

  constructor(source: string, dropped: number) {
    super(
      dropped === 0
        ? `${source}: mesh has no faces`
        : `${source}: all ${dropped} faces are degenerate`
    );
    this.source = source;
    this.dropped = dropped;
  }
}
