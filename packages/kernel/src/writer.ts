/**
 * Format B text export.
 *
 * Layout: comment title, `<M> triangles` header, `Triangles` marker, then
 * one row per face with ids renumbered 1..M. Coordinates use 6 digits after
 * the point and at least two exponent digits (1.000000e+00).
 */

import type { SurfMesh } from './mesh.js';
import { faceVertices } from './mesh.js';

export interface SurfWriteOptions {
  /** Text of the leading comment line. */
  title?: string;
  /** Digits after the decimal point. */
  precision?: number;
}

/** Scientific notation with a sign and at least two exponent digits. */
export function formatScientific(value: number, precision = 6): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot write non-finite coordinate ${value}`);
  }
  const [mantissa, exponent] = (value === 0 ? 0 : value).toExponential(precision).split('e');
  const sign = exponent.startsWith('-') ? '-' : '+';
  const digits = exponent.replace(/^[-+]/, '').padStart(2, '0');
  return `${mantissa}e${sign}${digits}`;
}

export function serializeSurf(mesh: SurfMesh, options: SurfWriteOptions = {}): string {
  if (mesh.triangleCount === 0) {
    throw new Error(`Cannot export empty mesh ${mesh.name} (0 triangles)`);
  }
  const title = options.title ?? `cleaned surface ${mesh.name}`;
  if (/[\r\n]/.test(title)) {
    throw new Error('Surface title must be a single line');
  }
  const precision = options.precision ?? 6;

  const out: string[] = [
    `# ${title}`,
    '',
    `${mesh.triangleCount} triangles`,
    '',
    'Triangles',
    '',
  ];
  for (let f = 0; f < mesh.triangleCount; f++) {
    const coords = faceVertices(mesh, f).flatMap((v) => v.map((c) => formatScientific(c, precision)));
    out.push(`${f + 1} ${coords.join(' ')}`);
  }
  return out.join('\n') + '\n';
}
