import type { Vec3, FileReader, Logger } from '../src/index.js';
import { vi } from 'vitest';

export type Tri = [Vec3, Vec3, Vec3];

export const UNIT_TRI: Tri = [[0, 0, 0], [1, 0, 0], [0, 1, 0]];

/** Tetrahedron corners: four distinct, non-degenerate faces. */
export const TETRA: Tri[] = [
  [[0, 0, 0], [1, 0, 0], [0, 1, 0]],
  [[0, 0, 0], [1, 0, 0], [0, 0, 1]],
  [[0, 0, 0], [0, 1, 0], [0, 0, 1]],
  [[1, 0, 0], [0, 1, 0], [0, 0, 1]],
];

export function row(id: number, tri: Tri): string {
  return `${id} ${tri.flat().join(' ')}`;
}

/** Format B text with a title, count header and marker. */
export function surfText(tris: Tri[], declared: number | null = tris.length): string {
  const lines = ['# test surface', ''];
  if (declared !== null) lines.push(`${declared} triangles`, '');
  lines.push('Triangles', '');
  tris.forEach((t, i) => lines.push(row(i + 1, t)));
  return lines.join('\n') + '\n';
}

export function memoryReader(files: Record<string, string>): FileReader {
  return {
    exists: (p) => Object.hasOwn(files, p),
    read: (p) => {
      const text = files[p];
      if (text === undefined) throw new Error(`no such file ${p}`);
      return text;
    },
  };
}

export function mockLogger() {
  return { info: vi.fn<Logger['info']>(), warn: vi.fn<Logger['warn']>() };
}

/** Run fn and return what it threw, which must be an instance of type. */
export function thrown<T extends Error>(fn: () => unknown, type: abstract new (...args: never[]) => T): T {
  try {
    fn();
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`expected function to throw ${type.name}`);
}
