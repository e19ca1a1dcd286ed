import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { parseConfig, loadConfig, resolveOptions, ConfigError } from '../src/config.js';

describe('parseConfig', () => {
  it('accepts every pipeline option', () => {
    const text = JSON.stringify({
      vertexTolerance: 1e-9,
      areaEpsilon: 1e-8,
      countPolicy: 'strict',
      trailingPolicy: 'lenient',
      filterDegenerate: true,
      dropDuplicateFaces: false,
      flipAxis: null,
      compact: true,
    });
    expect(parseConfig(text, 'cfg.json')).toEqual({
      vertexTolerance: 1e-9,
      areaEpsilon: 1e-8,
      countPolicy: 'strict',
      trailingPolicy: 'lenient',
      filterDegenerate: true,
      dropDuplicateFaces: false,
      flipAxis: null,
      compact: true,
    });
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig('{"tolerance": 1}', 'cfg.json'))
      .toThrow("cfg.json: (root): Unrecognized key(s) in object: 'tolerance'");
  });

  it('rejects a non-positive tolerance with its path', () => {
    expect(() => parseConfig('{"vertexTolerance": -1}', 'cfg.json'))
      .toThrow('cfg.json: vertexTolerance: Number must be greater than 0');
  });

  it('rejects invalid JSON', () => {
    expect(() => parseConfig('{', 'cfg.json')).toThrow(ConfigError);
    expect(() => parseConfig('{', 'cfg.json')).toThrow('cfg.json: invalid JSON');
  });
});

describe('resolveOptions', () => {
  let dir: string;
  let file: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'surfkit-cfg-'));
    file = path.join(dir, 'surfkit.json');
    fs.writeFileSync(file, JSON.stringify({ vertexTolerance: 1e-6, countPolicy: 'strict', flipAxis: 'z' }));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('maps flags without a config file', () => {
    expect(resolveOptions({ tolerance: 0.5, strictTrailing: true, keepDegenerate: true })).toEqual({
      vertexTolerance: 0.5,
      trailingPolicy: 'strict',
      filterDegenerate: false,
    });
  });

  it('lets flags win over the file and keeps the rest', () => {
    expect(resolveOptions({ config: file, tolerance: 1e-3, compact: true })).toEqual({
      vertexTolerance: 1e-3,
      countPolicy: 'strict',
      flipAxis: 'z',
      compact: true,
    });
  });

  it('fails for a missing file', () => {
    expect(() => loadConfig(path.join(dir, 'none.json'))).toThrow(ConfigError);
  });
});
