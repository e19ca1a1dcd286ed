import { describe, it, expect } from 'vitest';
import { parseSurf } from '../src/parser.js';
import { FormatError, ParseError, ValidationError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { TETRA, UNIT_TRI, mockLogger, row, surfText, thrown } from './helpers.js';

const quiet = { logger: silentLogger };

describe('parseSurf', () => {

  it('reads rows in file order with ids and line numbers', () => {
    const parsed = parseSurf(surfText(TETRA), 'tetra.surf', quiet);
    expect(parsed.source).toBe('tetra.surf');
    expect(parsed.declaredCount).toBe(4);
    expect(parsed.warnings).toEqual([]);
    expect(parsed.triangles.map((t) => t.id)).toEqual([1, 2, 3, 4]);
    // title, blank, header, blank, marker, blank → first row on line 7
    expect(parsed.triangles[0].line).toBe(7);
    expect(parsed.triangles[3].vertices).toEqual(TETRA[3]);
  });

  it('accepts scientific and signed notation', () => {
    const text = 'Triangles\n1 1.5e-3 -2E+2 .5 +4 0. 1e0 -0.25 3 7\n';
    const [tri] = parseSurf(text, 'sci.surf', quiet).triangles;
    expect(tri.vertices).toEqual([[0.0015, -200, 0.5], [4, 0, 1], [-0.25, 3, 7]]);
  });

  it('keeps non-contiguous and repeated ids as written', () => {
    const text = ['Triangles', row(7, UNIT_TRI), row(7, TETRA[1]), row(2, TETRA[2])].join('\n');
    expect(parseSurf(text, 'ids.surf', quiet).triangles.map((t) => t.id)).toEqual([7, 7, 2]);
  });

  it('matches the marker case-insensitively and ignores surrounding whitespace', () => {
    const text = `   TRIANGLES  \n${row(1, UNIT_TRI)}\n`;
    expect(parseSurf(text, 'case.surf', quiet).triangles).toHaveLength(1);
  });

  it('skips other header lines before the marker', () => {
    const text = ['surface from mesher', '3 points', '1 triangles', 'Triangles', row(1, UNIT_TRI)].join('\n');
    const parsed = parseSurf(text, 'hdr.surf', quiet);
    expect(parsed.declaredCount).toBe(1);
    expect(parsed.triangles).toHaveLength(1);
  });

  it('fails with FormatError naming the file when the marker is missing', () => {
    const err = thrown(() => parseSurf(`2 triangles\n${row(1, UNIT_TRI)}\n`, 'nomarker.surf', quiet), FormatError);
    expect(err).toBeInstanceOf(FormatError);
    expect(err.source).toBe('nomarker.surf');
    expect(err.message).toBe('nomarker.surf: no "Triangles" section marker found');
  });

  it('fails with ParseError on a non-numeric coordinate', () => {
    const text = ['Triangles', row(1, UNIT_TRI), '2 0 0 0 1 0 0 0 abc 0'].join('\n');
    const err = thrown(() => parseSurf(text, 'bad.surf', quiet), ParseError);
    expect(err).toBeInstanceOf(ParseError);
    expect(err.line).toBe(3);
    expect(err.token).toBe('abc');
    expect(err.message).toBe('bad.surf:3: coordinate "abc" is not a number');
  });

  it('rejects hex, Infinity and NaN coordinates', () => {
    for (const token of ['0x10', 'Infinity', 'NaN']) {
      const text = `Triangles\n1 0 0 0 1 0 0 0 1 ${token}\n`;
      expect(() => parseSurf(text, 'x.surf', quiet)).toThrow(ParseError);
    }
  });

  it('fails with ParseError on a coordinate that overflows to Infinity', () => {
    const text = ['Triangles', '1 0 0 0 1e400 0 0 0 1 0', row(2, UNIT_TRI)].join('\n');
    const err = thrown(() => parseSurf(text, 'huge.surf', quiet), ParseError);
    expect(err.line).toBe(2);
    expect(err.token).toBe('1e400');
    expect(err.message).toBe('huge.surf:2: coordinate "1e400" is out of range');
  });

  it('fails with ParseError on an integer-led line with the wrong token count', () => {
    const text = ['Triangles', row(1, UNIT_TRI), '2 0 0 0 1 0 0'].join('\n');
    const err = thrown(() => parseSurf(text, 'short.surf', quiet), ParseError);
    expect(err).toBeInstanceOf(ParseError);
    expect(err.line).toBe(3);
    expect(err.message).toBe(
      'short.surf:3: malformed triangle line: expected 10 tokens, got 7'
    );
  });

  it('fails on too many tokens too', () => {
    const text = `Triangles\n${row(1, UNIT_TRI)} 5\n`;
    expect(() => parseSurf(text, 'long.surf', quiet)).toThrow(ParseError);
  });

  it('stops at a line that does not begin with an integer', () => {
    const text = ['Triangles', row(1, UNIT_TRI), 'end of data', row(2, TETRA[1])].join('\n');
    expect(parseSurf(text, 'prose.surf', quiet).triangles).toHaveLength(1);
  });

  it('skips the blank line after the marker but stops at a blank after rows', () => {
    const text = ['Triangles', '', '', row(1, UNIT_TRI), '', row(2, TETRA[1])].join('\n');
    expect(parseSurf(text, 'blank.surf', quiet).triangles).toHaveLength(1);
  });

  it('accepts a count header after the section', () => {
    const text = ['Triangles', row(1, UNIT_TRI), '', '1 triangles'].join('\n');
    const parsed = parseSurf(text, 'late.surf', quiet);
    expect(parsed.declaredCount).toBe(1);
    expect(parsed.warnings).toEqual([]);
  });

  it('treats a count header directly after the rows as the end of the section', () => {
    const text = ['Triangles', row(1, UNIT_TRI), '1 triangles'].join('\n');
    const parsed = parseSurf(text, 'late.surf', quiet);
    expect(parsed.triangles).toHaveLength(1);
    expect(parsed.declaredCount).toBe(1);
  });

  it('returns a null declared count when there is no header', () => {
    const parsed = parseSurf(surfText([UNIT_TRI], null), 'nohdr.surf', quiet);
    expect(parsed.declaredCount).toBeNull();
    expect(parsed.warnings).toEqual([]);
  });

  describe('count mismatch', () => {
    it('is advisory by default: recorded and logged', () => {
      const logger = mockLogger();
      const parsed = parseSurf(surfText(TETRA.slice(0, 2), 3), 'count.surf', { logger });
      expect(parsed.triangles).toHaveLength(2);
      expect(parsed.warnings).toHaveLength(1);
      expect(parsed.warnings[0]).toBeInstanceOf(ValidationError);
      expect(parsed.warnings[0].declared).toBe(3);
      expect(parsed.warnings[0].parsed).toBe(2);
      expect(logger.warn).toHaveBeenCalledWith('count.surf: header declares 3 triangles but 2 were read');
    });

    it('throws under the strict count policy', () => {
      expect(() =>
        parseSurf(surfText(TETRA.slice(0, 2), 3), 'count.surf', { ...quiet, countPolicy: 'strict' })
      ).toThrow(ValidationError);
    });
  });

  describe('trailing content', () => {
    const text = ['Triangles', row(1, UNIT_TRI), '', '# a comment', 'points follow'].join('\n');

    it('is ignored under the lenient policy', () => {
      expect(parseSurf(text, 'tail.surf', quiet).triangles).toHaveLength(1);
    });

    it('is a FormatError with its line under the strict policy', () => {
      const err = thrown(() => parseSurf(text, 'tail.surf', { ...quiet, trailingPolicy: 'strict' }), FormatError);
      expect(err).toBeInstanceOf(FormatError);
      expect(err.line).toBe(5);
    });

    it('still allows blank lines, comments and a late header under the strict policy', () => {
      const ok = ['Triangles', row(1, UNIT_TRI), '', '# done', '1 triangles', ''].join('\n');
      expect(parseSurf(ok, 'tail.surf', { ...quiet, trailingPolicy: 'strict' }).declaredCount).toBe(1);
    });
  });
});
