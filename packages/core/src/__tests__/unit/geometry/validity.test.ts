/**
 * Geometry validity predicate and repair
 */

import { describe, it, expect } from 'vitest';
import type { Geometry, Polygon } from 'geojson';
import { repairGeometry } from '../../../geometry/repair.js';
import { checkValidity } from '../../../geometry/validity.js';
import { bowtie, line, point, square } from '../../utils/builders.js';

describe('checkValidity', () => {
  it('accepts simple geometries', () => {
    expect(checkValidity(point(1, 2))).toEqual({ valid: true });
    expect(checkValidity(line([0, 0], [1, 1]))).toEqual({ valid: true });
    expect(checkValidity(square(0, 0))).toEqual({ valid: true });
  });

  it('flags self-intersecting rings', () => {
    const verdict = checkValidity(bowtie());
    expect(verdict.valid).toBe(false);
    expect(verdict.valid ? undefined : verdict.kind).toBe('SELF_INTERSECTION');
  });

  it('flags open rings', () => {
    const open: Geometry = {
      type: 'Polygon',
      coordinates: [
        [
          [0, 0],
          [1, 0],
          [1, 1],
          [0, 1],
        ],
      ],
    };
    expect(checkValidity(open)).toEqual({ valid: false, kind: 'INVALID_STRUCTURE', detail: 'exterior ring is not closed' });
  });

  it('flags too few points and non-finite coordinates', () => {
    expect(checkValidity(line([1, 1], [1, 1]))).toEqual({
      valid: false,
      kind: 'INVALID_STRUCTURE',
      detail: 'line has fewer than two distinct points',
    });
    expect(checkValidity(point(Number.NaN, 1))).toEqual({
      valid: false,
      kind: 'INVALID_STRUCTURE',
      detail: 'non-finite or missing coordinate',
    });
  });

  it('flags rings that enclose no area', () => {
    const flat: Polygon = {
      type: 'Polygon',
      coordinates: [
        [
          [0, 0],
          [1, 0],
          [2, 0],
          [0, 0],
        ],
      ],
    };
    expect(checkValidity(flat)).toMatchObject({ valid: false, kind: 'INVALID_STRUCTURE' });
  });

  it('flags empty collections', () => {
    expect(checkValidity({ type: 'GeometryCollection', geometries: [] }).valid).toBe(false);
    expect(checkValidity({ type: 'MultiPolygon', coordinates: [] }).valid).toBe(false);
  });
});

describe('repairGeometry', () => {
  it('splits a bowtie into a two-part multipolygon', () => {
    const repaired = repairGeometry(bowtie());
    expect(repaired.type).toBe('MultiPolygon');
    expect(repaired.type === 'MultiPolygon' ? repaired.coordinates.length : 0).toBe(2);
    expect(checkValidity(repaired)).toEqual({ valid: true });
  });

  it('closes open rings', () => {
    const repaired = repairGeometry({
      type: 'Polygon',
      coordinates: [
        [
          [0, 0],
          [1, 0],
          [1, 1],
          [0, 1],
        ],
      ],
    });
    expect(repaired).toEqual(square(0, 0));
  });

  it('drops repeated and non-finite positions from lines', () => {
    expect(repairGeometry(line([0, 0], [0, 0], [Number.NaN, 3], [2, 2]))).toEqual(line([0, 0], [2, 2]));
  });

  it('drops collinear vertices', () => {
    expect(repairGeometry(line([0, 0], [0, 0], [1, 1], [2, 2]))).toEqual(line([0, 0], [2, 2]));
  });

  it('returns an empty geometry of the same type when nothing survives', () => {
    expect(repairGeometry(line([1, 1], [1, 1]))).toEqual({ type: 'LineString', coordinates: [] });
    expect(repairGeometry(point(Number.POSITIVE_INFINITY, 0))).toEqual({ type: 'Point', coordinates: [] });
  });

  it('never adds ordinates', () => {
    const repaired = repairGeometry({
      type: 'LineString',
      coordinates: [
        [0, 0, 5],
        [0, 0, 5],
        [1, 1, 6],
      ],
    });
    expect(repaired).toEqual({
      type: 'LineString',
      coordinates: [
        [0, 0, 5],
        [1, 1, 6],
      ],
    });
  });

  it('drops degenerate holes', () => {
    const repaired = repairGeometry({
      type: 'Polygon',
      coordinates: [square(0, 0, 10).coordinates[0] ?? [], [[2, 2], [3, 3]]],
    });
    expect(repaired).toEqual(square(0, 0, 10));
  });
});
