/**
 * Quality Reporter tests
 */

import { describe, it, expect } from 'vitest';
import type { AttributeNormalizationStats } from '../../../attributes/normalizer.js';
import type { GeometryCleaningStats } from '../../../geometry/cleaner.js';
import {
  compositeScore,
  estimateAreaKm2,
  generateQualityReport,
  gradeFor,
  qualityReportToJson,
  type QualityDimensions,
  type QualityInputs,
} from '../../../quality/reporter.js';
import { feature, makeLayer, point, square } from '../../utils/builders.js';

const geometryStats: GeometryCleaningStats = {
  inputCount: 10,
  nullCount: 1,
  invalidFound: 2,
  fixed: 2,
  unfixable: 0,
  dedupeCandidates: 9,
  duplicates: 1,
  outputCount: 8,
  samples: [],
};

const attributeStats: AttributeNormalizationStats = {
  sourceFieldCount: 4,
  renamed: {},
  truncated: [],
  dropped: ['OBJECTID'],
  promoted: {},
  trimmedValues: 0,
  strippedValues: 0,
  nullsStandardized: 0,
  nonConformantFields: 1,
};

const output = makeLayer(
  [feature(0, point(2, 48), { nom: 'A', pop: 1 }), feature(3, point(3, 49), { nom: null, pop: 2 })],
  {
    schema: [
      { name: 'nom', type: 'text' },
      { name: 'pop', type: 'integer' },
    ],
  }
);

function inputs(overrides: Partial<QualityInputs> = {}): QualityInputs {
  return {
    crs: { epsg: 2154, confidence: 'MEDIUM', method: 'extent-projected' },
    geometry: geometryStats,
    geometryRepaired: true,
    attributes: attributeStats,
    output,
    outputFormat: 'shapefile',
    targetEpsg: 4326,
    reprojected: true,
    renamedFields: { population_totale: 'populatio1' },
    textFallbacks: [{ field: 'tags', from: 'json' }],
    requestedEncoding: 'utf-8',
    sourceEncoding: 'latin1',
    encodingFallback: 'latin1',
    elapsedMs: 1234,
    now: () => new Date('2026-01-15T10:00:00Z'),
    ...overrides,
  };
}

const perfect: QualityDimensions = {
  geometryValidity: 100,
  crsConfidence: 100,
  attributeCompleteness: 100,
  schemaConformance: 100,
  duplicationRatio: 100,
};

describe('generateQualityReport', () => {
  it('scores each dimension and the weighted composite', () => {
    const report = generateQualityReport(inputs());

    expect(report.dimensions).toEqual({
      geometryValidity: 70,
      crsConfidence: 60,
      attributeCompleteness: 75,
      schemaConformance: 75,
      duplicationRatio: 88.9,
    });
    expect(report.compositeScore).toBe(72.6);
    expect(report.grade).toBe('C');
    expect(report.geometryErrorsFound).toBe(2);
    expect(report.geometryErrorsFixed).toBe(2);
    expect(report.nullGeometryCount).toBe(1);
    expect(report.duplicateCount).toBe(1);
    expect(report.generatedAt).toBe('2026-01-15T10:00:00.000Z');
  });

  it('summarizes the conversion', () => {
    expect(generateQualityReport(inputs()).summary).toEqual({
      featuresInput: 10,
      featuresOutput: 2,
      featuresLost: 8,
      fieldsInput: 4,
      fieldsOutput: 2,
      geometryKind: 'point',
      bbox: [2, 48, 3, 49],
      sourceEpsg: 2154,
      targetEpsg: 4326,
      reprojected: true,
      crsMethod: 'extent-projected',
      crsConfidence: 'MEDIUM',
      outputFormat: 'shapefile',
      encoding: 'latin1',
    });
  });

  it('describes each output column', () => {
    expect(generateQualityReport(inputs()).attributeStats).toEqual({
      nom: { type: 'text', nullCount: 1, nullRate: 50, uniqueCount: 1 },
      pop: { type: 'integer', nullCount: 0, nullRate: 0, uniqueCount: 2, min: 1, max: 2, mean: 1.5 },
    });
  });

  it('counts geometry types and records the processing time', () => {
    const report = generateQualityReport(inputs());

    expect(report.distribution).toEqual({ geometryTypes: { Point: 2 }, areaKm2: 0 });
    expect(report.processingTimeSeconds).toBe(1.23);
  });

  it('measures polygon area on the sphere', () => {
    const degree = makeLayer([feature(0, square(0, 0), { id: 1 }), feature(1, point(5, 5), { id: 2 })]);
    const km2 = estimateAreaKm2(degree, 4326);

    expect(km2).toBeGreaterThan(12_350);
    expect(km2).toBeLessThan(12_400);
  });

  it('brings projected output to WGS 84 before measuring', () => {
    const kilometre = makeLayer([feature(0, square(0, 0, 1000), { id: 1 })]);

    expect(estimateAreaKm2(kilometre, 3857)).toBe(1);
    expect(estimateAreaKm2(makeLayer([feature(0, null, { id: 1 })]), 3857)).toBeNull();
  });

  it('recommends follow-ups for repaired data', () => {
    expect(generateQualityReport(inputs()).recommendations).toEqual([
      '2 geometries required repair; verify the output visually',
      '1 feature without geometry dropped',
      '1 duplicate geometry removed',
      'Source CRS EPSG:2154 was inferred from the data extent; confirm it or declare source_epsg',
      'Attribute completeness is 75%; many values are missing',
      'Dropped identifier fields: OBJECTID',
      'Field names changed to fit shapefile: population_totale → populatio1',
      'Fields stored as text in shapefile: tags (json)',
      'Input was not valid utf-8; decoded as latin1. Check accented text',
    ]);
  });

  it('describes defects as kept when geometries were only assessed', () => {
    const report = generateQualityReport(
      inputs({
        geometryRepaired: false,
        crs: { epsg: 4326, confidence: 'LOW', method: 'fallback' },
        attributes: { ...attributeStats, dropped: [] },
        renamedFields: {},
        textFallbacks: [],
        encodingFallback: undefined,
      })
    );

    expect(report.recommendations).toEqual([
      '2 invalid geometries left as is; enable fix_geometries to repair',
      '1 feature without geometry',
      '1 duplicate geometry kept',
      'Source CRS could not be identified; EPSG:4326 was assumed. Declare source_epsg',
      'Attribute completeness is 75%; many values are missing',
    ]);
    expect(report.dimensions.crsConfidence).toBe(20);
  });

  it('scores empty inputs as complete', () => {
    const empty = makeLayer([]);
    const report = generateQualityReport(
      inputs({
        crs: { epsg: 4326, confidence: 'HIGH', method: 'declared' },
        geometry: { ...geometryStats, inputCount: 0, nullCount: 0, invalidFound: 0, fixed: 0, dedupeCandidates: 0, duplicates: 0, outputCount: 0 },
        attributes: { ...attributeStats, sourceFieldCount: 0, nonConformantFields: 0, dropped: [] },
        output: empty,
      })
    );

    expect(report.dimensions).toEqual(perfect);
    expect(report.compositeScore).toBe(100);
    expect(report.grade).toBe('A');
    expect(report.summary.bbox).toBeNull();
    expect(report.attributeStats).toEqual({});
    expect(report.distribution).toEqual({ geometryTypes: {}, areaKm2: null });
  });

  it('freezes the report', () => {
    const report = generateQualityReport(inputs());

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.summary)).toBe(true);
    expect(Object.isFrozen(report.recommendations)).toBe(true);
  });
});

describe('compositeScore', () => {
  it('is a weighted mean', () => {
    const dimensions: QualityDimensions = { ...perfect, crsConfidence: 20 };

    expect(compositeScore(dimensions)).toBe(84);
    expect(
      compositeScore(dimensions, {
        geometryValidity: 0,
        crsConfidence: 1,
        attributeCompleteness: 0,
        schemaConformance: 0,
        duplicationRatio: 0,
      })
    ).toBe(20);
  });

  it('scores zero when every weight is zero', () => {
    expect(
      compositeScore(perfect, {
        geometryValidity: 0,
        crsConfidence: 0,
        attributeCompleteness: 0,
        schemaConformance: 0,
        duplicationRatio: 0,
      })
    ).toBe(0);
  });
});

describe('gradeFor', () => {
  it.each([
    [100, 'A'],
    [90, 'A'],
    [89.9, 'B'],
    [80, 'B'],
    [70, 'C'],
    [60, 'D'],
    [59.9, 'F'],
    [0, 'F'],
  ])('grades %d as %s', (score, grade) => {
    expect(gradeFor(score)).toBe(grade);
  });
});

describe('qualityReportToJson', () => {
  it('uses snake_case keys', () => {
    const json = qualityReportToJson(generateQualityReport(inputs()));

    expect(Object.keys(json)).toEqual([
      'composite_score',
      'grade',
      'weights',
      'dimensions',
      'geometry_errors_found',
      'geometry_errors_fixed',
      'geometry_errors_unfixable',
      'null_geometry_count',
      'duplicate_count',
      'recommendations',
      'summary',
      'attribute_stats',
      'data_distribution',
      'processing_time_seconds',
      'generated_at',
    ]);
    expect(json['composite_score']).toBe(72.6);
    expect(json['dimensions']).toEqual({
      geometry_validity: 70,
      crs_confidence: 60,
      attribute_completeness: 75,
      schema_conformance: 75,
      duplication_ratio: 88.9,
    });
    expect(json['attribute_stats']).toEqual({
      nom: { type: 'text', null_count: 1, null_rate: 50, unique_count: 1 },
      pop: { type: 'integer', null_count: 0, null_rate: 0, unique_count: 2, min: 1, max: 2, mean: 1.5 },
    });
    expect(json['data_distribution']).toEqual({ geometry_types: { Point: 2 }, area_km2: 0 });
    expect(json['processing_time_seconds']).toBe(1.23);
    expect(json['summary']).toMatchObject({ features_input: 10, features_output: 2, features_lost: 8 });
  });
});
