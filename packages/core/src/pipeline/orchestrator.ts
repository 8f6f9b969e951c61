/**
 * Pipeline Orchestrator
 *
 * Single entry point for one conversion job. Stages run as a task graph:
 *
 * ```
 *            ┌─→ detect ────┐
 *   read ────┼─→ clean ─────┼─→ reproject ─┐
 *            └─→ normalize ─┼──────────────┼─→ write ─→ report
 * ```
 *
 * Every job owns a scratch directory (released on all exit paths) and a time
 * budget. The artifact is staged in scratch and published to the output
 * directory only after every stage has succeeded, so a failed job leaves no
 * output file behind. Failures surface as ConversionError subclasses.
 */

import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { normalizeAttributes, type NormalizationResult } from '../attributes/normalizer.js';
import { DEFAULT_CONFIG, type ConversionConfig } from '../core/config.js';
import { isConversionError, MalformedDataError, wrapStageError, type PipelineStage } from '../core/errors.js';
import type { CrsCandidate, JobSpec } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { withScratchSpace } from '../core/utils/scratch-space.js';
import { canonicalEncoding } from '../formats/encoding.js';
import { getFormat } from '../formats/format-registry.js';
import { cleanGeometries, type CleaningResult } from '../geometry/cleaner.js';
import { getCrsRegistry, type CrsRegistry } from '../projection/crs-registry.js';
import { detectCrs } from '../projection/detector.js';
import { reprojectLayer, type ReprojectionResult } from '../projection/reprojector.js';
import { generateQualityReport, qualityReportToJson, type QualityReport } from '../quality/reporter.js';
import { readLayer } from '../reader/format-reader.js';
import { mergeBranches, writeLayer, type WriteResult } from '../writer/format-writer.js';
import { JobBudget } from './job-budget.js';
import { parseJobSpec } from './job-schema.js';
import { TaskGraph } from './task-graph.js';

const log = createLogger({ module: 'orchestrator' });

export interface ConversionOptions {
  readonly config?: ConversionConfig;
  readonly registry?: CrsRegistry;
  /** Defaults to a random UUID */
  readonly jobId?: string;
  readonly now?: () => Date;
}

export interface JobResult {
  readonly jobId: string;
  readonly outputLocation: string;
  readonly featureCountOutput: number;
  readonly processingTimeSeconds: number;
  readonly qualityReport: QualityReport;
}

/**
 * Wire form of a job result (snake_case keys)
 */
export function jobResultToJson(result: JobResult): Record<string, unknown> {
  return {
    output_location: result.outputLocation,
    feature_count_output: result.featureCountOutput,
    processing_time_seconds: result.processingTimeSeconds,
    quality_report: qualityReportToJson(result.qualityReport),
  };
}

/**
 * Run one stage under the job budget, with start/finish logging
 */
async function runStage<T>(
  budget: JobBudget,
  jobLog: Logger,
  stage: PipelineStage,
  work: () => T | Promise<T>
): Promise<T> {
  budget.checkpoint(stage);
  const started = performance.now();
  jobLog.debug('Stage started', { stage });
  try {
    const result = await budget.race(stage, Promise.resolve().then(work));
    jobLog.info('Stage finished', { stage, durationMs: Math.round(performance.now() - started) });
    return result;
  } catch (error) {
    throw wrapStageError(error, stage);
  }
}

/**
 * Move the staged artifact to the output directory
 *
 * Not raced: an abandoned rename could still land after the job has failed.
 * The budget signal is checked between staging and rename instead.
 */
async function publish(budget: JobBudget, jobLog: Logger, outputLocation: string, bytes: Uint8Array): Promise<void> {
  budget.checkpoint('publish');
  try {
    await atomicWriteFile(outputLocation, bytes, { signal: budget.signal });
  } catch (error) {
    budget.checkpoint('publish');
    throw wrapStageError(error, 'publish');
  }
  jobLog.info('Stage finished', { stage: 'publish', output: outputLocation });
}

/**
 * Convert one dataset as described by `job`
 *
 * @param job - Wire descriptor (validated here) or an already validated JobSpec
 * @throws ConversionError subclasses; nothing is published on failure
 */
export async function runConversion(job: unknown, options: ConversionOptions = {}): Promise<JobResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const registry = options.registry ?? getCrsRegistry();
  const jobId = options.jobId ?? randomUUID();
  const jobLog = log.child({ jobId });

  const spec: JobSpec = parseJobSpec(job);
  const encoding = canonicalEncoding(spec.encoding);
  if (encoding === undefined) {
    throw new MalformedDataError(`Unsupported encoding '${spec.encoding}'`, 'job');
  }
  const output = getFormat(spec.outputFormat);
  // KML coordinates are WGS 84 by definition
  const targetEpsg = spec.targetEpsg ?? output.requiredEpsg;

  const budget = new JobBudget(config.budget, jobLog);
  budget.start();
  jobLog.info('Job started', {
    input: spec.inputLocation,
    outputFormat: spec.outputFormat,
    ...(targetEpsg !== undefined ? { targetEpsg } : {}),
  });

  try {
    const result = await withScratchSpace(
      { root: config.scratch.root, maxBytes: config.scratch.maxBytes, jobId },
      async (scratch) => {
        const graph = new TaskGraph();
        const stage = <T>(name: PipelineStage, work: () => T | Promise<T>): Promise<T> =>
          runStage(budget, jobLog, name, work);

        const read = graph.add('read', [], () =>
          stage('read', () =>
            readLayer(
              {
                inputLocation: spec.inputLocation,
                ...(spec.declaredFormat !== undefined ? { declaredFormat: spec.declaredFormat } : {}),
                encoding,
              },
              scratch
            )
          )
        );

        const detect = graph.add('detect', [read], () =>
          stage('detect', (): CrsCandidate =>
            detectCrs(read.value(), {
              ...(spec.sourceEpsg !== undefined ? { sourceEpsg: spec.sourceEpsg } : {}),
              fallbackEpsg: config.projection.fallbackEpsg,
              registry,
            })
          )
        );

        const clean = graph.add('clean', [read], () =>
          stage('clean', (): CleaningResult => cleanGeometries(read.value(), spec.fixGeometries ? 'repair' : 'assess'))
        );

        const normalize = graph.add('normalize', [read], () =>
          stage(
            'normalize',
            (): NormalizationResult =>
              normalizeAttributes(read.value(), {
                mode: spec.normalizeAttributes ? 'normalize' : 'assess',
                syntheticIdFields: config.attributes.syntheticIdFields,
                ...(output.maxFieldNameLength !== undefined ? { maxFieldNameLength: output.maxFieldNameLength } : {}),
              })
          )
        );

        const reproject = graph.add('reproject', [detect, clean], () =>
          stage(
            'reproject',
            (): ReprojectionResult => reprojectLayer(clean.value().layer, detect.value().epsg, targetEpsg, registry)
          )
        );

        const write = graph.add('write', [normalize, reproject], () =>
          stage('write', async (): Promise<WriteResult> => {
            const written = await writeLayer({
              layer: mergeBranches(reproject.value().layer, normalize.value().layer),
              format: spec.outputFormat,
              epsg: reproject.value().targetEpsg,
              encoding,
              strictFieldTypes: config.writer.strictFieldTypes,
              registry,
            });
            // Staged so the artifact counts against the scratch quota
            await scratch.writeFile(`output/${jobId}${written.extension}`, written.bytes);
            return written;
          })
        );

        const report = graph.add('report', [detect, clean, normalize, reproject, write], () =>
          stage('report', (): QualityReport => {
            const source = read.value().source;
            return generateQualityReport({
              crs: detect.value(),
              geometry: clean.value().stats,
              geometryRepaired: spec.fixGeometries,
              attributes: normalize.value().stats,
              output: write.value().layer,
              outputFormat: spec.outputFormat,
              targetEpsg: reproject.value().targetEpsg,
              reprojected: reproject.value().transformed,
              renamedFields: write.value().renamedFields,
              textFallbacks: write.value().textFallbacks,
              requestedEncoding: encoding,
              sourceEncoding: source.encoding,
              ...(source.encodingFallback !== undefined ? { encodingFallback: source.encodingFallback } : {}),
              elapsedMs: budget.elapsedMs,
              weights: config.quality.weights,
              registry,
              ...(options.now ? { now: options.now } : {}),
            });
          })
        );

        await graph.execute();

        const artifact = write.value();
        const outputLocation = join(config.outputDir, `${jobId}${artifact.extension}`);
        await publish(budget, jobLog, outputLocation, artifact.bytes);

        return {
          outputLocation,
          featureCountOutput: artifact.layer.features.length,
          qualityReport: report.value(),
        };
      }
    );

    const processingTimeSeconds = Math.round(budget.elapsedMs / 10) / 100;
    jobLog.info('Job finished', {
      output: result.outputLocation,
      features: result.featureCountOutput,
      score: result.qualityReport.compositeScore,
      grade: result.qualityReport.grade,
      processingTimeSeconds,
      softBudgetExceeded: budget.softExceeded,
    });
    return { jobId, ...result, processingTimeSeconds };
  } catch (error) {
    const failure = isConversionError(error) ? error : wrapStageError(error, 'job');
    jobLog.error('Job failed', { ...failure.toDiagnostic() });
    throw failure;
  } finally {
    budget.dispose();
  }
}
