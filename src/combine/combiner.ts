import fs from 'node:fs/promises';
import path from 'node:path';
import loggerModule, { type ComponentLogger } from '../logger.js';
import metricsModule, { MetricsRegistry } from '../metrics/index.js';
import { toError } from '../errors.js';
import type { RecordingSegment } from '../types.js';
import {
  DEFAULT_TOLERANCE_MS,
  dropCoveredSegments,
  formatSegmentFileName,
  groupContiguousSegments,
  parseSegmentFileName,
  type SegmentGroup
} from './segments.js';

/** Joins `inputs` in order into `outputPath` without re-encoding. */
export type ConcatSegments = (inputs: string[], outputPath: string) => Promise<void>;

export interface FileCombinerOptions {
  concat: ConcatSegments;
  keepSplitFiles?: boolean;
  toleranceMs?: number;
  timeZone?: string;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
}

export type CombinedGroup = {
  camera: string;
  output: string;
  inputs: string[];
  start: Date;
  end: Date;
  removed: string[];
};

export type FailedGroup = {
  camera: string;
  inputs: string[];
  error: string;
};

export type CombineReport = {
  directory: string;
  scanned: number;
  ignored: string[];
  untouched: string[];
  /** Segments already contained in a longer file, left out of any merge. */
  covered: string[];
  combined: CombinedGroup[];
  failed: FailedGroup[];
};

const WORKING_PREFIX = '.combining-';

export class FileCombiner {
  private readonly concat: ConcatSegments;
  private readonly keepSplitFiles: boolean;
  private readonly toleranceMs: number;
  private readonly timeZone: string;
  private readonly logger: ComponentLogger;
  private readonly metrics: MetricsRegistry;

  constructor(options: FileCombinerOptions) {
    this.concat = options.concat;
    this.keepSplitFiles = options.keepSplitFiles ?? true;
    this.toleranceMs = options.toleranceMs ?? DEFAULT_TOLERANCE_MS;
    this.timeZone = options.timeZone ?? 'UTC';
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  async combineDirectory(directory: string): Promise<CombineReport> {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    const segments: RecordingSegment[] = [];
    const ignored: string[] = [];

    for (const entry of entries) {
      if (!entry.isFile() || entry.name.startsWith('.')) {
        continue;
      }
      const segment = parseSegmentFileName(entry.name, { timeZone: this.timeZone, directory });
      if (segment) {
        segments.push(segment);
      } else {
        ignored.push(entry.name);
        this.logger.debug({ directory, file: entry.name }, 'Skipping file without segment timestamps');
      }
    }

    const report: CombineReport = {
      directory,
      scanned: segments.length,
      ignored: ignored.sort(),
      untouched: [],
      covered: [],
      combined: [],
      failed: []
    };

    for (const run of groupContiguousSegments(segments, this.toleranceMs)) {
      const { kept, covered } = dropCoveredSegments(run.segments);
      if (covered.length > 0) {
        report.covered.push(...covered.map(segment => segment.fileName));
        this.logger.debug(
          { directory, camera: run.camera, covered: covered.map(segment => segment.fileName) },
          'Skipping segments contained in a longer file'
        );
      }

      const group: SegmentGroup = { ...run, segments: kept };
      if (group.segments.length < 2) {
        report.untouched.push(...group.segments.map(segment => segment.fileName));
        this.metrics.recordCombineGroup('skipped');
        continue;
      }

      try {
        const combined = await this.mergeGroup(directory, group);
        report.combined.push(combined);
        this.metrics.recordCombineGroup('merged');
        this.metrics.recordCombineRemovedFiles(combined.removed.length);
      } catch (error) {
        const err = toError(error);
        const inputs = group.segments.map(segment => segment.fileName);
        report.failed.push({ camera: group.camera, inputs, error: err.message });
        this.metrics.recordCombineGroup('failed', { path: directory, reason: err.message });
        this.logger.error({ err, directory, camera: group.camera, inputs }, 'Failed to combine segments');
      }
    }

    this.logger.info(
      {
        directory,
        scanned: report.scanned,
        covered: report.covered.length,
        combined: report.combined.length,
        failed: report.failed.length,
        untouched: report.untouched.length
      },
      'Segment combination finished'
    );

    return report;
  }

  private async mergeGroup(directory: string, group: SegmentGroup): Promise<CombinedGroup> {
    const outputName = formatSegmentFileName(
      group.camera,
      group.start,
      group.end,
      group.extension,
      this.timeZone
    );
    const outputPath = path.join(directory, outputName);
    const inputs = group.segments.map(segment => segment.path);

    if (await pathExists(outputPath)) {
      throw new Error(`Combined file ${outputName} already exists`);
    }

    const workingPath = path.join(directory, `${WORKING_PREFIX}${outputName}`);
    try {
      await this.concat(inputs, workingPath);
      await fs.rename(workingPath, outputPath);
    } catch (error) {
      await fs.rm(workingPath, { force: true });
      throw error;
    }

    this.logger.info(
      { camera: group.camera, output: outputName, inputs: inputs.length },
      'Combined contiguous segments'
    );

    const removed: string[] = [];
    if (!this.keepSplitFiles) {
      for (const input of inputs) {
        try {
          await fs.unlink(input);
          removed.push(path.basename(input));
        } catch (error) {
          this.logger.warn({ err: error, file: input }, 'Failed to remove split segment');
        }
      }
    }

    return {
      camera: group.camera,
      output: outputName,
      inputs: group.segments.map(segment => segment.fileName),
      start: group.start,
      end: group.end,
      removed
    };
  }
}

async function pathExists(target: string) {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export default FileCombiner;
