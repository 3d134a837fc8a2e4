import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import ffmpeg from 'fluent-ffmpeg';
import type { ConcatSegments } from './combiner.js';

export type FfmpegConcatOptions = {
  ffmpegPath?: string;
  /** Where the concat list file is written; defaults to the OS temp dir. */
  workDir?: string;
};

/** The bundled binary is only looked up when no override is configured. */
export async function resolveFfmpegPath(override?: string): Promise<string> {
  if (override && override.trim().length > 0) {
    return override;
  }
  const installer = await import('@ffmpeg-installer/ffmpeg');
  return installer.default.path;
}

/** Entry for ffmpeg's concat demuxer list; single quotes are closed, escaped and reopened. */
export function formatConcatEntry(filePath: string): string {
  return `file '${filePath.replace(/'/g, `'\\''`)}'`;
}

export function createFfmpegConcat(options: FfmpegConcatOptions = {}): ConcatSegments {
  let binary: Promise<string> | null = null;

  return async (inputs, outputPath) => {
    binary ??= resolveFfmpegPath(options.ffmpegPath);
    const ffmpegPath = await binary;
    const listDir = await fs.mkdtemp(path.join(options.workDir ?? os.tmpdir(), 'clipwarden-concat-'));
    const listPath = path.join(listDir, 'segments.txt');
    try {
      const lines = inputs.map(input => formatConcatEntry(path.resolve(input)));
      await fs.writeFile(listPath, `${lines.join('\n')}\n`, 'utf-8');

      await new Promise<void>((resolve, reject) => {
        ffmpeg()
          .setFfmpegPath(ffmpegPath)
          .input(listPath)
          .inputOptions(['-f', 'concat', '-safe', '0'])
          .outputOptions(['-c', 'copy', '-map', '0'])
          .output(outputPath)
          .on('end', () => resolve())
          .on('error', (error: Error) => reject(error))
          .run();
      });
    } finally {
      await fs.rm(listDir, { recursive: true, force: true });
    }
  };
}
