/**
 * FFProbe Wrapper
 *
 * Safe wrapper for ffprobe command execution.
 * Extracts container, stream and chapter metadata in JSON format.
 */

import { executeCommand, type CommandResult, type CommandRunner } from '@mediapeek/utils';
import { ProbeError, err, type Result } from '@mediapeek/core';
import { parseProbeOutput } from './parseProbeOutput.js';
import type { ProbedMediaInfo } from '../types.js';

export const DEFAULT_PROBE_TIMEOUT_MS = 30000;

export interface FFProbeOptions {
  timeout?: number;
  runner?: CommandRunner;
}

export class FFProbe {
  private readonly ffprobePath: string;
  private readonly timeout: number;
  private readonly runner: CommandRunner;

  constructor(ffprobePath: string = 'ffprobe', options: FFProbeOptions = {}) {
    this.ffprobePath = ffprobePath;
    this.timeout = options.timeout ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.runner = options.runner ?? executeCommand;
  }

  static buildArgs(filePath: string): string[] {
    return [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      '-show_chapters',
      filePath,
    ];
  }

  /**
   * Probe a media file. sizeBytes is the real size of the file the head was
   * cut from; `truncated` is set when the probed path is only that head.
   */
  async probe(filePath: string, sizeBytes: number, truncated = false): Promise<Result<ProbedMediaInfo, ProbeError>> {
    let result: CommandResult;
    try {
      result = await this.runner(this.ffprobePath, FFProbe.buildArgs(filePath), {
        timeout: this.timeout,
      });
    } catch (error) {
      return err(new ProbeError('spawn', error instanceof Error ? error.message : String(error), {
        command: this.ffprobePath,
      }));
    }

    if (result.timedOut) {
      return err(new ProbeError('timeout', `ffprobe did not finish within ${this.timeout}ms`, {
        duration: result.duration,
      }));
    }

    if (result.exitCode !== 0) {
      return err(new ProbeError('exit-code', `ffprobe exited with code ${result.exitCode}`, {
        exitCode: result.exitCode,
        stderr: result.stderr.substring(0, 1000),
      }));
    }

    return parseProbeOutput(result.stdout, sizeBytes, truncated);
  }
}
