/**
 * Analyze Command
 *
 * Runs the extraction pipeline against one local file or URL.
 */

import ora from 'ora';
import {
  FFprobeProvisioner,
  MediaInfoService,
  PartialContentFetcher,
  renderMediaInfo,
} from '@mediapeek/media';
import { ValidationError, type FileRecordSource } from '@mediapeek/core';
import { createLogger } from '@mediapeek/utils';
import type { CliConfig } from '../config/index.js';
import { recordForSource } from '../lib/source.js';
import { printError, printJson, printKeyValue, provenanceLabel } from '../lib/output.js';

export interface AnalyzeOptions {
  json?: boolean;
  size?: string;
}

function parseSize(size: string | undefined): number | undefined {
  if (size === undefined) return undefined;
  const value = Number(size);
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError('--size', `expected a whole number of bytes, got "${size}"`);
  }
  return value;
}

export function createService(config: CliConfig, records: FileRecordSource): MediaInfoService {
  const logger = createLogger({ app: 'cli' });

  return new MediaInfoService({
    records,
    provisioner: new FFprobeProvisioner({
      overridePath: config.ffprobePath,
      installDir: config.ffprobeInstallDir,
      autoInstall: config.ffprobeAutoInstall,
      logger: logger.child({ component: 'ffprobe-provisioner' }),
    }),
    fetcher: new PartialContentFetcher({
      maxBytes: config.headBytes,
      logger: logger.child({ component: 'partial-fetcher' }),
    }),
    headBytes: config.headBytes,
    probeTimeoutMs: config.probeTimeoutMs,
    logger: logger.child({ component: 'media-info' }),
  });
}

export async function analyzeCommand(
  config: CliConfig,
  source: string,
  options: AnalyzeOptions
): Promise<void> {
  const spinner = ora('Analyzing media file...').start();

  try {
    const record = await recordForSource(source, { size: parseSize(options.size) });
    const records: FileRecordSource = {
      findByKey: async key => (key === record.key ? record : null),
    };
    const result = await createService(config, records).getMediaInfo(record.key);
    if (!result.ok) {
      throw result.error;
    }
    const { info } = result.value;
    spinner.stop();

    if (options.json) {
      printJson({ fileName: record.fileName, ...info });
      return;
    }

    console.log(renderMediaInfo(info, record.fileName, { style: 'plain' }));
    console.log();
    printKeyValue('Source', provenanceLabel(info.provenance));
  } catch (error) {
    spinner.fail('Analysis failed');
    printError(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}
