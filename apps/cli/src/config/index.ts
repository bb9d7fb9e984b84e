/**
 * CLI Configuration
 *
 * Environment variables win over ~/.mediapeek/config.json, which wins over
 * the defaults.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, readFileSync } from 'node:fs';
import { getDefaultInstallDir } from '@mediapeek/core';
import { printError } from '../lib/output.js';

// Config file location
const CONFIG_DIR = join(homedir(), '.mediapeek');
const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

// Environment schema
const envSchema = z.object({
  MEDIA_INFO_ENABLED: booleanFlag.optional(),
  FFPROBE_PATH: z.string().optional(),
  FFPROBE_INSTALL_DIR: z.string().optional(),
  FFPROBE_AUTO_INSTALL: booleanFlag.optional(),
  MEDIA_INFO_HEAD_BYTES: z.coerce.number().int().min(1024).optional(),
  PROBE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

// Config file schema
const configFileSchema = z.object({
  mediaInfoEnabled: z.boolean().default(true),
  ffprobePath: z.string().optional(),
  ffprobeInstallDir: z.string().optional(),
  ffprobeAutoInstall: z.boolean().default(true),
  headBytes: z.number().int().min(1024).default(2 * 1024 * 1024),
  probeTimeoutMs: z.number().int().positive().default(30000),
});

type ConfigFile = z.infer<typeof configFileSchema>;

// Load config from file; a missing or unreadable file means defaults
function loadConfigFile(path: string): unknown {
  if (!existsSync(path)) {
    return {};
  }
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    return {};
  }
}

export interface CliConfig {
  mediaInfoEnabled: boolean;
  ffprobePath?: string;
  ffprobeInstallDir: string;
  ffprobeAutoInstall: boolean;
  headBytes: number;
  probeTimeoutMs: number;
  configFile: string;
}

export function resolveConfig(source: NodeJS.ProcessEnv, fileContent: unknown, configFile: string = CONFIG_FILE): CliConfig {
  const env = envSchema.parse(source);
  const file: ConfigFile = configFileSchema.parse(fileContent);

  return {
    mediaInfoEnabled: env.MEDIA_INFO_ENABLED ?? file.mediaInfoEnabled,
    ffprobePath: env.FFPROBE_PATH?.trim() || file.ffprobePath,
    ffprobeInstallDir: env.FFPROBE_INSTALL_DIR ?? file.ffprobeInstallDir ?? getDefaultInstallDir(),
    ffprobeAutoInstall: env.FFPROBE_AUTO_INSTALL ?? file.ffprobeAutoInstall,
    headBytes: env.MEDIA_INFO_HEAD_BYTES ?? file.headBytes,
    probeTimeoutMs: env.PROBE_TIMEOUT_MS ?? file.probeTimeoutMs,
    configFile,
  };
}

export function loadConfig(): CliConfig {
  dotenvConfig();
  try {
    return resolveConfig(process.env, loadConfigFile(CONFIG_FILE));
  } catch (error) {
    if (error instanceof z.ZodError) {
      for (const issue of error.issues) {
        printError(`Invalid config ${issue.path.join('.')}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }
}
