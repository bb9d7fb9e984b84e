/**
 * Provision Command
 *
 * Finds or installs ffprobe and reports where it ended up.
 */

import ora from 'ora';
import { formatPlatformKey } from '@mediapeek/core';
import { FFprobeProvisioner } from '@mediapeek/media';
import { createLogger } from '@mediapeek/utils';
import type { CliConfig } from '../config/index.js';
import { printHeader, printKeyValue } from '../lib/output.js';

export async function provisionCommand(config: CliConfig): Promise<void> {
  const provisioner = new FFprobeProvisioner({
    overridePath: config.ffprobePath,
    installDir: config.ffprobeInstallDir,
    autoInstall: config.ffprobeAutoInstall,
    logger: createLogger({ app: 'cli', component: 'ffprobe-provisioner' }),
  });

  const spinner = ora('Looking for ffprobe...').start();
  const state = await provisioner.ensure();

  if (state === 'unavailable') {
    spinner.fail('ffprobe is not available');
    process.exitCode = 1;
  } else {
    spinner.succeed(state === 'system' ? 'Using the installed ffprobe' : 'Using a downloaded ffprobe');
  }

  printHeader('ffprobe');
  printKeyValue('State', state);
  printKeyValue('Command', provisioner.commandPath() ?? '-');
  printKeyValue('Platform', formatPlatformKey(provisioner.getPlatform()));
  printKeyValue('Install path', provisioner.getInstallPath());
  printKeyValue('Auto-install', config.ffprobeAutoInstall ? 'on' : 'off');
}
