/**
 * --init-config: write a config template for this project
 */

import { ExitCode } from '../types/exit-codes';
import { findBaseDirectory } from '../config/resolve-config';
import { writeConfigTemplate } from '../config/write-config';
import { CommandEnvironment } from './command-environment';

export async function initConfig(env: CommandEnvironment): Promise<ExitCode> {
  const baseDirectory = await findBaseDirectory(env.fs, env.workingDirectory);
  const written = await writeConfigTemplate(env.fs, baseDirectory);
  if (!written.ok) {
    env.writeError(`Error: ${written.error.message}\n`);
    return ExitCode.GENERAL_ERROR;
  }
  env.write(`Wrote config template to ${written.value}\n`);
  return ExitCode.SUCCESS;
}
