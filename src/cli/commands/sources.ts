/**
 * Shared loading steps for commands that scan source files.
 */
import * as path from 'node:path';
import type { Config } from '../../core/config/schema.js';
import type { SourceInput } from '../../core/expansion/project.js';
import { globFiles, readFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';

/**
 * Apply the configured log level, or debug when verbose.
 */
export function configureLogging(config: Config, verbose?: boolean): void {
  logger.setLevel(verbose ? 'debug' : config.log_level);
}

/**
 * Read every file matched by `patterns`, or by `scan.include` when none are given.
 * File paths are reported relative to the project root.
 */
export async function loadSources(projectRoot: string, patterns: string[], config: Config): Promise<SourceInput[]> {
  const files = await globFiles(patterns.length > 0 ? patterns : config.scan.include, {
    cwd: projectRoot,
    ignore: config.scan.exclude,
    absolute: true,
  });

  return Promise.all(
    files.map(async (file) => ({
      filePath: path.relative(projectRoot, file),
      content: await readFile(file),
    }))
  );
}
