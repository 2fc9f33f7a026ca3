/**
 * Validate every annotation in the scanned files without printing descriptors.
 */
import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { createDefaultRegistry } from '../../core/annotations/index.js';
import { expandSources } from '../../core/expansion/project.js';
import { logger } from '../../utils/logger.js';
import { formatDiagnostic } from '../formatters/diagnostics.js';
import { configureLogging, loadSources } from './sources.js';

interface CheckOptions {
  json?: boolean;
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check annotations in source files and report invalid ones')
    .argument('[patterns...]', 'Glob patterns of files to scan (defaults to scan.include)')
    .option('--json', 'Output diagnostics in JSON format')
    .option('-c, --config <path>', 'Path to config file')
    .option('-q, --quiet', 'Only print diagnostics')
    .option('--verbose', 'Enable debug logging')
    .action(async (patterns: string[], options: CheckOptions) => {
      let failures = 0;
      try {
        failures = await runCheck(patterns, options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
      if (failures > 0) {
        process.exit(1);
      }
    });
}

async function runCheck(patterns: string[], options: CheckOptions): Promise<number> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  configureLogging(config, options.verbose);

  const sources = await loadSources(projectRoot, patterns, config);
  if (sources.length === 0) {
    logger.warn('No files found matching the pattern.');
    return 0;
  }

  const result = expandSources(sources, {
    registry: createDefaultRegistry(),
    baseClasses: config.base_classes,
    hierarchy: config.hierarchy,
  });

  if (options.json) {
    console.log(JSON.stringify({
      files: sources.length,
      classes: result.descriptors.length,
      expanded: result.expanded,
      errors: result.errors.map((error) => error.toJSON()),
    }, null, 2));
    return result.errors.length;
  }

  for (const error of result.errors) {
    console.log(formatDiagnostic(error));
  }

  if (!options.quiet) {
    if (result.errors.length === 0) {
      logger.success(`${result.expanded} annotation(s) valid in ${sources.length} file(s)`);
    } else {
      logger.fail(`${result.errors.length} invalid annotation(s) in ${sources.length} file(s)`);
    }
  }

  return result.errors.length;
}
