/**
 * Expand annotated classes into descriptors and print them.
 */
import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { OutputFormatSchema, type OutputFormat } from '../../core/config/schema.js';
import { createDefaultRegistry } from '../../core/annotations/index.js';
import { expandSources } from '../../core/expansion/project.js';
import { ConfigError, ErrorCodes, isDocmetaError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { formatDescriptors, formatDiagnostic } from '../formatters/diagnostics.js';
import { configureLogging, loadSources } from './sources.js';

interface ExpandOptions {
  format?: string;
  failFast?: boolean;
  config?: string;
  verbose?: boolean;
}

/**
 * Create the expand command.
 */
export function createExpandCommand(): Command {
  return new Command('expand')
    .description('Expand annotations into class descriptors')
    .argument('[patterns...]', 'Glob patterns of files to scan (defaults to scan.include)')
    .option('-f, --format <format>', 'Output format: json or yaml')
    .option('--fail-fast', 'Stop at the first invalid annotation')
    .option('-c, --config <path>', 'Path to config file')
    .option('--verbose', 'Enable debug logging')
    .action(async (patterns: string[], options: ExpandOptions) => {
      let failures = 0;
      try {
        failures = await runExpand(patterns, options);
      } catch (error) {
        if (isDocmetaError(error)) {
          console.error(formatDiagnostic(error));
        } else {
          logger.error(error instanceof Error ? error.message : 'Unknown error');
        }
        process.exit(1);
      }
      if (failures > 0) {
        process.exit(1);
      }
    });
}

/**
 * Returns the number of annotations that failed to expand.
 */
async function runExpand(patterns: string[], options: ExpandOptions): Promise<number> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  configureLogging(config, options.verbose);
  const format = resolveFormat(options.format, config.output.format);

  const sources = await loadSources(projectRoot, patterns, config);
  if (sources.length === 0) {
    logger.warn('No files found matching the pattern.');
    return 0;
  }

  const result = expandSources(sources, {
    registry: createDefaultRegistry(),
    baseClasses: config.base_classes,
    hierarchy: config.hierarchy,
    failFast: options.failFast ?? config.expansion.fail_fast,
  });

  for (const error of result.errors) {
    console.error(formatDiagnostic(error));
  }
  console.log(formatDescriptors(result.descriptors, format));
  return result.errors.length;
}

function resolveFormat(requested: string | undefined, fallback: OutputFormat): OutputFormat {
  if (requested === undefined) return fallback;
  const parsed = OutputFormatSchema.safeParse(requested);
  if (!parsed.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Unknown output format "${requested}". Valid formats: ${OutputFormatSchema.options.join(', ')}`
    );
  }
  return parsed.data;
}
