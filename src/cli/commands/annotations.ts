/**
 * List the registered annotation kinds with their targets and usage.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { createDefaultRegistry } from '../../core/annotations/index.js';
import { describeTargets } from '../../core/annotation/types.js';
import { logger } from '../../utils/logger.js';

interface AnnotationsOptions {
  json?: boolean;
}

export interface AnnotationSummary {
  name: string;
  targets: string[];
  usage: string;
}

/**
 * Summaries of every built-in kind, sorted by name.
 */
export function listAnnotations(): AnnotationSummary[] {
  return createDefaultRegistry()
    .describeKinds()
    .map((annotation) => ({
      name: annotation.annotationName,
      targets: describeTargets(annotation.targets),
      usage: annotation.usage(),
    }));
}

/**
 * Create the annotations command.
 */
export function createAnnotationsCommand(): Command {
  return new Command('annotations')
    .description('List available annotations and their usage')
    .option('--json', 'Output in JSON format')
    .action((options: AnnotationsOptions) => {
      try {
        const summaries = listAnnotations();
        if (options.json) {
          console.log(JSON.stringify(summaries, null, 2));
          return;
        }
        for (const summary of summaries) {
          console.log(`${chalk.bold(`!${summary.name}`)} ${chalk.dim(`(${summary.targets.join(', ')})`)}`);
          for (const line of summary.usage.split('\n')) {
            console.log(`    ${chalk.cyan(line)}`);
          }
        }
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}
