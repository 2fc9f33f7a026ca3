/**
 * Command-line entry for docmeta.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createAnnotationsCommand } from './commands/annotations.js';
import { createCheckCommand } from './commands/check.js';
import { createExpandCommand } from './commands/expand.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('docmeta')
    .description('Expand doc-comment annotations into class descriptors')
    .version(readVersion());
  [createExpandCommand, createCheckCommand, createAnnotationsCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
