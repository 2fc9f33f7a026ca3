/**
 * Output formatting for descriptors and annotation diagnostics.
 */
import chalk from 'chalk';
import type { ClassDescriptor } from '../../core/descriptor/descriptor.js';
import type { OutputFormat } from '../../core/config/schema.js';
import {
  AnnotationValidationError,
  ParseError,
  UnknownAnnotationError,
  type DocmetaError,
} from '../../utils/errors.js';
import { stringifyYaml } from '../../utils/yaml.js';

/**
 * `file:line` of the element an error refers to, when known.
 */
export function formatLocation(error: DocmetaError): string | null {
  if (
    error instanceof AnnotationValidationError ||
    error instanceof ParseError ||
    error instanceof UnknownAnnotationError
  ) {
    if (!error.filePath) return null;
    return error.line !== undefined ? `${error.filePath}:${error.line}` : error.filePath;
  }
  return null;
}

/**
 * One diagnostic, prefixed with its location and error code.
 * Multi-line messages are indented under the header line.
 */
export function formatDiagnostic(error: DocmetaError, options: { colors?: boolean } = {}): string {
  const colors = options.colors ?? true;
  const paint = (text: string, color: 'red' | 'cyan' | 'dim'): string => (colors ? chalk[color](text) : text);

  const location = formatLocation(error);
  const [first, ...rest] = error.message.split('\n');
  const header = [paint('✗', 'red'), location ? paint(location, 'cyan') : null, paint(`[${error.code}]`, 'dim'), first]
    .filter((part): part is string => part !== null)
    .join(' ');

  return [header, ...rest.map((line) => `    ${line}`)].join('\n');
}

/**
 * Serialize descriptors for stdout.
 */
export function formatDescriptors(descriptors: ClassDescriptor[], format: OutputFormat): string {
  const data = descriptors.map((descriptor) => descriptor.toJSON());
  return format === 'yaml' ? stringifyYaml(data) : JSON.stringify(data, null, 2);
}
