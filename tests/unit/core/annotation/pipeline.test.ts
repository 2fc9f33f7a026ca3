/**
 * Tests for parseAnnotations.
 */
import { describe, it, expect } from 'vitest';
import { parseAnnotations } from '../../../../src/core/annotation/pipeline.js';
import { createDefaultRegistry } from '../../../../src/core/annotations/index.js';
import { ParseError, UnknownAnnotationError } from '../../../../src/utils/errors.js';

const registry = createDefaultRegistry();

describe('parseAnnotations', () => {
  it('should create an initialized annotation per directive', () => {
    const result = parseAnnotations("/** !Route GET, '/users', name: 'users.index' */", registry);

    expect(result.errors).toEqual([]);
    expect(result.annotations).toHaveLength(1);
    expect(result.annotations[0].kindName).toBe('RouteAnnotation');
    expect(result.annotations[0].getParameters()).toEqual({
      positional: ['GET', '/users'],
      keyed: { name: 'users.index' },
    });
  });

  it('should report an unregistered directive by name', () => {
    const result = parseAnnotations('/** !Bogus x */', registry);

    expect(result.annotations).toEqual([]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(UnknownAnnotationError);
    expect(result.errors[0].message).toContain('"Bogus"');
  });

  it('should report an unregistered directive written without a space', () => {
    const result = parseAnnotations('/** !Bogus(x) */', registry);

    expect(result.annotations).toEqual([]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(UnknownAnnotationError);
  });

  it('should keep parsing siblings after a bad directive', () => {
    const comment = ['/**', " * !Table 'users", ' * !Source main', ' */'].join('\n');

    const result = parseAnnotations(comment, registry, { filePath: 'src/user.ts', line: 4 });

    expect(result.annotations.map((a) => a.kindName)).toEqual(['SourceAnnotation']);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(ParseError);
    expect(result.errors[0]).toMatchObject({
      filePath: 'src/user.ts',
      line: 4,
      message:
        `There is an unparseable annotation value: "!Table 'users" ` +
        `(Unterminated string literal starting at 'users))`,
    });
  });

  it('should return nothing for a comment without directives', () => {
    expect(parseAnnotations('/** Just prose. */', registry)).toEqual({ annotations: [], errors: [] });
  });
});
