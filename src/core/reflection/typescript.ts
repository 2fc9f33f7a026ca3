/**
 * TypeScript reflection using ts-morph.
 * Supplies the kind, names, file and line of annotated elements; the
 * annotation core never inspects program code itself.
 */
import { Node, Project, type ClassDeclaration, type JSDocableNode } from 'ts-morph';
import * as path from 'node:path';
import type { AnnotationTarget, TargetKind } from '../annotation/types.js';
import type { AnnotatedClass, AnnotatedElement } from '../expansion/types.js';

export class TypeScriptReflector {
  private project: Project;
  private fileCounter = 0;

  constructor() {
    this.project = new Project({
      useInMemoryFileSystem: true,
      compilerOptions: {
        allowJs: true,
        checkJs: false,
        strict: false,
        skipLibCheck: true,
      },
      skipAddingFilesFromTsConfig: true,
      skipFileDependencyResolution: true,
    });
  }

  /**
   * Collect every named top-level class in `source` with its documented
   * members, in declaration order.
   */
  collectAnnotatedClasses(source: string, filePath: string): AnnotatedClass[] {
    const sourceFile = this.project.createSourceFile(
      `__docmeta_${this.fileCounter++}_${path.basename(filePath)}`,
      source,
      { overwrite: true }
    );

    try {
      const classes: AnnotatedClass[] = [];
      for (const cls of sourceFile.getClasses()) {
        const described = this.describeClass(cls, filePath);
        if (described) classes.push(described);
      }
      return classes;
    } finally {
      // Free the temporary file so long scans do not grow the project.
      this.project.removeSourceFile(sourceFile);
    }
  }

  private describeClass(cls: ClassDeclaration, filePath: string): AnnotatedClass | null {
    const className = cls.getName();
    if (!className) return null;

    const elements: AnnotatedElement[] = [];
    const push = (node: JSDocableNode & Node, kind: TargetKind, elementName: string): void => {
      const comment = node.getJsDocs().map((doc) => doc.getText()).join('\n');
      if (!comment) return;
      elements.push({ target: this.createTarget(kind, className, elementName, filePath, node), comment });
    };

    push(cls, 'class', className);
    for (const member of cls.getMembers()) {
      if (Node.isPropertyDeclaration(member)) {
        push(member, 'property', member.getName());
      } else if (Node.isMethodDeclaration(member)) {
        push(member, 'method', member.getName());
      }
    }

    const result: AnnotatedClass = { className, filePath, elements };
    const base = cls.getExtends()?.getExpression().getText();
    if (base) {
      result.extends = base;
    }
    return result;
  }

  private createTarget(
    kind: TargetKind,
    declaringClassName: string,
    elementName: string,
    filePath: string,
    node: Node
  ): AnnotationTarget {
    return {
      kind,
      declaringClassName,
      elementName,
      filePath,
      lineNumber: node.getStartLineNumber(),
    };
  }
}
