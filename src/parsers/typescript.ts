/**
 * TypeScript/JavaScript parser using ts-morph for AST analysis.
 */
import {
  Node,
  Project,
  SourceFile,
  SyntaxKind,
  ts,
  type CallExpression,
  type Expression,
  type NewExpression,
} from 'ts-morph';
import type { ILanguageParser } from './interface.types.js';
import type {
  CallSite,
  ExportedSymbol,
  ImportRef,
  ParsedSource,
  RawCall,
  SourceLanguage,
} from '../core/ingest/types.js';

const MAX_PARSE_ERRORS = 5;

/**
 * TypeScript/JavaScript parser. Holds a single in-memory project and parses
 * one source file at a time.
 */
export class TypeScriptParser implements ILanguageParser {
  readonly supportedLanguages: SourceLanguage[] = ['typescript', 'javascript'];
  readonly supportedExtensions = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

  private project: Project;

  constructor() {
    this.project = new Project({
      useInMemoryFileSystem: true,
      compilerOptions: {
        allowJs: true,
        checkJs: false,
        noResolve: true,
        noLib: true,
        jsx: ts.JsxEmit.Preserve,
      },
      skipAddingFilesFromTsConfig: true,
      skipFileDependencyResolution: true,
    });
  }

  parse(filePath: string, content: string): ParsedSource {
    const sourceFile = this.project.createSourceFile(`/${filePath}`, content, { overwrite: true });

    try {
      const imports = this.extractStaticImports(sourceFile);
      const { calls, emptyHandlers } = this.extractAllInSinglePass(sourceFile, imports);

      return {
        imports: imports.sort((a, b) => a.line - b.line),
        exports: this.extractExports(sourceFile),
        calls,
        emptyHandlers,
        parseErrors: this.collectSyntaxErrors(sourceFile),
      };
    } finally {
      // Clean up immediately to prevent memory growth
      this.project.removeSourceFile(sourceFile);
    }
  }

  /**
   * `import` declarations and `export ... from` re-exports.
   */
  private extractStaticImports(sourceFile: SourceFile): ImportRef[] {
    const imports: ImportRef[] = [];

    for (const imp of sourceFile.getImportDeclarations()) {
      const symbols: string[] = [];
      if (imp.getDefaultImport()) symbols.push('default');
      if (imp.getNamespaceImport()) symbols.push('*');
      for (const named of imp.getNamedImports()) symbols.push(named.getName());

      imports.push({
        rawSpecifier: imp.getModuleSpecifierValue(),
        symbols,
        line: imp.getStartLineNumber(),
        typeOnly: imp.isTypeOnly() || (symbols.length > 0 && imp.getNamedImports().length === symbols.length
          && imp.getNamedImports().every((n) => n.isTypeOnly())),
        dynamic: false,
      });
    }

    for (const exp of sourceFile.getExportDeclarations()) {
      const moduleSpec = exp.getModuleSpecifierValue();
      if (!moduleSpec) continue;
      const named = exp.getNamedExports().map((n) => n.getName());

      imports.push({
        rawSpecifier: moduleSpec,
        symbols: named.length > 0 ? named : ['*'],
        line: exp.getStartLineNumber(),
        typeOnly: exp.isTypeOnly(),
        dynamic: false,
      });
    }

    return imports;
  }

  /**
   * Single traversal for dynamic imports, calls and empty handlers.
   */
  private extractAllInSinglePass(
    sourceFile: SourceFile,
    imports: ImportRef[]
  ): { calls: RawCall[]; emptyHandlers: CallSite[] } {
    const calls: RawCall[] = [];
    const emptyHandlers: CallSite[] = [];

    sourceFile.forEachDescendant((node) => {
      if (Node.isCallExpression(node)) {
        const dynamicSpecifier = this.getDynamicImportSpecifier(node);
        if (dynamicSpecifier !== null) {
          imports.push({
            rawSpecifier: dynamicSpecifier,
            symbols: ['*'],
            line: node.getStartLineNumber(),
            typeOnly: false,
            dynamic: true,
          });
          return;
        }

        calls.push(this.parseCallExpression(node));

        const handler = this.getEmptyPromiseHandler(node);
        if (handler) emptyHandlers.push(handler);
        return;
      }

      if (Node.isNewExpression(node)) {
        calls.push(this.parseNewExpression(node));
        return;
      }

      if (Node.isCatchClause(node) && node.getBlock().getStatements().length === 0) {
        emptyHandlers.push({
          callee: 'catch',
          line: node.getStartLineNumber(),
          column: this.getColumn(node),
          endLine: node.getEndLineNumber(),
        });
      }
    });

    return { calls, emptyHandlers };
  }

  /**
   * Specifier of `import('x')` or `require('x')`, or null for any other call.
   */
  private getDynamicImportSpecifier(call: CallExpression): string | null {
    const expr = call.getExpression();
    const isImport = expr.getKind() === SyntaxKind.ImportKeyword;
    const isRequire = Node.isIdentifier(expr) && expr.getText() === 'require';
    if (!isImport && !isRequire) return null;

    const [first] = call.getArguments();
    if (first && (Node.isStringLiteral(first) || Node.isNoSubstitutionTemplateLiteral(first))) {
      return first.getLiteralValue();
    }
    return null;
  }

  /**
   * `.catch(() => {})` / `.catch(function () {})` with an empty body.
   */
  private getEmptyPromiseHandler(call: CallExpression): CallSite | null {
    const expr = call.getExpression();
    if (!Node.isPropertyAccessExpression(expr) || expr.getName() !== 'catch') return null;

    const [handler] = call.getArguments();
    if (!handler || !(Node.isArrowFunction(handler) || Node.isFunctionExpression(handler))) return null;

    const body = handler.getBody();
    if (!Node.isBlock(body) || body.getStatements().length > 0) return null;

    return {
      callee: '.catch',
      line: expr.getNameNode().getStartLineNumber(),
      column: this.getColumn(expr.getNameNode()),
      endLine: call.getEndLineNumber(),
    };
  }

  private parseCallExpression(call: CallExpression): RawCall {
    const { callee, receiver } = this.describeCallee(call.getExpression());
    return {
      callee,
      receiver,
      line: call.getStartLineNumber(),
      column: this.getColumn(call),
      endLine: call.getEndLineNumber(),
      isConstructorCall: false,
    };
  }

  private parseNewExpression(newExpr: NewExpression): RawCall {
    const { callee, receiver } = this.describeCallee(newExpr.getExpression());
    return {
      callee,
      receiver,
      line: newExpr.getStartLineNumber(),
      column: this.getColumn(newExpr),
      endLine: newExpr.getEndLineNumber(),
      isConstructorCall: true,
    };
  }

  /**
   * Callee text and receiver. Optional chaining and whitespace are normalized
   * so `api?.client .fetch` reads as `api.client.fetch`.
   */
  private describeCallee(expr: Expression): { callee: string; receiver?: string } {
    const callee = normalizeCallee(expr.getText());

    if (Node.isPropertyAccessExpression(expr)) {
      return { callee, receiver: normalizeCallee(expr.getExpression().getText()) };
    }
    if (Node.isElementAccessExpression(expr)) {
      const receiver = normalizeCallee(expr.getExpression().getText());
      const arg = expr.getArgumentExpression();
      const method = arg && Node.isStringLiteral(arg) ? arg.getLiteralValue() : null;
      return method ? { callee: `${receiver}.${method}`, receiver } : { callee, receiver };
    }
    return { callee };
  }

  /**
   * Syntactic diagnostics only; no type checking happens.
   */
  private collectSyntaxErrors(sourceFile: SourceFile): string[] {
    return this.project
      .getProgram()
      .getSyntacticDiagnostics(sourceFile)
      .slice(0, MAX_PARSE_ERRORS)
      .map((diagnostic) => {
        const text = diagnostic.getMessageText();
        const message = typeof text === 'string' ? text : text.getMessageText();
        const line = diagnostic.getLineNumber();
        return line !== undefined ? `line ${line}: ${message}` : message;
      });
  }

  /**
   * Extract all exports from a source file.
   */
  private extractExports(sourceFile: SourceFile): ExportedSymbol[] {
    const exports: ExportedSymbol[] = [];

    for (const exportDecl of sourceFile.getExportDeclarations()) {
      const fromModule = exportDecl.getModuleSpecifierValue() !== undefined;
      const named = exportDecl.getNamedExports();
      if (fromModule && named.length === 0) {
        // export * from './foo'
        exports.push({ name: '*', kind: 're-export', line: exportDecl.getStartLineNumber() });
        continue;
      }
      for (const spec of named) {
        exports.push({
          name: spec.getAliasNode()?.getText() ?? spec.getName(),
          kind: fromModule ? 're-export' : 'variable',
          line: spec.getStartLineNumber(),
        });
      }
    }

    for (const func of sourceFile.getFunctions()) {
      if (func.isExported()) {
        exports.push({ name: func.getName() ?? 'default', kind: 'function', line: func.getStartLineNumber() });
      }
    }
    for (const classDecl of sourceFile.getClasses()) {
      if (classDecl.isExported()) {
        exports.push({ name: classDecl.getName() ?? 'default', kind: 'class', line: classDecl.getStartLineNumber() });
      }
    }
    for (const iface of sourceFile.getInterfaces()) {
      if (iface.isExported()) {
        exports.push({ name: iface.getName(), kind: 'interface', line: iface.getStartLineNumber() });
      }
    }
    for (const typeAlias of sourceFile.getTypeAliases()) {
      if (typeAlias.isExported()) {
        exports.push({ name: typeAlias.getName(), kind: 'type', line: typeAlias.getStartLineNumber() });
      }
    }
    for (const enumDecl of sourceFile.getEnums()) {
      if (enumDecl.isExported()) {
        exports.push({ name: enumDecl.getName(), kind: 'enum', line: enumDecl.getStartLineNumber() });
      }
    }
    for (const varStmt of sourceFile.getVariableStatements()) {
      if (varStmt.isExported()) {
        for (const decl of varStmt.getDeclarations()) {
          exports.push({ name: decl.getName(), kind: 'variable', line: decl.getStartLineNumber() });
        }
      }
    }

    // export default <expression>
    for (const assignment of sourceFile.getExportAssignments()) {
      exports.push({
        name: assignment.isExportEquals() ? 'export=' : 'default',
        kind: 'variable',
        line: assignment.getStartLineNumber(),
      });
    }

    return exports.sort((a, b) => a.line - b.line);
  }

  private getColumn(node: Node): number {
    return node.getStart() - node.getStartLinePos() + 1;
  }

  /**
   * Release resources.
   */
  dispose(): void {
    for (const sourceFile of this.project.getSourceFiles()) {
      this.project.removeSourceFile(sourceFile);
    }
  }
}

function normalizeCallee(text: string): string {
  return text.replace(/\?\./g, '.').replace(/\s+/g, '');
}
