import fs from "node:fs/promises";
import ts from "typescript";
import { ImportKind } from "../core/types";

export type ParsedImport = {
  specifier?: string;
  kind: ImportKind;
  typeOnly: boolean;
  line: number;
  column: number;
  importText: string;
};

function pushImport(
  out: ParsedImport[],
  sourceFile: ts.SourceFile,
  node: ts.Node,
  kind: ImportKind,
  typeOnly: boolean,
  literal: ts.Node | undefined
): void {
  if (!literal) {
    return;
  }
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
  out.push({
    specifier: ts.isStringLiteralLike(literal) ? literal.text : undefined,
    kind,
    typeOnly,
    line: line + 1,
    column: character + 1,
    importText: node.getText(sourceFile)
  });
}

function isRequireCall(node: ts.CallExpression): boolean {
  return ts.isIdentifier(node.expression) && node.expression.text === "require";
}

function isDynamicImport(node: ts.CallExpression): boolean {
  return node.expression.kind === ts.SyntaxKind.ImportKeyword;
}

function isTypeOnlyImport(node: ts.ImportDeclaration): boolean {
  const clause = node.importClause;
  if (!clause) {
    return false;
  }
  if (clause.isTypeOnly) {
    return true;
  }
  if (clause.name || !clause.namedBindings || !ts.isNamedImports(clause.namedBindings)) {
    return false;
  }

  const elements = clause.namedBindings.elements;
  return elements.length > 0 && elements.every((element) => element.isTypeOnly);
}

function isTypeOnlyExport(node: ts.ExportDeclaration): boolean {
  if (node.isTypeOnly) {
    return true;
  }
  if (!node.exportClause || !ts.isNamedExports(node.exportClause)) {
    return false;
  }

  const elements = node.exportClause.elements;
  return elements.length > 0 && elements.every((element) => element.isTypeOnly);
}

export function parseImports(fileName: string, sourceText: string): ParsedImport[] {
  const sourceFile = ts.createSourceFile(fileName, sourceText, ts.ScriptTarget.Latest, true);
  const imports: ParsedImport[] = [];

  const visit = (node: ts.Node): void => {
    if (ts.isImportDeclaration(node)) {
      pushImport(imports, sourceFile, node, "esm-import", isTypeOnlyImport(node), node.moduleSpecifier);
    } else if (ts.isExportDeclaration(node)) {
      pushImport(imports, sourceFile, node, "esm-import", isTypeOnlyExport(node), node.moduleSpecifier);
    } else if (ts.isImportEqualsDeclaration(node) && ts.isExternalModuleReference(node.moduleReference)) {
      pushImport(imports, sourceFile, node, "cjs-require", node.isTypeOnly, node.moduleReference.expression);
    } else if (ts.isCallExpression(node) && (isRequireCall(node) || isDynamicImport(node))) {
      const kind: ImportKind = isRequireCall(node) ? "cjs-require" : "esm-dynamic-import";
      pushImport(imports, sourceFile, node, kind, false, node.arguments[0]);
    } else if (ts.isImportTypeNode(node) && ts.isLiteralTypeNode(node.argument)) {
      pushImport(imports, sourceFile, node, "esm-import", true, node.argument.literal);
    }

    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return imports;
}

export async function parseImportsFromFile(filePath: string): Promise<ParsedImport[]> {
  const sourceText = await fs.readFile(filePath, "utf8");
  return parseImports(filePath, sourceText);
}
