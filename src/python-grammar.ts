import Parser from "tree-sitter";
import Python from "tree-sitter-python";

export type SyntaxNode = Parser.SyntaxNode;

let sharedParser: Parser | null = null;

/**
 * Returns the process-wide tree-sitter parser configured for Python.
 * Parsing is synchronous, so one instance is enough for a sequential scan.
 */
export function getPythonParser(): Parser {
  if (!sharedParser) {
    sharedParser = new Parser();
    sharedParser.setLanguage(Python);
  }
  return sharedParser;
}

/**
 * Parses Python text. The input buffer is sized to the text, since the
 * binding rejects inputs larger than its default 32 KiB buffer.
 */
export function parsePython(source: string): SyntaxNode {
  const bufferSize = Buffer.byteLength(source, "utf8") + 1;
  return getPythonParser().parse(source, undefined, { bufferSize }).rootNode;
}

/**
 * Finds the first node tree-sitter produced during error recovery:
 * an ERROR node, or a zero-width leaf inserted for a missing token.
 */
export function findSyntaxError(node: SyntaxNode): SyntaxNode | null {
  if (node.type === "ERROR") {
    return node;
  }
  if (node.childCount === 0 && node.startIndex === node.endIndex && node.parent) {
    return node;
  }
  for (const child of node.children) {
    const error = findSyntaxError(child);
    if (error) {
      return error;
    }
  }
  return null;
}

/** 1-based line of a node within the text it was parsed from. */
export function lineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}
