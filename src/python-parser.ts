import { debugLog } from "./debug";
import { parsePython, type SyntaxNode } from "./python-grammar";
import { sliceRows } from "./source-text";
import type { FunctionUnit } from "./types";

/**
 * Structural parsing capability consumed by the scan: source text in,
 * function-level units out.
 */
export interface FunctionDiscoverer {
  discoverFunctions(filePath: string, source: string): FunctionUnit[];
}

/**
 * Discovers every `def` in a Python file, nested functions and methods
 * included, in pre-order (the order they appear in the file).
 */
export class PythonSourceParser implements FunctionDiscoverer {
  discoverFunctions(filePath: string, source: string): FunctionUnit[] {
    const root = parsePython(source);
    const units: FunctionUnit[] = [];
    this.visit(root, filePath, source, units);
    debugLog(`Found ${units.length} function(s) in ${filePath}`);
    return units;
  }

  private visit(
    node: SyntaxNode,
    filePath: string,
    source: string,
    units: FunctionUnit[],
  ): void {
    if (node.type === "function_definition") {
      const unit = this.toUnit(node, filePath, source);
      if (unit) {
        units.push(unit);
      }
    }

    for (const child of node.children) {
      this.visit(child, filePath, source, units);
    }
  }

  private toUnit(
    node: SyntaxNode,
    filePath: string,
    source: string,
  ): FunctionUnit | null {
    const nameNode = node.childForFieldName("name");
    if (!nameNode) {
      return null;
    }

    const startRow = node.startPosition.row;
    let endRow = node.endPosition.row;
    // A node ending at column 0 stops before that row's first character
    if (node.endPosition.column === 0 && endRow > startRow) {
      endRow -= 1;
    }

    return {
      name: nameNode.text,
      filePath,
      startLine: startRow + 1,
      endLine: endRow + 1,
      text: sliceRows(source, startRow, endRow),
    };
  }
}
