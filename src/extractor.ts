import { ExtractionError } from "./errors";
import { findSyntaxError, lineOf, parsePython, type SyntaxNode } from "./python-grammar";
import { normalizeIndentation } from "./source-text";
import type { Candidate, FunctionUnit } from "./types";

const DEFAULT_PARAMETER_TYPES = new Set(["default_parameter", "typed_default_parameter"]);

interface ExtractionContext {
  unit: FunctionUnit;
  lines: string[];
  seen: Set<string>;
  candidates: Candidate[];
}

/**
 * Turns one function into its NullBinding and MemberAccess candidates,
 * ordered by source line. Purely syntactic: no guards, no types, no aliasing.
 *
 * Nested function definitions are skipped since each one is analysed as its
 * own unit.
 *
 * @throws ExtractionError when the function body does not parse cleanly.
 */
export function extractCandidates(unit: FunctionUnit): Candidate[] {
  const text = normalizeIndentation(unit.text);
  let root: SyntaxNode;
  try {
    root = parsePython(text);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(unit.name, `Cannot parse function ${unit.name}: ${reason}`);
  }

  const syntaxError = findSyntaxError(root);
  if (syntaxError) {
    throw new ExtractionError(
      unit.name,
      `Cannot parse function ${unit.name} at line ${unit.startLine + syntaxError.startPosition.row}`,
    );
  }

  const definition = root.namedChildren.find((child) => child.type === "function_definition");
  if (!definition) {
    throw new ExtractionError(unit.name, `No function definition found for ${unit.name}`);
  }

  const context: ExtractionContext = {
    unit,
    lines: text.split("\n"),
    seen: new Set(),
    candidates: [],
  };

  const parameters = definition.childForFieldName("parameters");
  if (parameters) {
    collectParameterDefaults(parameters, context);
  }
  const body = definition.childForFieldName("body");
  if (body) {
    visit(body, context);
  }

  // Array#sort is stable, so same-line candidates keep traversal order
  return context.candidates.sort((a, b) => a.line - b.line);
}

function collectParameterDefaults(parameters: SyntaxNode, context: ExtractionContext): void {
  for (const parameter of parameters.namedChildren) {
    if (!DEFAULT_PARAMETER_TYPES.has(parameter.type)) continue;

    const name = parameter.childForFieldName("name");
    const value = parameter.childForFieldName("value");
    if (name?.type === "identifier" && value?.type === "none") {
      record(context, "NullBinding", name);
    }
  }
}

function visit(node: SyntaxNode, context: ExtractionContext): void {
  if (node.type === "function_definition") {
    return;
  }

  if (node.type === "assignment") {
    const target = node.childForFieldName("left");
    if (target?.type === "identifier" && isNoneValue(node)) {
      record(context, "NullBinding", target);
    }
  } else if (node.type === "attribute") {
    const object = node.childForFieldName("object");
    if (object?.type === "identifier") {
      record(context, "MemberAccess", object);
    }
  }

  for (const child of node.children) {
    visit(child, context);
  }
}

/**
 * True when the assignment ultimately stores `None`, following chains such
 * as `a = b = None`.
 */
function isNoneValue(assignment: SyntaxNode): boolean {
  let value = assignment.childForFieldName("right");
  while (value?.type === "assignment") {
    value = value.childForFieldName("right");
  }
  return value?.type === "none";
}

function record(
  context: ExtractionContext,
  kind: Candidate["kind"],
  identifier: SyntaxNode,
): void {
  const row = identifier.startPosition.row;
  const line = context.unit.startLine + lineOf(identifier) - 1;
  const variable = identifier.text;
  const key = `${line}:${kind}:${variable}`;
  if (context.seen.has(key)) {
    return;
  }
  context.seen.add(key);

  const statement = (context.lines[row] ?? "").trim();
  context.candidates.push({ kind, variable, line, statement });
}
