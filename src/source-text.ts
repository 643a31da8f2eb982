/**
 * Normalizes indentation by removing common leading whitespace from all lines.
 * Lets a method body be parsed as a top-level function. Blank lines are kept
 * so row numbers stay aligned with the original text.
 */
export function normalizeIndentation(text: string): string {
  const lines = text.split("\n");

  const nonEmptyLines = lines.filter((line) => line.trim().length > 0);

  if (nonEmptyLines.length === 0) {
    return "";
  }

  const minIndent = Math.min(
    ...nonEmptyLines.map((line) => {
      const match = line.match(/^[ \t]*/);
      return match ? match[0].length : 0;
    }),
  );

  const normalizedLines = lines.map((line) => {
    if (line.trim().length === 0) {
      return "";
    }
    return line.slice(minIndent);
  });

  return normalizedLines.join("\n").trimEnd();
}

/**
 * Prefixes each line with its absolute line number, right-aligned.
 */
export function numberLines(text: string, firstLine: number): string {
  const lines = text.split("\n");
  const width = String(firstLine + lines.length - 1).length;
  return lines
    .map((line, index) => `${String(firstLine + index).padStart(width)} | ${line}`)
    .join("\n");
}

/**
 * Returns lines [startRow, endRow] (0-based, inclusive) of a source text.
 */
export function sliceRows(source: string, startRow: number, endRow: number): string {
  return source.split("\n").slice(startRow, endRow + 1).join("\n");
}
