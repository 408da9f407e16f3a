/**
 * Docstring and doc-comment cleanup.
 */

const PY_STRING = /^[rRuUbBfF]{0,2}("""|'''|"|')([\s\S]*)\1$/;

/**
 * Dedent a docstring body: the first line is stripped, the remaining lines
 * lose their common indentation, and blank lines at either end are dropped.
 */
export function cleanDocstring(text: string): string {
  const lines = text.replace(/\t/g, '        ').split(/\r?\n/);
  const rest = lines.slice(1);

  const margin = rest
    .filter((line) => line.trim() !== '')
    .reduce((min, line) => Math.min(min, line.length - line.trimStart().length), Infinity);

  const cleaned = [
    (lines[0] ?? '').trimStart(),
    ...rest.map((line) => (Number.isFinite(margin) ? line.slice(margin) : line).trimEnd()),
  ];

  while (cleaned.length > 0 && cleaned[0]?.trim() === '') cleaned.shift();
  while (cleaned.length > 0 && cleaned[cleaned.length - 1]?.trim() === '') cleaned.pop();

  return cleaned.join('\n');
}

/**
 * Body of a Python string literal (prefix and quotes removed), cleaned.
 * Returns '' for anything that is not a plain string literal.
 */
export function pythonDocstring(literal: string): string {
  const match = PY_STRING.exec(literal.trim());
  if (!match) {
    return '';
  }
  return cleanDocstring(match[2] ?? '');
}

/**
 * Text of a `/** ... *\/` comment with the delimiters and leading
 * asterisks removed.
 */
export function jsDocText(comment: string): string {
  const inner = comment.replace(/^\/\*\*/, '').replace(/\*\/$/, '');
  const lines = inner.split(/\r?\n/).map((line) => line.replace(/^\s*\* ?/, '').trimEnd());

  while (lines.length > 0 && lines[0]?.trim() === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1]?.trim() === '') lines.pop();

  return lines.map((line, i) => (i === 0 ? line.trim() : line)).join('\n');
}
