/**
 * Substitute `{name}` placeholders. `{{` and `}}` are literal braces, so
 * templates can show JSON. Unknown placeholders are left as they are, and
 * substituted values are never re-scanned.
 *
 * @example
 * renderTemplate('Hi {name} {{ok}}', { name: 'Ada' }) // 'Hi Ada {ok}'
 */
export function renderTemplate(template: string, variables: Readonly<Record<string, string>>): string {
  return template.replace(/\{\{|\}\}|\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g, (match: string, name: string | undefined) => {
    if (match === '{{') return '{';
    if (match === '}}') return '}';
    if (name !== undefined && Object.prototype.hasOwnProperty.call(variables, name)) {
      return variables[name] ?? match;
    }
    return match;
  });
}
