/**
 * Command templates
 *
 * A template is a token array with placeholders. `{passthrough}` must stand
 * alone and expands to zero or more tokens; the others are replaced inside
 * any token.
 */

export const PASSTHROUGH_PLACEHOLDER = '{passthrough}';
export const PROCESS_COUNT_PLACEHOLDER = '{processCount}';
export const CWD_PLACEHOLDER = '{cwd}';

export interface TemplateValues {
  processCount: number;
  cwd: string;
  passthrough: readonly string[];
}

/**
 * Problems with a template, empty when it is usable
 */
export function validateTemplate(template: readonly string[]): string[] {
  const issues: string[] = [];
  if (template.length === 0) {
    issues.push('template must name a command');
    return issues;
  }
  if (template[0] === PASSTHROUGH_PLACEHOLDER) {
    issues.push('template must start with a command, not {passthrough}');
  }

  const standalone = template.filter((token) => token === PASSTHROUGH_PLACEHOLDER).length;
  if (standalone === 0) {
    issues.push('template must contain a {passthrough} token');
  } else if (standalone > 1) {
    issues.push('template must contain {passthrough} only once');
  }
  if (template.some((token) => token !== PASSTHROUGH_PLACEHOLDER && token.includes(PASSTHROUGH_PLACEHOLDER))) {
    issues.push('{passthrough} must be a whole token');
  }
  return issues;
}

/**
 * Expand a template. Forwarded arguments are inserted as-is and are never
 * searched for placeholders.
 */
export function renderTemplate(template: readonly string[], values: TemplateValues): string[] {
  const rendered: string[] = [];
  for (const token of template) {
    if (token === PASSTHROUGH_PLACEHOLDER) {
      rendered.push(...values.passthrough);
      continue;
    }
    rendered.push(
      token
        .split(PROCESS_COUNT_PLACEHOLDER)
        .join(String(values.processCount))
        .split(CWD_PLACEHOLDER)
        .join(values.cwd)
    );
  }
  return rendered;
}
