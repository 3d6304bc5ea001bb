/**
 * Prompt templates use `{name}` placeholders. Any other brace (for example
 * inside a JSON example) is left as written.
 */

export type TemplateVariables = Record<string, unknown>;

const PLACEHOLDER_RE = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export class TemplateVariableError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missing: string[]
  ) {
    super(`Template "${templateName}" references unsupplied variables: ${missing.join(", ")}`);
    this.name = "TemplateVariableError";
  }
}

export function templateVariables(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER_RE)) {
    names.add(match[1]);
  }
  return [...names];
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (value === null) return "";
  return JSON.stringify(value);
}

export function renderTemplate(
  template: string,
  variables: TemplateVariables,
  templateName = "template"
): string {
  const missing = templateVariables(template).filter(
    (name) => !Object.prototype.hasOwnProperty.call(variables, name) || variables[name] === undefined
  );
  if (missing.length > 0) {
    throw new TemplateVariableError(templateName, missing);
  }
  return template.replace(PLACEHOLDER_RE, (_token: string, name: string) => formatValue(variables[name]));
}
