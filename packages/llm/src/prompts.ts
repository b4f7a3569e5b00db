/**
 * Prompt templates. Completion capabilities take a single string, so a
 * template's system text is rendered ahead of the filled prompt.
 */

export interface PromptTemplate {
  system?: string;
  template: string;
  /** Placeholder names in order of first appearance */
  variables: string[];
}

export interface RenderedPrompt {
  prompt: string;
  system?: string;
}

const VARIABLE_PATTERN = /\{(\w+)\}/g;

/**
 * Fill `{name}` placeholders in one pass; unknown names stay as written and
 * substituted values are not scanned again.
 */
export function buildPrompt(template: string, variables: Record<string, string>): string {
  return template.replace(VARIABLE_PATTERN, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : placeholder,
  );
}

export function createPromptTemplate(
  template: string,
  options: { system?: string } = {},
): PromptTemplate {
  const names = new Set<string>();
  for (const [, name] of template.matchAll(VARIABLE_PATTERN)) names.add(name);
  return { system: options.system, template, variables: [...names] };
}

export function executeTemplate(
  template: PromptTemplate,
  variables: Record<string, string>,
): RenderedPrompt {
  const missing = template.variables.filter(
    (name) => !Object.prototype.hasOwnProperty.call(variables, name),
  );
  if (missing.length > 0) {
    throw new Error(`Missing template variables: ${missing.join(', ')}`);
  }
  return { prompt: buildPrompt(template.template, variables), system: template.system };
}

/** System text and prompt as one completion input, separated by a blank line. */
export function renderPrompt(template: PromptTemplate, variables: Record<string, string>): string {
  const { prompt, system } = executeTemplate(template, variables);
  return system ? `${system}\n\n${prompt}` : prompt;
}

/** System prompt for JSON extraction over procurement notices. */
export function structuredExtractionSystem(taskDescription: string): string {
  return [
    `You read Korean public procurement notices. Your task is to ${taskDescription}.`,
    '',
    'Rules:',
    '- Copy names and amounts exactly as written, keeping their units',
    '- Answer with JSON only, in the requested shape',
    '- Use "" or [] for anything the notice does not state',
    '- Never guess a winner or an amount',
  ].join('\n');
}
