import * as nunjucks from "nunjucks";
import { ConfigError, errorMessage } from "./errors";

// No autoescape: schemas and model text go into prompts verbatim.
const nunjucksEnv = new nunjucks.Environment(undefined, { autoescape: false });
nunjucksEnv.addFilter("tojson", (value: unknown) => JSON.stringify(value));

export const DEFAULT_OUTPUT_INSTRUCTIONS =
  "Respond with a single JSON object that matches this schema:\n{{ schema }}";

export const DEFAULT_RETRY_PROMPT =
  "Your previous response was rejected: {{ error }}\n" +
  "Please respond with valid JSON matching this schema:\n{{ schema }}";

export function renderTemplate(template: string, vars: Record<string, unknown>): string {
  try {
    return nunjucksEnv.renderString(template, vars);
  } catch (err) {
    throw new ConfigError(`Invalid template: ${errorMessage(err)}`);
  }
}

/**
 * Compile a template without rendering it. Returns the syntax error, if any.
 */
export function checkTemplate(template: string): string | undefined {
  try {
    new nunjucks.Template(template, nunjucksEnv, undefined, true);
    return undefined;
  } catch (err) {
    return errorMessage(err);
  }
}

/**
 * System-prompt suffix describing the expected output.
 * Custom templates see `schema` (JSON Schema text).
 */
export function renderOutputInstructions(schema: string, template?: string): string {
  return renderTemplate(template ?? DEFAULT_OUTPUT_INSTRUCTIONS, { schema });
}

/**
 * Corrective user message after a rejected answer.
 * Custom templates see `schema`, `error` and `attempt` (1-based).
 */
export function renderRetryPrompt(
  schema: string,
  error: string,
  attempt: number,
  template?: string
): string {
  return renderTemplate(template ?? DEFAULT_RETRY_PROMPT, { schema, error, attempt });
}
