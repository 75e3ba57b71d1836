/**
 * Prompt loading and rendering
 */

import { WorkflowScope } from '../io/workflow-scope';
import { LoadedPrompt } from '../types/policy';
import { Logger } from '../types/logger';
import { Result, ok, err } from '../types/result';
import { PromptFileError } from './errors';
import { parseFrontmatter } from './policy';

/**
 * Load a prompt file from the scope and split off its policy
 */
export async function loadPrompt(
  scope: WorkflowScope,
  filename: string,
  logger?: Logger
): Promise<Result<LoadedPrompt, PromptFileError>> {
  if (filename.includes('/') || filename.includes('\\')) {
    return err(
      new PromptFileError(
        `Filename '${filename}' contains path separator. Filenames must not contain / or \\`
      )
    );
  }

  const promptPath = scope.describe(filename);
  const content = await scope.readText(filename);
  if (!content.ok) {
    if (content.error.code === 'FILE_NOT_FOUND') {
      return err(new PromptFileError(`Prompt file not found: ${promptPath}`));
    }
    return err(new PromptFileError(`Could not read prompt file ${promptPath}: ${content.error.message}`));
  }

  const parsed = parseFrontmatter(content.value, logger);
  if (!parsed.ok) {
    return err(new PromptFileError(`${promptPath}: ${parsed.error.message}`));
  }

  return ok({ template: parsed.value.body, policy: parsed.value.policy });
}

/**
 * Replace {{key}} placeholders. Unknown placeholders are left in place.
 */
export function renderPrompt(template: string, variables: Record<string, string>): string {
  let rendered = template;
  for (const [key, value] of Object.entries(variables)) {
    rendered = rendered.split(`{{${key}}}`).join(value);
  }
  return rendered;
}
