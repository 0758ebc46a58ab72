import { BASE_INSTRUCTIONS, BUNDLE_PREAMBLE } from '../../templates/analysis-prompt.js';
import type { RoleTable, SelectedFile } from '../bundle/types.js';

export interface PromptTexts {
  preamble: string;
  baseInstructions: string;
}

export const DEFAULT_PROMPT_TEXTS: PromptTexts = {
  preamble: BUNDLE_PREAMBLE,
  baseInstructions: BASE_INSTRUCTIONS,
};

/**
 * One prompt for the whole bundle: the preamble, then every file's content
 * in selection order, each followed by a newline. Content is embedded verbatim.
 */
export function buildBundlePrompt(files: readonly SelectedFile[], texts: PromptTexts = DEFAULT_PROMPT_TEXTS): string {
  let prompt = texts.preamble;
  for (const file of files) {
    prompt += `${file.content}\n`;
  }
  return prompt;
}

/**
 * Prompt for a single file: base instructions, the role's questions, a blank
 * line, then the content.
 */
export function buildFilePrompt(
  file: SelectedFile,
  roles: RoleTable,
  texts: PromptTexts = DEFAULT_PROMPT_TEXTS,
): string {
  const instructions = roles.get(file.name)?.instructions;
  const header = instructions ? `${texts.baseInstructions}\n${instructions}` : texts.baseInstructions;
  return `${header}\n\n${file.content}`;
}
