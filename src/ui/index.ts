/**
 * UI module - interactive prompts
 */

export { InquirerPrompter } from './inquirer-prompter';
export type { InquirerPrompterOptions } from './inquirer-prompter';
