/**
 * UI module - spinners and prompts
 */

export { SpinnerService } from './spinner-service';
export type { Spinner, SpinnerFactory, SpinnerServiceConfig } from './spinner-service';

export { InquirerPrompter, createInquirerPrompter } from './inquirer-prompter';
export type { InquirerPrompterConfig } from './inquirer-prompter';
