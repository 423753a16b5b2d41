/**
 * UI module - status lines and prompts
 */

export type { StatusLine, StatusLineOptions, StatusServiceConfig } from './status-service';
export { StatusService, createStatusService } from './status-service';

export type { InquirerPrompterConfig } from './inquirer-prompter';
export { InquirerPrompter, createInquirerPrompter } from './inquirer-prompter';
