/**
 * Prompter interface
 * Abstracts user prompts for testability and non-interactive runs
 */

import { Result } from './result';

export interface SelectChoice {
  /** Display name for the choice */
  name: string;
  /** Value returned when this choice is selected */
  value: string;
  /** Shown after the name */
  description?: string;
}

export interface SelectOptions {
  message: string;
  choices: SelectChoice[];
  default?: string;
}

export type PrompterErrorCode = 'CANCELLED' | 'NON_INTERACTIVE' | 'IO_ERROR';

export interface PrompterError {
  code: PrompterErrorCode;
  message: string;
  cause?: Error;
}

/**
 * Interface for user prompts
 * Implementations can be real (inquirer) or scripted (for testing)
 */
export interface Prompter {
  /**
   * Ask the user to pick one choice
   */
  select(options: SelectOptions): Promise<Result<string, PrompterError>>;

  /**
   * Check if prompts are available (TTY and interactive mode)
   */
  isInteractive(): boolean;
}

export function createPrompterError(code: PrompterErrorCode, message?: string, cause?: Error): PrompterError {
  const defaultMessages: Record<PrompterErrorCode, string> = {
    CANCELLED: 'User cancelled the prompt',
    NON_INTERACTIVE: 'Cannot prompt in non-interactive mode',
    IO_ERROR: 'IO error during prompt',
  };

  return {
    code,
    message: message ?? defaultMessages[code],
    cause,
  };
}
