/**
 * Inquirer-based Prompter
 */

import inquirer from 'inquirer';
import { Prompter, SelectOptions, PrompterError, createPrompterError } from '../types/prompter';
import { Result, ok, err } from '../types/result';

export interface InquirerPrompterConfig {
  /** Whether running in interactive mode */
  interactive: boolean;
}

export class InquirerPrompter implements Prompter {
  private readonly config: InquirerPrompterConfig;

  constructor(config: Partial<InquirerPrompterConfig> = {}) {
    this.config = {
      interactive: config.interactive ?? true,
    };
  }

  isInteractive(): boolean {
    return this.config.interactive && (process.stdout.isTTY ?? false);
  }

  async select(options: SelectOptions): Promise<Result<string, PrompterError>> {
    if (!this.isInteractive()) {
      if (options.default !== undefined) {
        return ok(options.default);
      }
      return err(createPrompterError('NON_INTERACTIVE', 'Cannot prompt for selection in non-interactive mode'));
    }

    try {
      const response = await inquirer.prompt<{ value: string }>([
        {
          type: 'list',
          name: 'value',
          message: options.message,
          choices: options.choices.map((c) => ({
            name: c.description ? `${c.name} - ${c.description}` : c.name,
            value: c.value,
          })),
          default: options.default,
        },
      ]);
      return ok(response.value);
    } catch (error) {
      if (this.isCancelledError(error)) {
        return err(createPrompterError('CANCELLED'));
      }
      return err(
        createPrompterError(
          'IO_ERROR',
          `select failed: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined
        )
      );
    }
  }

  private isCancelledError(error: unknown): boolean {
    // Ctrl+C while a prompt is open
    if (error instanceof Error) {
      return (
        error.message.includes('User force closed') ||
        error.message.includes('cancelled') ||
        error.name === 'ExitPromptError'
      );
    }
    return false;
  }
}

export function createInquirerPrompter(config?: Partial<InquirerPrompterConfig>): Prompter {
  return new InquirerPrompter(config);
}
