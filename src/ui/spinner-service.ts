/**
 * Spinner service
 * ora spinners on a TTY, plain status lines elsewhere, nothing in quiet mode
 */

import ora, { Ora } from 'ora';

export interface Spinner {
  start(): void;
  /** Stop with a success mark */
  succeed(text?: string): void;
  /** Stop with a failure mark */
  fail(text?: string): void;
  setText(text: string): void;
  /** Stop without a status mark */
  stop(): void;
  readonly isSpinning: boolean;
}

/**
 * Anything that can hand out a started spinner
 */
export interface SpinnerFactory {
  start(text: string): Spinner;
}

export interface SpinnerServiceConfig {
  isTTY: boolean;
  quiet: boolean;
  stream: NodeJS.WriteStream;
}

class NullSpinner implements Spinner {
  private spinning = false;

  start(): void {
    this.spinning = true;
  }
  succeed(): void {
    this.spinning = false;
  }
  fail(): void {
    this.spinning = false;
  }
  setText(): void {}
  stop(): void {
    this.spinning = false;
  }
  get isSpinning(): boolean {
    return this.spinning;
  }
}

/**
 * One line per state change, for logs and pipes
 */
class TextSpinner implements Spinner {
  private spinning = false;

  constructor(
    private text: string,
    private readonly stream: NodeJS.WriteStream
  ) {}

  start(): void {
    this.spinning = true;
    this.stream.write(`> ${this.text}\n`);
  }

  succeed(text?: string): void {
    this.spinning = false;
    this.stream.write(`✓ ${text ?? this.text}\n`);
  }

  fail(text?: string): void {
    this.spinning = false;
    this.stream.write(`✗ ${text ?? this.text}\n`);
  }

  setText(text: string): void {
    this.text = text;
    if (this.spinning) {
      this.stream.write(`> ${text}\n`);
    }
  }

  stop(): void {
    this.spinning = false;
  }

  get isSpinning(): boolean {
    return this.spinning;
  }
}

class OraSpinner implements Spinner {
  private readonly oraInstance: Ora;

  constructor(text: string, stream: NodeJS.WriteStream) {
    this.oraInstance = ora({ text, stream, color: 'yellow' });
  }

  start(): void {
    this.oraInstance.start();
  }

  succeed(text?: string): void {
    this.oraInstance.succeed(text);
  }

  fail(text?: string): void {
    this.oraInstance.fail(text);
  }

  setText(text: string): void {
    this.oraInstance.text = text;
  }

  stop(): void {
    this.oraInstance.stop();
  }

  get isSpinning(): boolean {
    return this.oraInstance.isSpinning;
  }
}

export class SpinnerService implements SpinnerFactory {
  private readonly config: SpinnerServiceConfig;
  private active: Spinner | null = null;

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    const stream = config.stream ?? process.stdout;
    this.config = {
      isTTY: config.isTTY ?? stream.isTTY ?? false,
      quiet: config.quiet ?? false,
      stream,
    };
  }

  /**
   * Create and start a spinner, stopping any active one
   */
  start(text: string): Spinner {
    this.stopAll();

    let spinner: Spinner;
    if (this.config.quiet) {
      spinner = new NullSpinner();
    } else if (this.config.isTTY) {
      spinner = new OraSpinner(text, this.config.stream);
    } else {
      spinner = new TextSpinner(text, this.config.stream);
    }

    spinner.start();
    this.active = spinner;
    return spinner;
  }

  stopAll(): void {
    if (this.active?.isSpinning) {
      this.active.stop();
    }
    this.active = null;
  }
}
