/**
 * Clock interface
 * Abstracts time operations for testability and determinism
 */

/**
 * Interface for time operations
 * Implementations can be real (system clock) or mock (for testing)
 */
export interface Clock {
  /**
   * Get the current time as a Date object
   */
  now(): Date;

  /**
   * Get the current time as a Unix timestamp (milliseconds)
   */
  timestamp(): number;

  /**
   * Get the current time as an ISO 8601 string
   */
  iso(): string;

  /**
   * Wait for a specified duration
   * @param ms - Duration to wait in milliseconds
   */
  delay(ms: number): Promise<void>;
}

/**
 * Real implementation of Clock using system time
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  timestamp(): number {
    return Date.now();
  }

  iso(): string {
    return new Date().toISOString();
  }

  async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Options for the mock clock
 */
export interface MockClockOptions {
  /** Resolve delays immediately, moving the clock forward by the delay */
  autoAdvance?: boolean;
}

/**
 * Mock implementation of Clock for testing
 * Allows controlling time in tests
 */
export class MockClock implements Clock {
  private currentTime: Date;
  private delayCallbacks: Array<{ time: number; resolve: () => void }> = [];
  private readonly autoAdvance: boolean;
  private readonly requestedDelays: number[] = [];

  constructor(initialTime?: Date, options: MockClockOptions = {}) {
    this.currentTime = initialTime ?? new Date('2025-01-01T00:00:00.000Z');
    this.autoAdvance = options.autoAdvance ?? false;
  }

  now(): Date {
    return new Date(this.currentTime);
  }

  timestamp(): number {
    return this.currentTime.getTime();
  }

  iso(): string {
    return this.currentTime.toISOString();
  }

  async delay(ms: number): Promise<void> {
    this.requestedDelays.push(ms);
    if (this.autoAdvance) {
      this.advance(ms);
      return;
    }
    return new Promise((resolve) => {
      this.delayCallbacks.push({
        time: this.currentTime.getTime() + ms,
        resolve,
      });
    });
  }

  /**
   * Advance time by the specified duration and trigger any pending delays
   */
  advance(ms: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + ms);
    this.processDelays();
  }

  /**
   * Set the current time to a specific value
   */
  setTime(time: Date): void {
    this.currentTime = new Date(time);
    this.processDelays();
  }

  /**
   * Durations passed to delay(), in call order
   */
  getRequestedDelays(): number[] {
    return [...this.requestedDelays];
  }

  private processDelays(): void {
    const now = this.currentTime.getTime();
    const toResolve = this.delayCallbacks.filter((cb) => cb.time <= now);
    this.delayCallbacks = this.delayCallbacks.filter((cb) => cb.time > now);
    toResolve.forEach((cb) => cb.resolve());
  }
}
