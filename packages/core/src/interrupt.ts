/**
 * Interrupt delivery for the session
 *
 * Signal listeners only record the signal. The lifecycle manager observes the
 * recorded state from its blocking wait and runs teardown from there.
 */

export interface SignalTarget {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface InterruptSource {
  readonly interrupted: boolean;
  /** First signal received, if any */
  readonly signal: NodeJS.Signals | null;
  /** Resolves with the first signal received */
  wait(): Promise<NodeJS.Signals>;
}

const DEFAULT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export class InterruptController implements InterruptSource {
  private received: NodeJS.Signals | null = null;
  private count = 0;
  private installed = false;
  private readonly waiters: Array<(signal: NodeJS.Signals) => void> = [];
  private readonly listener = (signal: NodeJS.Signals): void => this.record(signal);

  constructor(
    private readonly target: SignalTarget = process,
    private readonly signals: NodeJS.Signals[] = DEFAULT_SIGNALS
  ) {}

  /**
   * Start catching signals; replaces the default terminate-immediately behaviour
   */
  install(): void {
    if (this.installed) {
      return;
    }
    for (const signal of this.signals) {
      this.target.on(signal, this.listener);
    }
    this.installed = true;
  }

  dispose(): void {
    if (!this.installed) {
      return;
    }
    for (const signal of this.signals) {
      this.target.off(signal, this.listener);
    }
    this.installed = false;
  }

  get interrupted(): boolean {
    return this.received !== null;
  }

  get signal(): NodeJS.Signals | null {
    return this.received;
  }

  /**
   * Number of signals received so far, including repeats during teardown
   */
  get receivedCount(): number {
    return this.count;
  }

  wait(): Promise<NodeJS.Signals> {
    const received = this.received;
    if (received) {
      return Promise.resolve(received);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private record(signal: NodeJS.Signals): void {
    this.count++;
    if (this.received) {
      return;
    }
    this.received = signal;
    for (const resolve of this.waiters.splice(0)) {
      resolve(signal);
    }
  }
}
