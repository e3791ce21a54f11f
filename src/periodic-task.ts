import { Logger } from './logger.js';

/**
 * A named repeating timer with a single-instance guarantee:
 * start() while running and stop() while stopped are both no-ops.
 */
export class PeriodicTask {
  private timer: NodeJS.Timeout | null = null;
  private logger: Logger;

  constructor(
    private readonly name: string,
    private readonly intervalMs: number,
    private readonly tick: () => void | Promise<void>
  ) {
    this.logger = new Logger(name);
  }

  start(): boolean {
    if (this.timer) {
      this.logger.debug('Already running, ignoring start');
      return false;
    }

    this.timer = setInterval(() => {
      this.runTick().catch(error => {
        this.logger.error('Tick failed:', error);
      });
    }, this.intervalMs);
    this.logger.debug(`Started (every ${this.intervalMs}ms)`);
    return true;
  }

  stop(): boolean {
    if (!this.timer) {
      return false;
    }

    clearInterval(this.timer);
    this.timer = null;
    this.logger.debug('Stopped');
    return true;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  private async runTick(): Promise<void> {
    await this.tick();
  }
}
