import { Logger } from './logger.js';
import { PeriodicTask } from './periodic-task.js';

/**
 * Periodically asks the controller for one silent reconnect attempt.
 * The loop holds no presence state; the attempt callback decides whether to scan.
 */
export class ReconnectLoop {
  private task: PeriodicTask;
  private attempts = 0;
  private logger = new Logger('ReconnectLoop');

  constructor(intervalMs: number, attempt: () => Promise<void>) {
    this.task = new PeriodicTask('ReconnectLoop', intervalMs, async () => {
      this.attempts++;
      await attempt();
    });
  }

  arm(): boolean {
    const started = this.task.start();
    if (started) {
      this.attempts = 0;
      this.logger.info('Armed');
    }
    return started;
  }

  disarm(): boolean {
    const stopped = this.task.stop();
    if (stopped) {
      this.logger.info(`Disarmed after ${this.attempts} tick(s)`);
    }
    return stopped;
  }

  isArmed(): boolean {
    return this.task.isRunning();
  }

  getTickCount(): number {
    return this.attempts;
  }
}
