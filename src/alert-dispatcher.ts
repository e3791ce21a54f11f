import { Logger } from './logger.js';

export type AlertUrgency = 'high';

export interface Alert {
  title: string;
  body: string;
  urgency: AlertUrgency;
}

export interface DisplayedAlert extends Alert {
  shownAt: string;
}

export interface AlertDispatcher {
  showAlert(alert: Alert): Promise<void>;
  cancelAllAlerts(): Promise<void>;
}

export interface TerminalAlertOptions {
  bell: boolean;
  write?: (chunk: string) => void;
}

/**
 * Delivers alerts to the operator's terminal.
 *
 * There is a single alert slot: each alert replaces the one on display.
 * High urgency alerts ring the terminal bell when enabled.
 */
export class TerminalAlertDispatcher implements AlertDispatcher {
  private displayed: DisplayedAlert | null = null;
  private logger = new Logger('Alert');
  private readonly write: (chunk: string) => void;

  constructor(private readonly options: TerminalAlertOptions) {
    this.write = options.write ?? (chunk => process.stdout.write(chunk));
  }

  async showAlert(alert: Alert): Promise<void> {
    this.displayed = { ...alert, shownAt: new Date().toISOString() };
    this.logger.warn(`🚨 ${alert.title}: ${alert.body}`);
    if (this.options.bell && alert.urgency === 'high') {
      this.write('\x07');
    }
  }

  async cancelAllAlerts(): Promise<void> {
    if (this.displayed) {
      this.logger.info(`Alert withdrawn: ${this.displayed.body}`);
    }
    this.displayed = null;
  }

  getDisplayedAlert(): DisplayedAlert | null {
    return this.displayed ? { ...this.displayed } : null;
  }
}
