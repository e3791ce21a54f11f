import type { AlertDispatcher } from './alert-dispatcher.js';
import { ALERT_TEXT } from './constants.js';
import { Logger } from './logger.js';
import { PeriodicTask } from './periodic-task.js';

/**
 * Nags the user while the umbrella is missing: one alert on arming, then a
 * repeat every interval until disarmed. Disarming withdraws what is on screen.
 */
export class LostAlertLoop {
  private task: PeriodicTask;
  private armed = false;
  private logger = new Logger('LostAlertLoop');

  constructor(
    private readonly alerts: AlertDispatcher,
    intervalMs: number
  ) {
    this.task = new PeriodicTask('LostAlertLoop', intervalMs, () => this.alerts.showAlert({
      title: ALERT_TEXT.TITLE,
      body: ALERT_TEXT.REPEAT_BODY,
      urgency: 'high'
    }));
  }

  arm(): boolean {
    if (this.armed) {
      return false;
    }
    this.armed = true;

    this.alerts.showAlert({
      title: ALERT_TEXT.TITLE,
      body: ALERT_TEXT.FIRST_BODY,
      urgency: 'high'
    }).catch(error => {
      this.logger.error('Failed to show alert:', error);
    });
    this.task.start();
    this.logger.info('Armed');
    return true;
  }

  disarm(): boolean {
    if (!this.armed) {
      return false;
    }
    this.armed = false;

    this.task.stop();
    this.alerts.cancelAllAlerts().catch(error => {
      this.logger.error('Failed to cancel alerts:', error);
    });
    this.logger.info('Disarmed');
    return true;
  }

  isArmed(): boolean {
    return this.armed;
  }
}
