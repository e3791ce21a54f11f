import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LostAlertLoop } from '../../src/lost-alert-loop.js';
import { TerminalAlertDispatcher } from '../../src/alert-dispatcher.js';

describe('LostAlertLoop', () => {
  const alerts = {
    showAlert: vi.fn().mockResolvedValue(undefined),
    cancelAllAlerts: vi.fn().mockResolvedValue(undefined)
  };

  beforeEach(() => {
    vi.useFakeTimers();
    alerts.showAlert.mockClear();
    alerts.cancelAllAlerts.mockClear();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('shows the first alert immediately, then repeats every interval', async () => {
    const loop = new LostAlertLoop(alerts, 3000);

    expect(loop.arm()).toBe(true);
    expect(alerts.showAlert).toHaveBeenCalledTimes(1);
    expect(alerts.showAlert).toHaveBeenLastCalledWith({
      title: 'Umbrella Alert',
      body: 'Umbrella disconnected! You left it behind.',
      urgency: 'high'
    });

    await vi.advanceTimersByTimeAsync(3000);
    expect(alerts.showAlert).toHaveBeenCalledTimes(2);
    expect(alerts.showAlert).toHaveBeenLastCalledWith({
      title: 'Umbrella Alert',
      body: 'Umbrella still missing',
      urgency: 'high'
    });

    await vi.advanceTimersByTimeAsync(6000);
    expect(alerts.showAlert).toHaveBeenCalledTimes(4);
    loop.disarm();
  });

  it('arming twice does not double the cadence', async () => {
    const loop = new LostAlertLoop(alerts, 3000);

    loop.arm();
    expect(loop.arm()).toBe(false);
    await vi.advanceTimersByTimeAsync(3000);

    expect(alerts.showAlert).toHaveBeenCalledTimes(2);
    loop.disarm();
  });

  it('disarm stops repeats and withdraws the alert', async () => {
    const loop = new LostAlertLoop(alerts, 3000);
    loop.arm();

    expect(loop.disarm()).toBe(true);
    expect(loop.isArmed()).toBe(false);
    expect(alerts.cancelAllAlerts).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(9000);
    expect(alerts.showAlert).toHaveBeenCalledTimes(1);
  });

  it('disarm while disarmed does nothing', () => {
    const loop = new LostAlertLoop(alerts, 3000);

    expect(loop.disarm()).toBe(false);
    expect(alerts.cancelAllAlerts).not.toHaveBeenCalled();
  });

  it('replaces the displayed alert on a terminal dispatcher', async () => {
    const write = vi.fn();
    const dispatcher = new TerminalAlertDispatcher({ bell: true, write });
    const loop = new LostAlertLoop(dispatcher, 3000);

    loop.arm();
    await vi.advanceTimersByTimeAsync(0);
    expect(dispatcher.getDisplayedAlert()?.body).toBe('Umbrella disconnected! You left it behind.');

    await vi.advanceTimersByTimeAsync(3000);
    expect(dispatcher.getDisplayedAlert()?.body).toBe('Umbrella still missing');
    expect(write).toHaveBeenCalledTimes(2);
    expect(write).toHaveBeenCalledWith('\x07');

    loop.disarm();
    await vi.advanceTimersByTimeAsync(0);
    expect(dispatcher.getDisplayedAlert()).toBeNull();
  });
});
