import { Logger } from './logger.js';

export enum PresencePhase {
  IDLE = 'IDLE',
  SCANNING = 'SCANNING',
  CONNECTING = 'CONNECTING',
  CONNECTED = 'CONNECTED',
  LOST = 'LOST'
}

interface StateTransition {
  from: PresencePhase;
  to: PresencePhase;
}

export class StateMachine {
  private currentState: PresencePhase = PresencePhase.IDLE;
  private logger: Logger;

  private readonly validTransitions: StateTransition[] = [
    { from: PresencePhase.IDLE, to: PresencePhase.SCANNING },
    // Tapping an entry left over from a finished session
    { from: PresencePhase.IDLE, to: PresencePhase.CONNECTING },
    { from: PresencePhase.SCANNING, to: PresencePhase.CONNECTING },
    { from: PresencePhase.SCANNING, to: PresencePhase.IDLE },
    { from: PresencePhase.CONNECTING, to: PresencePhase.CONNECTED },
    { from: PresencePhase.CONNECTING, to: PresencePhase.IDLE },
    { from: PresencePhase.CONNECTED, to: PresencePhase.LOST },
    { from: PresencePhase.CONNECTED, to: PresencePhase.IDLE },
    { from: PresencePhase.LOST, to: PresencePhase.CONNECTED },
    { from: PresencePhase.LOST, to: PresencePhase.IDLE }
  ];

  constructor() {
    this.logger = new Logger('StateMachine');
  }

  getState(): PresencePhase {
    return this.currentState;
  }

  canTransition(to: PresencePhase): boolean {
    return this.validTransitions.some(
      t => t.from === this.currentState && t.to === to
    );
  }

  transition(to: PresencePhase, context?: string): void {
    const from = this.currentState;

    if (!this.canTransition(to)) {
      const error = `Invalid state transition: ${from} -> ${to}`;
      this.logger.error(error);
      throw new Error(error);
    }

    this.currentState = to;
    this.logger.info(`State transition: ${from} -> ${to}${context ? ` (${context})` : ''}`);
  }

  reset(): void {
    this.logger.debug('Resetting state machine to IDLE');
    this.currentState = PresencePhase.IDLE;
  }
}
