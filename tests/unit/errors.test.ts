import { describe, it, expect } from 'vitest';
import { describeRadioError, PresenceError, PRESENCE_ERROR_CODES } from '../../src/errors.js';

describe('describeRadioError', () => {
  it('passes strings and error messages through', () => {
    expect(describeRadioError('Adapter busy')).toBe('Adapter busy');
    expect(describeRadioError(new Error('Device connection timeout'))).toBe('Device connection timeout');
  });

  it('translates HCI status codes', () => {
    expect(describeRadioError(8)).toBe('Connection Timeout');
    expect(describeRadioError({ code: 62 })).toBe('Connection Failed to be Established');
    expect(describeRadioError({ message: '', code: 19 })).toBe('Remote User Terminated Connection');
  });

  it('reports codes missing from the table', () => {
    expect(describeRadioError({ code: 999 })).toBe('Unknown Bluetooth error code: 999');
  });

  it('never returns an empty reason', () => {
    expect(describeRadioError(null)).toBe('Unknown error');
    expect(describeRadioError(undefined)).toBe('Unknown error');
  });
});

describe('PresenceError', () => {
  it('carries its code', () => {
    const error = new PresenceError(PRESENCE_ERROR_CODES.UNKNOWN_DEVICE, 'not sighted');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('PresenceError');
    expect(error.code).toBe('UNKNOWN_DEVICE');
    expect(describeRadioError(error)).toBe('not sighted');
  });
});
