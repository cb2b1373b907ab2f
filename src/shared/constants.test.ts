import { describe, it, expect } from 'vitest';
import { EXCHANGE, EXIT_CODES, SERIAL } from './constants';

describe('EXCHANGE', () => {
  it('retries each operation five times', () => {
    expect(EXCHANGE.MAX_ATTEMPTS).toBe(5);
  });

  it('bounds each read step by attempts and wall clock', () => {
    expect(EXCHANGE.READ_BUDGET_ATTEMPTS).toBe(16384);
    expect(EXCHANGE.READ_TIMEOUT).toBeGreaterThan(SERIAL.READ_POLL_INTERVAL);
  });
});

describe('EXIT_CODES', () => {
  it('uses distinct codes for each outcome', () => {
    const codes = Object.values(EXIT_CODES);
    expect(new Set(codes).size).toBe(codes.length);
    expect(EXIT_CODES.OK).toBe(0);
  });
});
