import { config } from './config';

let testNow: Date | null = null;

// Pins the clock for session expiry tests; ignored outside test mode.
export function setTestNow(date: Date | null): void {
  if (config.isTest) {
    testNow = date;
  }
}

export function getNow(): Date {
  if (config.isTest && testNow) {
    return testNow;
  }
  return new Date();
}

export function nowSeconds(): number {
  return Math.floor(getNow().getTime() / 1000);
}
