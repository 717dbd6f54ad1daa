// ipaseg/log - Debug logging toggled at runtime

export let DEBUG = process.env.IPASEG_DEBUG === '1' || process.env.IPASEG_DEBUG === 'true';

export function setDebug(value: boolean): void {
  DEBUG = value;
}

export function dp(...args: unknown[]): void {
  if (DEBUG) {
    console.log('[DEBUG]', ...args);
  }
}

export function warn(...args: unknown[]): void {
  console.warn('Warning:', ...args);
}
