export function debugLog(...args: unknown[]): void {
  if (process.env.DEBUG_VERBOSE?.toLowerCase() === 'true') {
    console.log(...args);
  }
}
