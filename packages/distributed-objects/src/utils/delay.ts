/**
 * Delay execution by the specified number of milliseconds. Even a zero delay
 * waits for a turn of the event loop.
 *
 * @param ms - The number of milliseconds to delay.
 * @returns A promise that resolves after the specified delay.
 */
export const delay = async (ms = 0): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));
