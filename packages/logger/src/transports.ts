import { formatTagPrefix } from './tags.ts';
import type { LogEntry, Transport } from './types.ts';

type ConsoleTransportOptions = {
  tags?: boolean;
};

/**
 * Creates a console transport, which writes each entry to the console method
 * named by its level.
 *
 * @param options - Options for the console transport.
 * @param options.tags - Whether to prefix the message with the entry's tags
 *   (default: `true`).
 * @returns A transport function that writes to the console.
 */
export const makeConsoleTransport = (
  options: ConsoleTransportOptions = {},
): Transport => {
  const { tags = true } = options;
  return (entry) => {
    const text = `${formatTagPrefix(tags, entry)}${entry.message ?? ''}`;
    const args = [
      ...(text.length > 0 ? [text.trimEnd()] : []),
      ...(entry.data ?? []),
    ];
    // Ultimately, a console somewhere is an acceptable terminal for logging
    // eslint-disable-next-line no-console
    console[entry.level](...args);
  };
};

/**
 * Creates a transport that collects entries into an array. Mostly useful in
 * tests.
 *
 * @param target - The array receiving the entries.
 * @returns A transport function that pushes to the array.
 */
export const makeArrayTransport = (target: LogEntry[]): Transport => {
  return (entry) => {
    target.push(entry);
  };
};
