import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { SessionIO } from './types.js';

export type LineIO = SessionIO & { close(): void };

/**
 * Session I/O over a pair of streams. Lines are queued as they arrive, so
 * input piped in one chunk is answered prompt by prompt; `ask` resolves to
 * `null` once the input has ended and the queue is empty.
 */
export function createLineIO(input: Readable, output: Writable): LineIO {
  const rl = createInterface({ input, output, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    ask: async (prompt) => {
      output.write(prompt);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    print: (line) => {
      output.write(`${line}\n`);
    },
    close: () => rl.close()
  };
}
