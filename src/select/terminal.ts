import { logger } from '../utils/logger.js';

/**
 * The part of `process.stdin` the selector relies on
 */
export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
}

const RESTORE_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Run `body` with the terminal in raw mode.
 *
 * The previous mode is restored when `body` settles, and also if the
 * process exits or is signalled while it is still running.
 */
export async function withRawMode<T>(input: TerminalInput, body: () => Promise<T>): Promise<T> {
  const wasRaw = input.isRaw ?? false;
  let restored = false;

  const restore = () => {
    if (restored) return;
    restored = true;
    input.setRawMode?.(wasRaw);
    logger.debug('Terminal mode restored');
  };

  const onSignal = (signal: NodeJS.Signals) => {
    restore();
    detach();
    process.kill(process.pid, signal);
  };

  const detach = () => {
    process.removeListener('exit', restore);
    for (const signal of RESTORE_SIGNALS) {
      process.removeListener(signal, onSignal);
    }
  };

  process.once('exit', restore);
  for (const signal of RESTORE_SIGNALS) {
    process.once(signal, onSignal);
  }

  try {
    input.setRawMode?.(true);
    return await body();
  } finally {
    detach();
    restore();
  }
}
