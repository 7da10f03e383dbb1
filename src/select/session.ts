import { emitKeypressEvents, type Key } from 'readline';
import type { TemplateEntry } from '../catalog/index.js';
import { logger } from '../utils/logger.js';
import { decodeKey } from './keys.js';
import { CLEAR_SCREEN, renderSelector } from './render.js';
import { createSelectorState, reduceSelector, type SelectorState } from './state.js';
import { withRawMode, type TerminalInput } from './terminal.js';

export interface SelectorOutput {
  write(chunk: string): unknown;
}

export interface SelectorTerminal {
  input: TerminalInput;
  output: SelectorOutput;
}

export type SelectorResult =
  | { status: 'confirmed'; selection: string[] }
  | { status: 'cancelled' };

/**
 * Let the user pick templates from the catalog.
 *
 * Resolves with the chosen ids in the order they were toggled on, or with
 * `cancelled` when the user quits or the input ends.
 */
export function runSelector(
  entries: readonly TemplateEntry[],
  terminal: SelectorTerminal
): Promise<SelectorResult> {
  const { input, output } = terminal;

  return withRawMode(
    input,
    () =>
      new Promise<SelectorResult>((resolve, reject) => {
        let state: SelectorState = createSelectorState();

        output.write(renderSelector(state, entries));

        const finish = (result: SelectorResult) => {
          detach();
          output.write(CLEAR_SCREEN);
          resolve(result);
        };

        const onKeypress = (sequence: string | undefined, key: Key | undefined) => {
          try {
            const action = decodeKey(sequence, key);
            if (!action) return;

            state = reduceSelector(state, action, entries.length);
            logger.debug(`Selector ${action} -> ${state.status}`);

            if (state.status === 'confirmed') {
              finish({
                status: 'confirmed',
                selection: state.selected.map((index) => entries[index].id),
              });
            } else if (state.status === 'cancelled') {
              finish({ status: 'cancelled' });
            } else {
              output.write(renderSelector(state, entries));
            }
          } catch (error) {
            detach();
            reject(error);
          }
        };

        const onEnd = () => finish({ status: 'cancelled' });

        const onError = (error: Error) => {
          detach();
          reject(error);
        };

        const detach = () => {
          input.removeListener('keypress', onKeypress);
          input.removeListener('end', onEnd);
          input.removeListener('error', onError);
          input.pause();
        };

        emitKeypressEvents(input);
        input.on('keypress', onKeypress);
        input.once('end', onEnd);
        input.once('error', onError);
        input.resume();
      })
  );
}
