export {
  runSelector,
  type SelectorResult,
  type SelectorTerminal,
  type SelectorOutput,
} from './session.js';

export {
  createSelectorState,
  reduceSelector,
  EMPTY_CONFIRM_NOTICE,
  type SelectorState,
  type SelectorStatus,
  type SelectorAction,
} from './state.js';

export { decodeKey } from './keys.js';
export { renderSelector, CLEAR_SCREEN, SELECTOR_INSTRUCTIONS } from './render.js';
export { withRawMode, type TerminalInput } from './terminal.js';
