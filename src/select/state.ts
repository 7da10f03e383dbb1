export type SelectorStatus = 'browsing' | 'confirmed' | 'cancelled';

export type SelectorAction = 'previous' | 'next' | 'toggle' | 'confirm' | 'cancel';

export interface SelectorState {
  status: SelectorStatus;
  cursor: number;
  /** Catalog indices in the order they were toggled on */
  selected: readonly number[];
  notice?: string;
}

export const EMPTY_CONFIRM_NOTICE = 'Select at least one template before confirming.';

export function createSelectorState(): SelectorState {
  return { status: 'browsing', cursor: 0, selected: [] };
}

/**
 * Apply one action to the selector state.
 *
 * `confirmed` and `cancelled` are terminal: every action leaves them unchanged.
 */
export function reduceSelector(
  state: SelectorState,
  action: SelectorAction,
  size: number
): SelectorState {
  if (state.status !== 'browsing') {
    return state;
  }

  const { notice: _notice, ...current } = state;

  switch (action) {
    case 'previous':
      return size === 0 ? current : { ...current, cursor: (state.cursor - 1 + size) % size };

    case 'next':
      return size === 0 ? current : { ...current, cursor: (state.cursor + 1) % size };

    case 'toggle': {
      if (size === 0) {
        return current;
      }
      const selected = state.selected.includes(state.cursor)
        ? state.selected.filter((index) => index !== state.cursor)
        : [...state.selected, state.cursor];
      return { ...current, selected };
    }

    case 'confirm':
      if (state.selected.length === 0) {
        return { ...current, notice: EMPTY_CONFIRM_NOTICE };
      }
      return { ...current, status: 'confirmed' };

    case 'cancel':
      return { ...current, status: 'cancelled' };
  }
}
