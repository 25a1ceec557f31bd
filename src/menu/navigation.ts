import type { MenuLayout, NavigationState } from '../types.js';
import { isCharKey, type Key } from '../ui/keys.js';
import { getPageBounds } from './layout.js';

export type NavigationCommand = 'up' | 'down' | 'left' | 'right' | 'confirm' | 'exit';

export interface NavigationUpdate {
  state: NavigationState;
  action: 'continue' | 'confirm' | 'exit';
}

/**
 * Selects the first option of `page`.
 */
export function goToPage(layout: MenuLayout, page: number): NavigationState {
  const bounds = getPageBounds(layout, page);
  return {
    selectedPage: page,
    selectedOption: bounds.pageStart,
    pageStart: bounds.pageStart,
    pageEnd: bounds.pageEnd,
  };
}

export function createNavigationState(layout: MenuLayout): NavigationState {
  return goToPage(layout, 0);
}

function isLastPage(state: NavigationState, layout: MenuLayout): boolean {
  return state.selectedPage >= layout.pageCount - 1;
}

export function moveUp(state: NavigationState, layout: MenuLayout): NavigationState {
  if (state.selectedOption > state.pageStart) {
    return { ...state, selectedOption: state.selectedOption - 1 };
  }
  if (state.selectedPage > 0) {
    // Wrapping up keeps the cursor at the bottom of the previous page.
    const previous = goToPage(layout, state.selectedPage - 1);
    return { ...previous, selectedOption: previous.pageEnd };
  }
  return state;
}

export function moveDown(state: NavigationState, layout: MenuLayout): NavigationState {
  if (state.selectedOption < state.pageEnd) {
    return { ...state, selectedOption: state.selectedOption + 1 };
  }
  if (!isLastPage(state, layout)) {
    return goToPage(layout, state.selectedPage + 1);
  }
  return state;
}

export function previousPage(state: NavigationState, layout: MenuLayout): NavigationState {
  if (state.selectedPage > 0) {
    return goToPage(layout, state.selectedPage - 1);
  }
  return state;
}

export function nextPage(state: NavigationState, layout: MenuLayout): NavigationState {
  if (!isLastPage(state, layout)) {
    return goToPage(layout, state.selectedPage + 1);
  }
  return state;
}

export function resolveNavigationCommand(key: Key): NavigationCommand | undefined {
  if (key.name === 'up' || isCharKey(key, 'k')) {
    return 'up';
  }
  if (key.name === 'down' || isCharKey(key, 'j')) {
    return 'down';
  }
  if (key.name === 'left' || isCharKey(key, 'h', 'b')) {
    return 'left';
  }
  if (key.name === 'right' || isCharKey(key, 'l', 'w')) {
    return 'right';
  }
  if (key.name === 'enter') {
    return 'confirm';
  }
  if (key.name === 'escape' || key.name === 'backspace' || key.name === 'interrupt' || isCharKey(key, 'q')) {
    return 'exit';
  }
  return undefined;
}

export function applyMenuKey(state: NavigationState, layout: MenuLayout, key: Key): NavigationUpdate {
  const command = resolveNavigationCommand(key);

  if (command === 'up') {
    return { state: moveUp(state, layout), action: 'continue' };
  }
  if (command === 'down') {
    return { state: moveDown(state, layout), action: 'continue' };
  }
  if (command === 'left') {
    return { state: previousPage(state, layout), action: 'continue' };
  }
  if (command === 'right') {
    return { state: nextPage(state, layout), action: 'continue' };
  }
  if (command === 'confirm') {
    return { state, action: 'confirm' };
  }
  if (command === 'exit') {
    return { state, action: 'exit' };
  }
  return { state, action: 'continue' };
}
