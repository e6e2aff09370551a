/**
 * Closed action vocabulary accepted from agents and manual callers, and its mapping
 * onto the handheld's joypad.
 */

import { InvalidActionError } from '../errors.js';

export const BUTTON_ACTIONS = [
  'confirm',
  'cancel',
  'menu-start',
  'menu-select',
  'up',
  'down',
  'left',
  'right',
] as const;

export type ButtonAction = (typeof BUTTON_ACTIONS)[number];

export type JoypadButton = 'A' | 'B' | 'START' | 'SELECT' | 'UP' | 'DOWN' | 'LEFT' | 'RIGHT';

export const ACTION_TO_BUTTON: Record<ButtonAction, JoypadButton> = {
  confirm: 'A',
  cancel: 'B',
  'menu-start': 'START',
  'menu-select': 'SELECT',
  up: 'UP',
  down: 'DOWN',
  left: 'LEFT',
  right: 'RIGHT',
};

const ACTION_SET: ReadonlySet<string> = new Set(BUTTON_ACTIONS);

export function isButtonAction(token: string): token is ButtonAction {
  return ACTION_SET.has(token);
}

export function parseAction(token: string): ButtonAction {
  if (!isButtonAction(token)) throw new InvalidActionError(token);
  return token;
}

/** Validates every token before any is used; the first unknown token fails the whole list. */
export function parseActions(tokens: readonly string[]): ButtonAction[] {
  return tokens.map(parseAction);
}
