/**
 * Key message helpers
 */

import type { KeyMsg, KeyType } from './types.js';

/**
 * Render a key message the way update() usually matches on it:
 * 'a', 'alt+a', 'enter', 'alt+enter', 'ctrl+c'
 */
export function keyString(msg: KeyMsg): string {
  const name = msg.key === 'runes' ? msg.runes.join('') : msg.key;
  return msg.alt ? `alt+${name}` : name;
}

export function runeKey(text: string, alt: boolean = false): KeyMsg {
  return { type: 'key', key: 'runes', runes: Array.from(text), alt };
}

export function specialKey(key: Exclude<KeyType, 'runes'>, alt: boolean = false): KeyMsg {
  return { type: 'key', key, runes: [], alt };
}
