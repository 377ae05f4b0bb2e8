const KEY_ALIASES: Record<string, string> = {
  return: 'enter',
  esc: 'escape',
  option: 'alt',
  opt: 'alt',
  command: 'cmd',
  meta: 'cmd',
  win: 'cmd',
  windows: 'cmd',
  super: 'cmd',
  control: 'ctrl',
  del: 'delete',
  spacebar: 'space',
  arrowup: 'up',
  arrowdown: 'down',
  arrowleft: 'left',
  arrowright: 'right',
  pgup: 'pageup',
  pgdn: 'pagedown',
  ins: 'insert',
};

export const MODIFIER_KEYS = ['cmd', 'ctrl', 'alt', 'shift'] as const;

/**
 * Lowercases a key name and maps common aliases onto the canonical set
 * understood by the input backend.
 */
export function normalizeKeyName(key: string): string {
  const lower = key.trim().toLowerCase();
  if (lower === '' && key.length > 0) {
    return 'space';
  }
  return KEY_ALIASES[lower] ?? lower;
}

export function isModifierKey(key: string): boolean {
  return MODIFIER_KEYS.some((modifier) => modifier === normalizeKeyName(key));
}
