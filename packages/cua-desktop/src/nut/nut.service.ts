import { Injectable, Logger } from '@nestjs/common';
import { Button, Key, keyboard, mouse, Point } from '@nut-tree-fork/nut-js';
import { execFile } from 'child_process';
import { promisify } from 'util';
import {
  delay,
  InputBackend,
  isMacOS,
  logPlatformInfo,
  MouseButton,
  Point as ScreenPoint,
} from '@cua/shared';

const execFileAsync = promisify(execFile);

/**
 * Canonical key names (as produced by the key_press tool) mapped to nut-js
 * keys. Anything not listed is looked up case-insensitively in the nut-js
 * Key enum itself.
 */
const CanonicalToNutKeyMap: Record<string, Key> = {
  // Modifier Keys
  cmd: Key.LeftSuper,
  ctrl: Key.LeftControl,
  alt: Key.LeftAlt,
  shift: Key.LeftShift,

  // Special keys
  enter: Key.Enter,
  escape: Key.Escape,
  tab: Key.Tab,
  space: Key.Space,
  backspace: Key.Backspace,
  delete: Key.Delete,
  insert: Key.Insert,
  home: Key.Home,
  end: Key.End,
  pageup: Key.PageUp,
  pagedown: Key.PageDown,
  capslock: Key.CapsLock,

  // Arrow keys
  up: Key.Up,
  down: Key.Down,
  left: Key.Left,
  right: Key.Right,

  // Digits
  '0': Key.Num0,
  '1': Key.Num1,
  '2': Key.Num2,
  '3': Key.Num3,
  '4': Key.Num4,
  '5': Key.Num5,
  '6': Key.Num6,
  '7': Key.Num7,
  '8': Key.Num8,
  '9': Key.Num9,

  // Punctuation
  '.': Key.Period,
  ',': Key.Comma,
  ';': Key.Semicolon,
  "'": Key.Quote,
  '`': Key.Grave,
  '-': Key.Minus,
  '=': Key.Equal,
  '[': Key.LeftBracket,
  ']': Key.RightBracket,
  '\\': Key.Backslash,
  '/': Key.Slash,
};

// Create a map of lowercase keys to nutjs keys
const NutKeyMapLowercase: Record<string, Key> = Object.entries(Key)
  // we only want the string→number pairs (filter out the reverse numeric keys)
  .filter(
    (entry): entry is [string, Key] =>
      isNaN(Number(entry[0])) && typeof entry[1] === 'number',
  )
  .reduce(
    (map, [name, value]) => {
      map[name.toLowerCase()] = value;
      return map;
    },
    {} as Record<string, Key>,
  );

const ShiftedCharMap: Record<string, Key> = {
  '!': Key.Num1,
  '@': Key.Num2,
  '#': Key.Num3,
  $: Key.Num4,
  '%': Key.Num5,
  '^': Key.Num6,
  '&': Key.Num7,
  '*': Key.Num8,
  '(': Key.Num9,
  ')': Key.Num0,
  _: Key.Minus,
  '+': Key.Equal,
  '{': Key.LeftBracket,
  '}': Key.RightBracket,
  '|': Key.Backslash,
  ':': Key.Semicolon,
  '"': Key.Quote,
  '<': Key.Comma,
  '>': Key.Period,
  '?': Key.Slash,
  '~': Key.Grave,
};

const TYPING_JITTER_MS = 30;

const NUT_BUTTONS: Record<MouseButton, Button> = {
  left: Button.LEFT,
  right: Button.RIGHT,
  middle: Button.MIDDLE,
};

interface KeyInfo {
  keyCode: Key;
  withShift: boolean;
}

/**
 * Input injection through nut-js. On macOS, text goes through System
 * Events keystrokes instead, which also reach secure input fields.
 */
@Injectable()
export class NutService implements InputBackend {
  private readonly logger = new Logger(NutService.name);

  constructor() {
    logPlatformInfo(this.logger);

    mouse.config.autoDelayMs = 100;
    keyboard.config.autoDelayMs = 10;
  }

  async moveTo({ x, y }: ScreenPoint): Promise<void> {
    this.logger.debug(`Moving mouse to coordinates: (${x}, ${y})`);
    try {
      await mouse.setPosition(new Point(x, y));
    } catch (error) {
      throw new Error(`Failed to move mouse: ${messageOf(error)}`);
    }
  }

  async click(button: MouseButton, clicks: 1 | 2): Promise<void> {
    this.logger.debug(`Clicking mouse button: ${button} x${clicks}`);
    try {
      if (clicks === 2) {
        await mouse.doubleClick(NUT_BUTTONS[button]);
      } else {
        await mouse.click(NUT_BUTTONS[button]);
      }
    } catch (error) {
      throw new Error(`Failed to click mouse button: ${messageOf(error)}`);
    }
  }

  async pressButton(button: MouseButton): Promise<void> {
    try {
      await mouse.pressButton(NUT_BUTTONS[button]);
    } catch (error) {
      throw new Error(
        `Failed to send mouse ${button} button press event: ${messageOf(error)}`,
      );
    }
  }

  async releaseButton(button: MouseButton): Promise<void> {
    try {
      await mouse.releaseButton(NUT_BUTTONS[button]);
    } catch (error) {
      throw new Error(
        `Failed to send mouse ${button} button release event: ${messageOf(error)}`,
      );
    }
  }

  /**
   * Positive deltaY scrolls down, positive deltaX scrolls right.
   */
  async scroll(deltaX: number, deltaY: number): Promise<void> {
    this.logger.debug(`Mouse wheel event: dx=${deltaX} dy=${deltaY}`);
    try {
      if (deltaY > 0) {
        await mouse.scrollDown(deltaY);
      } else if (deltaY < 0) {
        await mouse.scrollUp(-deltaY);
      }
      if (deltaX > 0) {
        await mouse.scrollRight(deltaX);
      } else if (deltaX < 0) {
        await mouse.scrollLeft(-deltaX);
      }
    } catch (error) {
      throw new Error(`Failed to scroll: ${messageOf(error)}`);
    }
  }

  async keyTap(key: string, modifiers: string[]): Promise<void> {
    const modifierKeys = modifiers.map((modifier) => this.validateKey(modifier));
    const mainKey = this.validateKey(key);

    this.logger.debug(`Sending keys: ${[...modifiers, key].join('+')}`);
    try {
      for (const modifier of modifierKeys) {
        await keyboard.pressKey(modifier);
      }
      await keyboard.pressKey(mainKey);
      await keyboard.releaseKey(mainKey);
      for (const modifier of [...modifierKeys].reverse()) {
        await keyboard.releaseKey(modifier);
      }
    } catch (error) {
      throw new Error(`Failed to send keys: ${messageOf(error)}`);
    }
  }

  async typeText(text: string): Promise<void> {
    this.logger.log(
      `[KEYBOARD] Starting typeText: "${text.substring(0, 100)}" (${text.length} chars)`,
    );

    if (isMacOS()) {
      await this.typeTextMacOS(text);
      return;
    }

    try {
      for (let i = 0; i < text.length; i++) {
        const char = text[i];

        if (char === '\r' && text[i + 1] === '\n') {
          continue;
        }
        const keyInfo = this.charToKeyInfo(char);
        if (!keyInfo) {
          throw new Error(`No key mapping found for character: ${char}`);
        }
        if (keyInfo.withShift) {
          await keyboard.pressKey(Key.LeftShift, keyInfo.keyCode);
          await keyboard.releaseKey(Key.LeftShift, keyInfo.keyCode);
        } else {
          await keyboard.pressKey(keyInfo.keyCode);
          await keyboard.releaseKey(keyInfo.keyCode);
        }
      }
    } catch (error) {
      this.logger.error(`[KEYBOARD] FAILED to type text: ${messageOf(error)}`);
      throw new Error(`Failed to type text: ${messageOf(error)}`);
    }
  }

  async cursorPosition(): Promise<ScreenPoint> {
    const position = await mouse.getPosition();
    return { x: position.x, y: position.y };
  }

  /**
   * One System Events keystroke per character, with a jittered pause
   * between characters.
   */
  private async typeTextMacOS(text: string): Promise<void> {
    await delay(200);
    for (const char of text) {
      const script =
        char === '\n' || char === '\r'
          ? 'tell application "System Events" to key code 36'
          : `tell application "System Events" to keystroke "${escapeAppleScript(char)}"`;
      try {
        await execFileAsync('osascript', ['-e', script], { timeout: 5000 });
      } catch (error) {
        throw new Error(`Failed to type text: ${messageOf(error)}`);
      }
      await delay(this.jitter());
    }
  }

  private jitter(): number {
    const spread = TYPING_JITTER_MS * 0.3;
    return Math.max(
      0,
      Math.round(TYPING_JITTER_MS + (Math.random() * 2 - 1) * spread),
    );
  }

  /**
   * Validates a canonical key name and returns the corresponding nut-js key.
   */
  private validateKey(key: string): Key {
    const lowerKey = key.toLowerCase();
    const nutKey: Key | undefined =
      CanonicalToNutKeyMap[lowerKey] ?? NutKeyMapLowercase[lowerKey];

    if (nutKey === undefined) {
      throw new Error(
        `Invalid key: '${key}'. Key not found in available key mappings.`,
      );
    }

    return nutKey;
  }

  private charToKeyInfo(char: string): KeyInfo | null {
    if (/^[a-z0-9]$/.test(char)) {
      return { keyCode: this.validateKey(char), withShift: false };
    }

    if (/^[A-Z]$/.test(char)) {
      return { keyCode: this.validateKey(char.toLowerCase()), withShift: true };
    }

    if (char === ' ') {
      return { keyCode: Key.Space, withShift: false };
    }

    if (char === '\n' || char === '\r') {
      return { keyCode: Key.Enter, withShift: false };
    }

    const plain = CanonicalToNutKeyMap[char];
    if (plain !== undefined) {
      return { keyCode: plain, withShift: false };
    }

    const shifted = ShiftedCharMap[char];
    if (shifted !== undefined) {
      return { keyCode: shifted, withShift: true };
    }

    return null;
  }
}

function escapeAppleScript(char: string): string {
  if (char === '"' || char === '\\') {
    return `\\${char}`;
  }
  return char;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
