/**
 * Contracts between the agent core and a native desktop backend.
 *
 * All coordinates handed to an {@link InputBackend} are logical (the space
 * the OS uses for pointer events). Capture frames are in physical pixels.
 */

export type MouseButton = "left" | "right" | "middle";

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Display {
  index: number;
  /** Origin and size in logical units. */
  bounds: Rect;
  /** Physical pixels per logical unit, e.g. 2 on Retina panels. */
  scaleFactor: number;
  isPrimary: boolean;
}

/**
 * Raw pixels of one capture. `width`/`height` are physical pixels; `region`
 * is the captured rectangle in logical units when a sub-region was taken.
 */
export interface CapturedFrame {
  data: Buffer;
  width: number;
  height: number;
  channels: 3 | 4;
  display: Display;
  region?: Rect;
}

export interface InputBackend {
  moveTo(point: Point): Promise<void>;
  click(button: MouseButton, clicks: 1 | 2): Promise<void>;
  pressButton(button: MouseButton): Promise<void>;
  releaseButton(button: MouseButton): Promise<void>;
  scroll(deltaX: number, deltaY: number): Promise<void>;
  /**
   * Holds `modifiers` in order, taps `key`, releases modifiers in reverse.
   * Key names are canonical (see `normalizeKeyName`).
   */
  keyTap(key: string, modifiers: string[]): Promise<void>;
  typeText(text: string): Promise<void>;
  cursorPosition(): Promise<Point>;
}

export interface CaptureBackend {
  displays(): Promise<Display[]>;
  capture(displayIndex: number, region?: Rect): Promise<CapturedFrame>;
}

export interface UIElement {
  id: string;
  role: string;
  name: string;
  title: string;
  value: string;
  bounds: Rect;
  enabled: boolean;
  focused: boolean;
}

/** Selectors are combined with AND. */
export interface ElementQuery {
  role?: string;
  name?: string;
  nameContains?: string;
  title?: string;
}

export interface AccessibilityBackend {
  findElements(query: ElementQuery, maxResults: number): Promise<UIElement[]>;
}

export interface DesktopBackend {
  input: InputBackend;
  capture: CaptureBackend;
  accessibility: AccessibilityBackend;
}
