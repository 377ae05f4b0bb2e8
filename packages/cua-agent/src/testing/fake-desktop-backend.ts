import {
  AccessibilityBackend,
  CaptureBackend,
  CapturedFrame,
  CuaError,
  CuaErrorCode,
  DesktopBackend,
  Display,
  ElementQuery,
  InputBackend,
  matchesElementQuery,
  MouseButton,
  Point,
  Rect,
  UIElement,
} from '@cua/shared';

export type InputEvent =
  | { kind: 'moveTo'; x: number; y: number }
  | { kind: 'click'; button: MouseButton; clicks: 1 | 2 }
  | { kind: 'pressButton'; button: MouseButton }
  | { kind: 'releaseButton'; button: MouseButton }
  | { kind: 'scroll'; deltaX: number; deltaY: number }
  | { kind: 'keyTap'; key: string; modifiers: string[] }
  | { kind: 'typeText'; text: string };

export const DEFAULT_FAKE_DISPLAY: Display = {
  index: 0,
  bounds: { x: 0, y: 0, width: 1512, height: 982 },
  scaleFactor: 2,
  isPrimary: true,
};

/** Records every input call instead of touching the OS. */
export class FakeInputBackend implements InputBackend {
  readonly events: InputEvent[] = [];
  /** When set, `click` rejects with this error. */
  clickError: Error | null = null;
  private position: Point = { x: 0, y: 0 };

  async moveTo(point: Point): Promise<void> {
    this.position = { x: point.x, y: point.y };
    this.events.push({ kind: 'moveTo', x: point.x, y: point.y });
  }

  async click(button: MouseButton, clicks: 1 | 2): Promise<void> {
    if (this.clickError) {
      throw this.clickError;
    }
    this.events.push({ kind: 'click', button, clicks });
  }

  async pressButton(button: MouseButton): Promise<void> {
    this.events.push({ kind: 'pressButton', button });
  }

  async releaseButton(button: MouseButton): Promise<void> {
    this.events.push({ kind: 'releaseButton', button });
  }

  async scroll(deltaX: number, deltaY: number): Promise<void> {
    this.events.push({ kind: 'scroll', deltaX, deltaY });
  }

  async keyTap(key: string, modifiers: string[]): Promise<void> {
    this.events.push({ kind: 'keyTap', key, modifiers: [...modifiers] });
  }

  async typeText(text: string): Promise<void> {
    this.events.push({ kind: 'typeText', text });
  }

  async cursorPosition(): Promise<Point> {
    return { ...this.position };
  }

  eventsOf<K extends InputEvent['kind']>(
    kind: K,
  ): Extract<InputEvent, { kind: K }>[] {
    return this.events.filter(
      (event): event is Extract<InputEvent, { kind: K }> => event.kind === kind,
    );
  }
}

/** Produces solid grey frames at the display's physical resolution. */
export class FakeCaptureBackend implements CaptureBackend {
  captureCount = 0;

  constructor(readonly displayList: Display[] = [DEFAULT_FAKE_DISPLAY]) {}

  async displays(): Promise<Display[]> {
    return this.displayList.map((display) => ({
      ...display,
      bounds: { ...display.bounds },
    }));
  }

  async capture(displayIndex: number, region?: Rect): Promise<CapturedFrame> {
    const display = this.displayList.find(
      (candidate) => candidate.index === displayIndex,
    );
    if (!display) {
      throw new CuaError(
        CuaErrorCode.InvalidDisplay,
        `invalid display index ${displayIndex} (${this.displayList.length} available)`,
      );
    }
    if (region && (region.width <= 0 || region.height <= 0)) {
      throw new CuaError(CuaErrorCode.InvalidRect);
    }

    const logical = region ?? display.bounds;
    const width = Math.round(logical.width * display.scaleFactor);
    const height = Math.round(logical.height * display.scaleFactor);
    this.captureCount++;

    return {
      data: Buffer.alloc(width * height * 3, 0x80),
      width,
      height,
      channels: 3,
      display: { ...display, bounds: { ...display.bounds } },
      region,
    };
  }
}

export class FakeAccessibilityBackend implements AccessibilityBackend {
  readonly queries: ElementQuery[] = [];

  constructor(
    public elements: UIElement[] = [],
    public supported = true,
  ) {}

  async findElements(
    query: ElementQuery,
    maxResults: number,
  ): Promise<UIElement[]> {
    this.queries.push({ ...query });
    if (!this.supported) {
      throw new CuaError(
        CuaErrorCode.NotSupported,
        'accessibility lookup is only available on macOS',
      );
    }
    return this.elements
      .filter((element) => matchesElementQuery(element, query))
      .slice(0, maxResults);
  }
}

export interface FakeDesktopOptions {
  displays?: Display[];
  elements?: UIElement[];
  accessibilitySupported?: boolean;
}

/** In-memory {@link DesktopBackend} for tests and dry runs. */
export class FakeDesktopBackend implements DesktopBackend {
  readonly input: FakeInputBackend;
  readonly capture: FakeCaptureBackend;
  readonly accessibility: FakeAccessibilityBackend;

  constructor(options: FakeDesktopOptions = {}) {
    this.input = new FakeInputBackend();
    this.capture = new FakeCaptureBackend(options.displays);
    this.accessibility = new FakeAccessibilityBackend(
      options.elements,
      options.accessibilitySupported ?? true,
    );
  }
}
