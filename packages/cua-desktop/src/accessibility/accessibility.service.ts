import { Injectable, Logger } from '@nestjs/common';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';
import {
  AccessibilityBackend,
  CuaError,
  CuaErrorCode,
  ElementQuery,
  isMacOS,
  matchesElementQuery,
  PermissionError,
  UIElement,
} from '@cua/shared';

const execFileAsync = promisify(execFile);

const MAX_DEPTH = 12;
const MAX_NODES = 2000;

/**
 * JavaScript for Automation walk of the frontmost application's windows.
 * Prints a JSON array of flat element records.
 */
const DUMP_SCRIPT = `
const se = Application('System Events');
const proc = se.processes.whose({ frontmost: true })[0];
const out = [];
const read = (fn, fallback) => { try { const v = fn(); return v === null || v === undefined ? fallback : v; } catch (e) { return fallback; } };
function walk(el, depth) {
  if (out.length >= ${MAX_NODES} || depth > ${MAX_DEPTH}) return;
  const pos = read(() => el.position(), null);
  const size = read(() => el.size(), null);
  if (pos && size) {
    out.push({
      role: String(read(() => el.role(), 'unknown')),
      name: String(read(() => el.name(), '')),
      title: String(read(() => el.title(), '')),
      value: String(read(() => el.value(), '')),
      x: pos[0], y: pos[1], width: size[0], height: size[1],
      enabled: Boolean(read(() => el.enabled(), true)),
      focused: Boolean(read(() => el.focused(), false)),
    });
  }
  const children = read(() => el.uiElements(), []);
  for (let i = 0; i < children.length; i++) walk(children[i], depth + 1);
}
const windows = read(() => proc.windows(), []);
for (let i = 0; i < windows.length; i++) walk(windows[i], 0);
JSON.stringify(out);
`;

const dumpedElementSchema = z.object({
  role: z.string(),
  name: z.string(),
  title: z.string(),
  value: z.string(),
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
  enabled: z.boolean(),
  focused: z.boolean(),
});

const dumpSchema = z.array(dumpedElementSchema);

/**
 * Parses the JSON printed by the dump script. Element ids are positional
 * and only meaningful within one dump.
 */
export function parseAccessibilityDump(raw: string): UIElement[] {
  const parsed = dumpSchema.parse(JSON.parse(raw));
  return parsed.map((entry, index) => ({
    id: `e${index + 1}`,
    role: entry.role,
    name: entry.name,
    title: entry.title,
    value: entry.value === 'missing value' ? '' : entry.value,
    bounds: {
      x: Math.round(entry.x),
      y: Math.round(entry.y),
      width: Math.round(entry.width),
      height: Math.round(entry.height),
    },
    enabled: entry.enabled,
    focused: entry.focused,
  }));
}

@Injectable()
export class AccessibilityService implements AccessibilityBackend {
  private readonly logger = new Logger(AccessibilityService.name);

  async findElements(
    query: ElementQuery,
    maxResults: number,
  ): Promise<UIElement[]> {
    if (!isMacOS()) {
      throw new CuaError(
        CuaErrorCode.NotSupported,
        'accessibility lookup is only available on macOS',
      );
    }

    const elements = await this.dumpFrontmostApplication();
    const matches = elements.filter((element) =>
      matchesElementQuery(element, query),
    );
    this.logger.debug(
      `Accessibility query matched ${matches.length} of ${elements.length} elements`,
    );
    return matches.slice(0, maxResults);
  }

  private async dumpFrontmostApplication(): Promise<UIElement[]> {
    try {
      const { stdout } = await execFileAsync(
        'osascript',
        ['-l', 'JavaScript', '-e', DUMP_SCRIPT],
        { timeout: 15000, maxBuffer: 16 * 1024 * 1024 },
      );
      return parseAccessibilityDump(stdout.trim());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (/assistive access|not allowed|-1719|-25211/i.test(message)) {
        throw new PermissionError('accessibility', { cause: error });
      }
      throw new Error(`Failed to read accessibility tree: ${message}`, {
        cause: error,
      });
    }
  }
}
