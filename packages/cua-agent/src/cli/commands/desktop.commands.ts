import chalk from 'chalk';
import { writeFile } from 'fs/promises';
import { DesktopBackend, UIElement } from '@cua/shared';
import { encodeScreenshot } from '../../coordinate-system';

/** Clicks at logical screen coordinates. */
export async function clickCommand(
  backend: DesktopBackend,
  x: number,
  y: number,
): Promise<void> {
  await backend.input.moveTo({ x: Math.round(x), y: Math.round(y) });
  await backend.input.click('left', 1);
  console.log(chalk.green(`Clicked at (${Math.round(x)}, ${Math.round(y)})`));
}

export async function typeCommand(
  backend: DesktopBackend,
  text: string,
): Promise<void> {
  await backend.input.typeText(text);
  console.log(chalk.green(`Typed ${text.length} characters`));
}

export async function screenshotCommand(
  backend: DesktopBackend,
  file: string,
  screenIndex = 0,
): Promise<void> {
  const frame = await backend.capture.capture(screenIndex);
  const encoded = await encodeScreenshot(frame, {
    maxDimension: Math.max(frame.width, frame.height),
    quality: 90,
  });
  await writeFile(file, Buffer.from(encoded.base64, 'base64'));
  console.log(
    chalk.green(`Saved ${encoded.width}x${encoded.height} screenshot to ${file}`),
  );
}

export function formatElement(element: UIElement): string {
  const { x, y, width, height } = element.bounds;
  const label = element.name || element.title || element.value;
  const flags = [element.focused && 'focused', !element.enabled && 'disabled']
    .filter((flag): flag is string => typeof flag === 'string')
    .join(', ');
  return `${element.role.padEnd(20)} ${JSON.stringify(label)} @ ${x},${y} ${width}x${height}${flags ? ` (${flags})` : ''}`;
}

export async function elementsCommand(
  backend: DesktopBackend,
  maxResults = 100,
): Promise<void> {
  const elements = await backend.accessibility.findElements({}, maxResults);
  if (elements.length === 0) {
    console.log(chalk.yellow('No elements found in the focused application'));
    return;
  }
  for (const element of elements) {
    console.log(formatElement(element));
  }
}

export async function screenCommand(backend: DesktopBackend): Promise<void> {
  const displays = await backend.capture.displays();
  for (const display of displays) {
    const { x, y, width, height } = display.bounds;
    const primary = display.isPrimary ? chalk.cyan(' (primary)') : '';
    console.log(
      `Display ${display.index}: ${width}x${height} at ${x},${y}, scale ${display.scaleFactor}${primary}`,
    );
  }
}
