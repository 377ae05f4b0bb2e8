import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { delay, MouseButton, throwIfAborted } from '@cua/shared';
import { isModifierKey, normalizeKeyName } from './keys';
import { defineTool, failure, formatPoint, success } from './tool.helpers';
import { JsonSchema } from './tool.types';

const logger = new Logger('InputTools');

const CLICK_SETTLE_MS = 50;
const DRAG_STEPS = 10;
const DRAG_STEP_DELAY_MS = 20;
const COMBO_SETTLE_MS = 300;
const TARGET_TEXT_LIMIT = 100;

const coordinateProperties: Record<string, JsonSchema> = {
  x: {
    type: 'number',
    description:
      'X coordinate: screenshot pixel, or normalized 0-1000 across the screen width',
  },
  y: {
    type: 'number',
    description:
      'Y coordinate: screenshot pixel, or normalized 0-1000 across the screen height',
  },
};

const buttonSchema = z.enum(['left', 'right', 'middle']);

export const clickSchema = z.object({
  x: z.number(),
  y: z.number(),
  button: buttonSchema.default('left'),
  double: z.boolean().default(false),
});

export const clickTool = defineTool({
  name: 'click',
  description:
    'Moves the mouse to a point and clicks. Use coordinates from the latest screenshot (pixels) or normalized 0-1000 coordinates.',
  input_schema: {
    type: 'object',
    properties: {
      ...coordinateProperties,
      button: {
        type: 'string',
        enum: ['left', 'right', 'middle'],
        description: 'Mouse button',
        default: 'left',
      },
      double: {
        type: 'boolean',
        description: 'Double-click instead of a single click',
        default: false,
      },
    },
    required: ['x', 'y'],
  },
  schema: clickSchema,
  target: (args) => formatPoint(args.x, args.y),
  async execute(args, context) {
    const point = context.coordinates.resolve(args.x, args.y);
    const { input } = context.backend;

    await input.moveTo(point);
    await delay(CLICK_SETTLE_MS, context.signal);
    await input.click(args.button, args.double ? 2 : 1);

    const verb = args.double ? 'Double-clicked' : 'Clicked';
    return success(`${verb} ${args.button} at ${formatPoint(point.x, point.y)}`, {
      x: point.x,
      y: point.y,
      coordinate_mode: point.mode,
    });
  },
});

export const moveSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export const moveTool = defineTool({
  name: 'move',
  description: 'Moves the mouse pointer without clicking, e.g. to reveal a hover menu.',
  input_schema: {
    type: 'object',
    properties: coordinateProperties,
    required: ['x', 'y'],
  },
  schema: moveSchema,
  target: (args) => formatPoint(args.x, args.y),
  async execute(args, context) {
    const point = context.coordinates.resolve(args.x, args.y);
    await context.backend.input.moveTo(point);
    return success(`Moved mouse to ${formatPoint(point.x, point.y)}`, {
      x: point.x,
      y: point.y,
      coordinate_mode: point.mode,
    });
  },
});

export const dragSchema = z.object({
  x: z.number(),
  y: z.number(),
  end_x: z.number(),
  end_y: z.number(),
  button: buttonSchema.default('left'),
});

export const dragTool = defineTool({
  name: 'drag',
  description:
    'Presses a mouse button at the start point, moves to the end point in small steps and releases.',
  input_schema: {
    type: 'object',
    properties: {
      ...coordinateProperties,
      end_x: { type: 'number', description: 'End X coordinate' },
      end_y: { type: 'number', description: 'End Y coordinate' },
      button: {
        type: 'string',
        enum: ['left', 'right', 'middle'],
        description: 'Mouse button to hold',
        default: 'left',
      },
    },
    required: ['x', 'y', 'end_x', 'end_y'],
  },
  schema: dragSchema,
  target: (args) =>
    `${formatPoint(args.x, args.y)} -> ${formatPoint(args.end_x, args.end_y)}`,
  async execute(args, context) {
    const start = context.coordinates.resolve(args.x, args.y);
    const end = context.coordinates.resolve(args.end_x, args.end_y);
    const { input } = context.backend;
    const button: MouseButton = args.button;

    await input.moveTo(start);
    await input.pressButton(button);
    try {
      for (let step = 1; step <= DRAG_STEPS; step++) {
        throwIfAborted(context.signal);
        const t = step / DRAG_STEPS;
        await input.moveTo({
          x: Math.round(start.x + (end.x - start.x) * t),
          y: Math.round(start.y + (end.y - start.y) * t),
        });
        await delay(DRAG_STEP_DELAY_MS, context.signal);
      }
    } finally {
      await input.releaseButton(button);
    }

    return success(
      `Dragged from ${formatPoint(start.x, start.y)} to ${formatPoint(end.x, end.y)}`,
      { start_x: start.x, start_y: start.y, end_x: end.x, end_y: end.y },
    );
  },
});

export const scrollSchema = z.object({
  x: z.number().optional(),
  y: z.number().optional(),
  delta_x: z.number().int().default(0),
  delta_y: z.number().int().default(0),
});

export const scrollTool = defineTool({
  name: 'scroll',
  description:
    'Scrolls the mouse wheel. Positive delta_y scrolls down, positive delta_x scrolls right. When x and y are given the pointer moves there first.',
  input_schema: {
    type: 'object',
    properties: {
      ...coordinateProperties,
      delta_x: {
        type: 'integer',
        description: 'Horizontal scroll amount in wheel ticks',
        default: 0,
      },
      delta_y: {
        type: 'integer',
        description: 'Vertical scroll amount in wheel ticks',
        default: 0,
      },
    },
  },
  schema: scrollSchema,
  target: (args) =>
    args.x !== undefined && args.y !== undefined
      ? `${formatPoint(args.x, args.y)} dx=${args.delta_x} dy=${args.delta_y}`
      : `dx=${args.delta_x} dy=${args.delta_y}`,
  async execute(args, context) {
    if (args.delta_x === 0 && args.delta_y === 0) {
      return failure(
        'delta_x or delta_y must be non-zero',
        'Pass a positive delta_y to scroll down or a negative one to scroll up',
      );
    }

    const { input } = context.backend;
    if (args.x !== undefined && args.y !== undefined) {
      await input.moveTo(context.coordinates.resolve(args.x, args.y));
    }
    await input.scroll(args.delta_x, args.delta_y);

    return success(`Scrolled dx=${args.delta_x} dy=${args.delta_y}`);
  },
});

export const typeTextSchema = z.object({
  text: z.string(),
});

export const typeTextTool = defineTool({
  name: 'type_text',
  description:
    'Types text into the focused element. Click the field first. Works with password fields.',
  input_schema: {
    type: 'object',
    properties: {
      text: { type: 'string', description: 'Text to type' },
    },
    required: ['text'],
  },
  schema: typeTextSchema,
  target: (args) =>
    args.text.length > TARGET_TEXT_LIMIT
      ? `${args.text.slice(0, TARGET_TEXT_LIMIT)}...`
      : args.text,
  async execute(args, context) {
    if (args.text.length === 0) {
      return failure('text cannot be empty', 'Pass the text to type');
    }

    await context.backend.input.typeText(args.text);
    return success(`Typed ${args.text.length} characters`);
  },
});

export const keyPressSchema = z.object({
  key: z.string(),
  modifiers: z.array(z.string()).default([]),
});

export const keyPressTool = defineTool({
  name: 'key_press',
  description:
    'Presses a key, optionally with modifiers held (cmd, ctrl, alt, shift). Examples: key "enter"; key "space" with modifiers ["cmd"] opens Spotlight on macOS.',
  input_schema: {
    type: 'object',
    properties: {
      key: {
        type: 'string',
        description:
          'Key name: a letter or digit, enter, escape, tab, space, backspace, delete, up, down, left, right, home, end, pageup, pagedown, f1-f12',
      },
      modifiers: {
        type: 'array',
        items: { type: 'string', enum: ['cmd', 'ctrl', 'alt', 'shift'] },
        description: 'Modifier keys to hold while pressing the key',
      },
    },
    required: ['key'],
  },
  schema: keyPressSchema,
  target: (args) =>
    [...args.modifiers.map(normalizeKeyName), normalizeKeyName(args.key)].join('+'),
  async execute(args, context) {
    if (args.key.length === 0) {
      return failure('key cannot be empty', 'Pass a key name such as "enter"');
    }

    const key = normalizeKeyName(args.key);
    const modifiers = args.modifiers.map(normalizeKeyName);
    const unknown = modifiers.filter((modifier) => !isModifierKey(modifier));
    if (unknown.length > 0) {
      return failure(
        `unknown modifier: ${unknown.join(', ')}`,
        'Modifiers must be cmd, ctrl, alt or shift',
      );
    }

    await context.backend.input.keyTap(key, modifiers);
    if (modifiers.length > 0) {
      await delay(COMBO_SETTLE_MS, context.signal);
    }

    const combo = [...modifiers, key].join('+');
    logger.debug(`Pressed ${combo}`);
    return success(`Pressed ${combo}`);
  },
});
