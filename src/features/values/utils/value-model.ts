/**
 * Value model helpers: construction, equality, color parsing and the
 * mapping from syntactic parse-tree values to typed values.
 */

import type { RawValue, RawValueKind } from '@/types/parse-tree';
import type { ColorValue, NumberValue, PointValue, TextValue, Value, ValueType } from '@/types/value';

export const numberValue = (value: number): NumberValue => ({ type: 'number', value });

export const pointValue = (x: number, y: number): PointValue => ({ type: 'point', x, y });

export const textValue = (value: string): TextValue => ({ type: 'text', value });

export function colorValue(r: number, g: number, b: number): ColorValue {
  return { type: 'color', r: clampChannel(r), g: clampChannel(g), b: clampChannel(b) };
}

/**
 * Round to the nearest integer and clamp into [0, 255]
 */
export function clampChannel(channel: number): number {
  if (Number.isNaN(channel)) return 0;
  return Math.max(0, Math.min(255, Math.round(channel)));
}

const HEX_COLOR_PATTERN = /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i;

/**
 * Parse `#RRGGBB` or `#RGB` (case-insensitive).
 * Returns null for anything else.
 */
export function parseHexColor(hex: string): ColorValue | null {
  if (!HEX_COLOR_PATTERN.test(hex)) return null;

  const digits = hex.slice(1);
  const full =
    digits.length === 3
      ? digits
          .split('')
          .map((d) => d + d)
          .join('')
      : digits;

  return {
    type: 'color',
    r: parseInt(full.slice(0, 2), 16),
    g: parseInt(full.slice(2, 4), 16),
    b: parseInt(full.slice(4, 6), 16),
  };
}

/**
 * Format a color as lowercase `#rrggbb`
 */
export function formatHexColor(color: ColorValue): string {
  const hex = (channel: number) => clampChannel(channel).toString(16).padStart(2, '0');
  return `#${hex(color.r)}${hex(color.g)}${hex(color.b)}`;
}

/**
 * Structural equality. Values with different tags are never equal.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.type) {
    case 'number':
      return b.type === 'number' && a.value === b.value;
    case 'point':
      return b.type === 'point' && a.x === b.x && a.y === b.y;
    case 'color':
      return b.type === 'color' && a.r === b.r && a.g === b.g && a.b === b.b;
    case 'text':
      return b.type === 'text' && a.value === b.value;
  }
}

/**
 * Short display form used in diagnostics, e.g. `(75, 360)` or `#ff0000`
 */
export function describeValue(value: Value): string {
  switch (value.type) {
    case 'number':
      return String(value.value);
    case 'point':
      return `(${value.x}, ${value.y})`;
    case 'color':
      return formatHexColor(value);
    case 'text':
      return JSON.stringify(value.value);
  }
}

/** Value tag each syntactic kind produces */
export const RAW_KIND_TO_TYPE: Record<RawValueKind, ValueType> = {
  number: 'number',
  tuple: 'point',
  hex_color: 'color',
  string: 'text',
};

export type RawValueConversion =
  | { ok: true; value: Value }
  | { ok: false; reason: 'invalid_color'; hex: string };

/**
 * Convert a syntactic value to its typed form.
 * The only failure is a malformed hex color.
 */
export function fromRawValue(raw: RawValue): RawValueConversion {
  switch (raw.kind) {
    case 'number':
      return { ok: true, value: numberValue(raw.value) };
    case 'tuple':
      return { ok: true, value: pointValue(raw.x, raw.y) };
    case 'string':
      return { ok: true, value: textValue(raw.value) };
    case 'hex_color': {
      const color = parseHexColor(raw.hex);
      return color ? { ok: true, value: color } : { ok: false, reason: 'invalid_color', hex: raw.hex };
    }
  }
}

/**
 * Typed accessor helpers. Return undefined when the property is absent or
 * carries a different tag.
 */
export function getNumber(properties: ReadonlyMap<string, Value>, name: string): number | undefined {
  const value = properties.get(name);
  return value?.type === 'number' ? value.value : undefined;
}

export function getPoint(properties: ReadonlyMap<string, Value>, name: string): PointValue | undefined {
  const value = properties.get(name);
  return value?.type === 'point' ? value : undefined;
}

export function getColor(properties: ReadonlyMap<string, Value>, name: string): ColorValue | undefined {
  const value = properties.get(name);
  return value?.type === 'color' ? value : undefined;
}

export function getText(properties: ReadonlyMap<string, Value>, name: string): string | undefined {
  const value = properties.get(name);
  return value?.type === 'text' ? value.value : undefined;
}
