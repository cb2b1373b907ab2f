import type { FieldWidth } from '../../shared/types/profile.types';
import { FieldOverflowError } from '../utils/errors';

export interface FieldLayout {
  name: string;
  width: FieldWidth;
  signed: boolean;
}

export function fieldRange(layout: FieldLayout): { min: number; max: number } {
  const bits = layout.width * 8;
  if (layout.signed) {
    return { min: -(2 ** (bits - 1)), max: 2 ** (bits - 1) - 1 };
  }
  return { min: 0, max: 2 ** bits - 1 };
}

/** u-blox type notation, e.g. U2 or I4 */
export function layoutType(layout: FieldLayout): string {
  return `${layout.signed ? 'I' : 'U'}${layout.width}`;
}

/**
 * Encode one value little-endian at the field's fixed width.
 * @throws FieldOverflowError if the value is not an integer inside the field's range
 */
export function encodeValue(layout: FieldLayout, value: number): Buffer {
  const { min, max } = fieldRange(layout);

  if (!Number.isInteger(value) || value < min || value > max) {
    throw new FieldOverflowError(
      `Value ${value} does not fit field "${layout.name}" (${layoutType(layout)}: ${min}..${max})`,
      layout.name,
      value
    );
  }

  const buffer = Buffer.alloc(layout.width);
  if (layout.signed) {
    buffer.writeIntLE(value, 0, layout.width);
  } else {
    buffer.writeUIntLE(value, 0, layout.width);
  }
  return buffer;
}

export function decodeValue(layout: FieldLayout, buffer: Buffer, offset: number): number {
  return layout.signed
    ? buffer.readIntLE(offset, layout.width)
    : buffer.readUIntLE(offset, layout.width);
}
