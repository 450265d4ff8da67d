/**
 * Element encoding for persistent entries
 * @module store/dtype
 *
 * Entries are raw little-endian element bytes; these helpers convert
 * between typed arrays and that byte layout and derive row geometry from
 * a header's shape.
 */

import type { StoredArray, StoredArrayHeader, StoredDType } from './interfaces.js';

const BYTES_PER_ELEMENT: Record<StoredDType, number> = {
  float32: 4,
  int32: 4,
};

export function bytesPerElement(dtype: StoredDType): number {
  return BYTES_PER_ELEMENT[dtype];
}

/**
 * Elements per row: product of every dimension after the first
 */
export function rowSizeOf(shape: readonly number[]): number {
  return shape.slice(1).reduce((size, dim) => size * dim, 1);
}

export function rowBytesOf(header: StoredArrayHeader): number {
  return rowSizeOf(header.shape) * bytesPerElement(header.dtype);
}

export function byteLengthOf(header: StoredArrayHeader): number {
  return (header.shape[0] ?? 0) * rowBytesOf(header);
}

export function encode(array: StoredArray): Uint8Array {
  const bytes = new Uint8Array(array.length * 4);
  const view = new DataView(bytes.buffer);
  if (array instanceof Float32Array) {
    for (let i = 0; i < array.length; i++) {
      view.setFloat32(i * 4, array[i], true);
    }
  } else {
    for (let i = 0; i < array.length; i++) {
      view.setInt32(i * 4, array[i], true);
    }
  }
  return bytes;
}

export function decode(bytes: Uint8Array, dtype: StoredDType): StoredArray {
  const length = Math.floor(bytes.byteLength / bytesPerElement(dtype));
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (dtype === 'float32') {
    const out = new Float32Array(length);
    for (let i = 0; i < length; i++) {
      out[i] = view.getFloat32(i * 4, true);
    }
    return out;
  }
  const out = new Int32Array(length);
  for (let i = 0; i < length; i++) {
    out[i] = view.getInt32(i * 4, true);
  }
  return out;
}

export function isAllZero(array: StoredArray): boolean {
  for (let i = 0; i < array.length; i++) {
    if (array[i] !== 0) {
      return false;
    }
  }
  return true;
}

export function sameShape(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((dim, i) => dim === b[i]);
}
