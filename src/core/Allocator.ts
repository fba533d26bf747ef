/**
 * Allocator — where a Bitmap's storage comes from and goes back to.
 *
 * A Bitmap computes one AllocationLayout at construction and hands that same
 * object to `release` when it is destroyed, so an allocator can check that
 * every buffer comes back with the parameters it went out with.
 */

import { BYTES_PER_PIXEL } from './Pixel.js';
import { RenderError } from './RenderError.js';

export interface AllocationLayout {
  /** Number of pixels. */
  readonly elementCount: number;
  readonly bytesPerElement: number;
  readonly alignment: number;
  /** elementCount × bytesPerElement */
  readonly byteLength: number;
}

export interface PixelAllocator {
  /** Return a buffer of exactly `layout.byteLength` bytes. */
  allocate(layout: AllocationLayout): ArrayBuffer;
  release(buffer: ArrayBuffer, layout: AllocationLayout): void;
}

/**
 * Describe the storage for `elementCount` pixels.
 * Throws a MemoryError when the byte length is not a safe integer.
 */
export function layoutFor(elementCount: number): AllocationLayout {
  const byteLength = elementCount * BYTES_PER_PIXEL;
  if (!Number.isSafeInteger(elementCount) || !Number.isSafeInteger(byteLength) || elementCount < 0) {
    throw RenderError.memory(
      `Cannot describe an allocation of ${elementCount} pixels (${byteLength} bytes)`
    );
  }
  return {
    elementCount,
    bytesPerElement: BYTES_PER_PIXEL,
    alignment: BYTES_PER_PIXEL,
    byteLength,
  };
}

/** Fresh zero-filled ArrayBuffers, reclaimed by the garbage collector. */
export const heapAllocator: PixelAllocator = {
  allocate(layout) {
    return new ArrayBuffer(layout.byteLength);
  },
  release() {
    // Nothing to hand back: the buffer is unreachable once the Bitmap drops it.
  },
};
