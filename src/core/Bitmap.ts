/**
 * Bitmap — owned, fixed-size BGRX8888 pixel buffer
 *
 * Stores width × height pixels in one contiguous, zero-initialized block.
 * Row-major layout, 4 bytes per pixel (see Pixel.ts), no row padding:
 * pixel (x, y) lives at byte (y × width + x) × 4.
 *
 * The element count is fixed at construction. Drawing only ever overwrites
 * existing slots, and the block is handed back to its allocator exactly once.
 */

import {
  heapAllocator,
  layoutFor,
  type AllocationLayout,
  type PixelAllocator,
} from './Allocator.js';
import { toRect2, toVector2, type PointLike, type Rect2, type SizeLike } from './Geometry.js';
import { BYTES_PER_PIXEL, Pixel, type PixelLike } from './Pixel.js';
import { RenderError, isRenderError } from './RenderError.js';

/**
 * How `drawRect` reads a rectangle's extent.
 *
 * - `exclusive`: x ∈ [0, width), y ∈ [0, height), exactly `area()` points.
 * - `inclusive`: x ∈ [0, width], y ∈ [0, height], one extra row and column.
 */
export type RectFillPolicy = 'exclusive' | 'inclusive';

export interface BitmapOptions {
  /** Storage source — default heapAllocator */
  allocator?: PixelAllocator;
  /** Rectangle extent policy — default 'exclusive' */
  rectFill?: RectFillPolicy;
}

/** A live handle onto one pixel's four bytes. */
export interface PixelSlot {
  readonly index: number;
  readonly byteOffset: number;
  get(): Pixel;
  set(pixel: PixelLike): void;
}

interface Storage {
  readonly buffer: ArrayBuffer;
  readonly bytes: Uint8Array;
}

export class Bitmap {
  readonly size: Rect2;
  readonly layout: AllocationLayout;
  readonly rectFill: RectFillPolicy;

  private readonly allocator: PixelAllocator;
  private storage: Storage | null;

  private constructor(
    size: Rect2,
    layout: AllocationLayout,
    allocator: PixelAllocator,
    rectFill: RectFillPolicy,
    buffer: ArrayBuffer
  ) {
    this.size = size;
    this.layout = layout;
    this.allocator = allocator;
    this.rectFill = rectFill;
    this.storage = { buffer, bytes: new Uint8Array(buffer, 0, layout.byteLength) };
  }

  /**
   * Allocate a zero-filled bitmap of `size.area()` pixels.
   * Throws a MemoryError when the allocation cannot be described or the
   * allocator fails, leaving the caller to retry smaller or give up.
   */
  static create(size: SizeLike, options: BitmapOptions = {}): Bitmap {
    const rect = toRect2(size);
    const allocator = options.allocator ?? heapAllocator;
    const rectFill = options.rectFill ?? 'exclusive';
    const layout = layoutFor(rect.area());

    let buffer: ArrayBuffer;
    try {
      buffer = allocator.allocate(layout);
    } catch (err) {
      throw RenderError.memory(
        `Failed to allocate ${layout.byteLength} bytes for ${rect.width}×${rect.height} bitmap`,
        err
      );
    }

    if (buffer.byteLength !== layout.byteLength) {
      allocator.release(buffer, layout);
      throw RenderError.memory(
        `Allocator returned ${buffer.byteLength} bytes, expected ${layout.byteLength}`
      );
    }

    const bitmap = new Bitmap(rect, layout, allocator, rectFill, buffer);
    // Allocators may recycle buffers; every slot must start as Pixel.ZERO.
    bitmap.liveBytes().fill(0);
    return bitmap;
  }

  get width(): number {
    return this.size.width;
  }

  get height(): number {
    return this.size.height;
  }

  /** Size of the pixel data in bytes (width × height × 4). */
  get byteLength(): number {
    return this.layout.byteLength;
  }

  get isDestroyed(): boolean {
    return this.storage === null;
  }

  /**
   * Linear index of `point`, or -1 when it is not a pixel of this bitmap.
   * Each coordinate is checked separately, so (width, y) never wraps into
   * the next row and (0, height) never resolves to one-past-the-end.
   */
  indexOf(point: PointLike): number {
    const { x, y } = toVector2(point);
    if (
      !Number.isInteger(x) ||
      !Number.isInteger(y) ||
      x < 0 ||
      x >= this.width ||
      y < 0 ||
      y >= this.height
    ) {
      return -1;
    }
    return y * this.width + x;
  }

  /** Read the pixel at `point`; undefined when out of range or released. */
  pixelAt(point: PointLike): Pixel | undefined {
    const index = this.indexOf(point);
    if (index < 0 || this.storage === null) {
      return undefined;
    }
    return Pixel.readBGRX(this.storage.bytes, index * BYTES_PER_PIXEL);
  }

  /**
   * Writable handle onto the pixel at `point`.
   * Throws DrawOOB outside [0, width × height), MemoryError once released.
   */
  pixelAtMut(point: PointLike): PixelSlot {
    const p = toVector2(point);
    const index = this.indexOf(p);
    if (index < 0) {
      throw RenderError.drawOutOfBounds(p, this.size);
    }

    const byteOffset = index * BYTES_PER_PIXEL;
    this.resolve(byteOffset);

    return {
      index,
      byteOffset,
      get: () => Pixel.readBGRX(this.resolve(byteOffset), byteOffset),
      set: (pixel) => {
        Pixel.from(pixel).writeBGRX(this.resolve(byteOffset), byteOffset);
      },
    };
  }

  /** Write `pixel` at `point`. Returns false (and does nothing) when clipped. */
  drawPoint(point: PointLike, pixel: PixelLike): boolean {
    const value = Pixel.from(pixel);
    try {
      this.pixelAtMut(point).set(value);
      return true;
    } catch (err) {
      if (isRenderError(err, 'DrawOOB')) {
        return false;
      }
      throw err;
    }
  }

  /**
   * Fill the box `rect` placed at `offset` with one pixel, clipping at the
   * bitmap edges. Returns how many of the box's points were clipped.
   * The box's extent follows `rectFill`.
   */
  drawRect(offset: PointLike, rect: SizeLike, pixel: PixelLike): number {
    const origin = toVector2(offset);
    const box = toRect2(rect);
    const value = Pixel.from(pixel);

    const extra = this.rectFill === 'inclusive' ? 1 : 0;
    const spanX = box.width + extra;
    const spanY = box.height + extra;
    const total = spanX * spanY;

    if (!Number.isInteger(origin.x) || !Number.isInteger(origin.y)) {
      return total;
    }

    const x0 = Math.max(origin.x, 0);
    const x1 = Math.min(origin.x + spanX, this.width);
    const y0 = Math.max(origin.y, 0);
    const y1 = Math.min(origin.y + spanY, this.height);
    if (x0 >= x1 || y0 >= y1) {
      return total;
    }

    const bytes = this.liveBytes();
    for (let y = y0; y < y1; y++) {
      const row = y * this.width;
      for (let x = x0; x < x1; x++) {
        value.writeBGRX(bytes, (row + x) * BYTES_PER_PIXEL);
      }
    }
    return total - (x1 - x0) * (y1 - y0);
  }

  /** Overwrite every pixel (default: Pixel.ZERO). */
  clear(pixel: PixelLike = Pixel.ZERO): void {
    const value = Pixel.from(pixel);
    const bytes = this.liveBytes();
    const len = bytes.length;
    if (len === 0) {
      return;
    }
    value.writeBGRX(bytes, 0);
    // Double the filled prefix each pass
    for (let filled = BYTES_PER_PIXEL; filled < len; filled *= 2) {
      bytes.copyWithin(filled, 0, Math.min(filled, len - filled));
    }
  }

  /**
   * UNSAFE interop view over the backing storage: width × height × 4 bytes,
   * row-major BGRX, no row padding. For blitting or encoding elsewhere.
   *
   * The view aliases the bitmap's memory. Do not write through it and do not
   * keep it past `destroy()` or `take()`.
   */
  unsafeBytes(): Uint8Array {
    return this.liveBytes();
  }

  /**
   * Move ownership of the storage into a new Bitmap. This instance becomes
   * inert: it reads as released and its `destroy()` does nothing.
   */
  take(): Bitmap {
    const storage = this.liveStorage();
    this.storage = null;
    return new Bitmap(this.size, this.layout, this.allocator, this.rectFill, storage.buffer);
  }

  /** Hand the storage back to the allocator. Later calls are no-ops. */
  destroy(): void {
    const storage = this.storage;
    if (storage === null) {
      return;
    }
    this.storage = null;
    this.allocator.release(storage.buffer, this.layout);
  }

  private liveStorage(): Storage {
    if (this.storage === null) {
      throw RenderError.memory(`${this.width}×${this.height} bitmap storage has been released`);
    }
    return this.storage;
  }

  private liveBytes(): Uint8Array {
    return this.liveStorage().bytes;
  }

  private resolve(byteOffset: number): Uint8Array {
    const bytes = this.liveBytes();
    if (byteOffset < 0 || byteOffset + BYTES_PER_PIXEL > bytes.length) {
      throw RenderError.memory(`No storage at byte offset ${byteOffset}`);
    }
    return bytes;
  }
}

/**
 * Create a bitmap, run `fn` with it, and destroy it however `fn` exits.
 * `fn` must finish its work synchronously; a bitmap it `take()`s out
 * survives the scope.
 */
export function withBitmap<T>(
  size: SizeLike,
  fn: (bitmap: Bitmap) => T,
  options?: BitmapOptions
): T {
  const bitmap = Bitmap.create(size, options);
  try {
    return fn(bitmap);
  } finally {
    bitmap.destroy();
  }
}
