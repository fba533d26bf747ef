/**
 * bgrx-bitmap — Public API
 *
 * An off-screen BGRX8888 pixel buffer with bounds-checked access, clipped
 * point and rectangle drawing, and a raw byte view for blitting.
 */

// Core
export {
  Bitmap,
  withBitmap,
  type BitmapOptions,
  type PixelSlot,
  type RectFillPolicy,
} from './core/Bitmap.js';

export {
  Pixel,
  BYTES_PER_PIXEL,
  BGRX_OFFSETS,
  type PixelLike,
  type RGBLike,
  type RGBTriple,
} from './core/Pixel.js';

export {
  vec2,
  rect2,
  toVector2,
  toRect2,
  type Vector2,
  type Extent2,
  type Rect2,
  type PointLike,
  type SizeLike,
} from './core/Geometry.js';

// Errors
export { RenderError, isRenderError, type RenderErrorKind } from './core/RenderError.js';

// Allocation
export {
  heapAllocator,
  layoutFor,
  type AllocationLayout,
  type PixelAllocator,
} from './core/Allocator.js';
