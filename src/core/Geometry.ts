/**
 * Geometry — the point and size collaborators a Bitmap is addressed with.
 *
 * Both are plain integer records. Callers coming from a renderer usually
 * hold `[x, y]` / `[width, height]` pairs, so every entry point accepts
 * those too and converts at the boundary.
 */

export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

export interface Extent2 {
  readonly width: number;
  readonly height: number;
}

export interface Rect2 extends Extent2 {
  /** width × height */
  area(): number;
}

export type PointLike = Vector2 | readonly [x: number, y: number];
export type SizeLike = Extent2 | readonly [width: number, height: number];

export function vec2(x: number, y: number): Vector2 {
  return { x, y };
}

/** Build a Rect2. Width and height must be non-negative integers. */
export function rect2(width: number, height: number): Rect2 {
  if (!Number.isInteger(width) || width < 0) {
    throw new RangeError(`width must be a non-negative integer, got ${width}`);
  }
  if (!Number.isInteger(height) || height < 0) {
    throw new RangeError(`height must be a non-negative integer, got ${height}`);
  }
  return {
    width,
    height,
    area: () => width * height,
  };
}

export function toVector2(point: PointLike): Vector2 {
  if ('x' in point) {
    return point;
  }
  const [x, y] = point;
  return { x, y };
}

export function toRect2(size: SizeLike): Rect2 {
  if ('width' in size) {
    return rect2(size.width, size.height);
  }
  const [width, height] = size;
  return rect2(width, height);
}
