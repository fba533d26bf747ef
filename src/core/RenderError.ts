/**
 * RenderError — failures a Bitmap reports to its caller.
 *
 *   DrawOOB      a write resolved outside [0, width × height). Recoverable.
 *   MemoryError  storage could not be allocated, or could not be resolved
 *                for an index that passed the bounds check.
 */

import type { Extent2, Vector2 } from './Geometry.js';

export type RenderErrorKind = 'DrawOOB' | 'MemoryError';

export class RenderError extends Error {
  readonly kind: RenderErrorKind;

  constructor(kind: RenderErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RenderError';
    this.kind = kind;
  }

  static drawOutOfBounds(point: Vector2, size: Extent2): RenderError {
    return new RenderError(
      'DrawOOB',
      `Point (${point.x}, ${point.y}) out of bounds for ${size.width}×${size.height} bitmap`
    );
  }

  static memory(message: string, cause?: unknown): RenderError {
    return new RenderError('MemoryError', message, cause === undefined ? undefined : { cause });
  }
}

export function isRenderError(value: unknown, kind?: RenderErrorKind): value is RenderError {
  return value instanceof RenderError && (kind === undefined || value.kind === kind);
}
