/**
 * Pixel — one BGRX8888 color value
 *
 * Memory layout, 4 bytes per pixel:
 *
 *   byte 0  blue
 *   byte 1  green
 *   byte 2  red
 *   byte 3  padding, always 0
 *
 * This matches the 32-bit XRGB framebuffers most window surfaces expose on
 * little-endian hosts, so a Bitmap's bytes can be blitted without swizzling.
 * There is no alpha: the fourth byte carries no meaning and is never non-zero.
 */

export const BYTES_PER_PIXEL = 4;

/** Byte offset of each channel inside a pixel. */
export const BGRX_OFFSETS = {
  b: 0,
  g: 1,
  r: 2,
  x: 3,
} as const;

export type RGBTriple = readonly [r: number, g: number, b: number];

export interface RGBLike {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/** Anything a drawing call accepts as a color. */
export type PixelLike = RGBLike | RGBTriple;

function assertChannel(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new RangeError(`${name} channel must be an integer in [0, 255], got ${value}`);
  }
}

export class Pixel implements RGBLike {
  static readonly ZERO = new Pixel(0, 0, 0);

  readonly r: number;
  readonly g: number;
  readonly b: number;

  constructor(r: number, g: number, b: number) {
    assertChannel('red', r);
    assertChannel('green', g);
    assertChannel('blue', b);
    this.r = r;
    this.g = g;
    this.b = b;
  }

  static from(value: PixelLike): Pixel {
    if (value instanceof Pixel) {
      return value;
    }
    if ('r' in value) {
      return new Pixel(value.r, value.g, value.b);
    }
    const [r, g, b] = value;
    return new Pixel(r, g, b);
  }

  /** Parse `#rrggbb` or `#rgb` (leading `#` optional). */
  static fromHex(hex: string): Pixel {
    const digits = hex.startsWith('#') ? hex.slice(1) : hex;
    if (!/^(?:[0-9a-f]{3}|[0-9a-f]{6})$/i.test(digits)) {
      throw new RangeError(`Invalid hex color: ${JSON.stringify(hex)}`);
    }
    const full =
      digits.length === 3
        ? digits.replace(/./g, (c) => c + c)
        : digits;
    return new Pixel(
      parseInt(full.slice(0, 2), 16),
      parseInt(full.slice(2, 4), 16),
      parseInt(full.slice(4, 6), 16)
    );
  }

  /**
   * Decode the pixel stored at `byteOffset`. The padding byte is ignored.
   * Caller guarantees `byteOffset + 4 <= bytes.length`.
   */
  static readBGRX(bytes: Uint8Array, byteOffset: number): Pixel {
    return new Pixel(
      bytes[byteOffset + BGRX_OFFSETS.r]!,
      bytes[byteOffset + BGRX_OFFSETS.g]!,
      bytes[byteOffset + BGRX_OFFSETS.b]!
    );
  }

  /** Encode into `bytes` at `byteOffset`, zeroing the padding byte. */
  writeBGRX(bytes: Uint8Array, byteOffset: number): void {
    bytes[byteOffset + BGRX_OFFSETS.b] = this.b;
    bytes[byteOffset + BGRX_OFFSETS.g] = this.g;
    bytes[byteOffset + BGRX_OFFSETS.r] = this.r;
    bytes[byteOffset + BGRX_OFFSETS.x] = 0;
  }

  toBGRX(): Uint8Array {
    const out = new Uint8Array(BYTES_PER_PIXEL);
    this.writeBGRX(out, 0);
    return out;
  }

  toRGB(): RGBTriple {
    return [this.r, this.g, this.b];
  }

  /** The `0x00RRGGBB` word a little-endian BGRX framebuffer holds for this pixel. */
  toUint32(): number {
    return ((this.r << 16) | (this.g << 8) | this.b) >>> 0;
  }

  equals(other: PixelLike): boolean {
    const o = Pixel.from(other);
    return o.r === this.r && o.g === this.g && o.b === this.b;
  }

  toString(): string {
    return `Pixel(${this.r}, ${this.g}, ${this.b})`;
  }
}
