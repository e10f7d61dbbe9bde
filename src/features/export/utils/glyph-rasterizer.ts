/**
 * Text rasterization.
 *
 * Glyph shaping is pluggable through `GlyphRasterizer`. The built-in
 * `BlockGlyphRasterizer` draws one solid block per visible character on a
 * fixed-advance grid, which keeps text layout and animation visible without
 * a font engine.
 */

export interface GlyphMask {
  width: number;
  height: number;
  /** Row-major coverage, 1 for ink */
  data: Uint8Array;
}

export interface GlyphRasterizer {
  rasterize(text: string, fontSize: number): GlyphMask;
}

const ADVANCE_RATIO = 0.6;
const ASCENT_GAP_RATIO = 0.25;
const LETTER_GAP_RATIO = 0.15;

export class BlockGlyphRasterizer implements GlyphRasterizer {
  rasterize(text: string, fontSize: number): GlyphMask {
    const characters = Array.from(text);
    const advance = Math.max(1, Math.round(fontSize * ADVANCE_RATIO));
    const height = Math.max(1, Math.round(fontSize));
    const width = advance * characters.length;
    const data = new Uint8Array(width * height);

    const letterGap = Math.round(advance * LETTER_GAP_RATIO);
    const inkTop = Math.round(height * ASCENT_GAP_RATIO);

    characters.forEach((character, i) => {
      if (character.trim() === '') return;
      const left = i * advance;
      for (let row = inkTop; row < height; row++) {
        data.fill(1, row * width + left, row * width + left + advance - letterGap);
      }
    });

    return { width, height, data };
  }
}

/**
 * Cache for glyph masks to avoid rasterizing the same run every frame
 */
export class GlyphMaskCache implements GlyphRasterizer {
  private cache = new Map<string, GlyphMask>();

  constructor(
    private readonly rasterizer: GlyphRasterizer,
    private readonly maxSize = 256
  ) {}

  rasterize(text: string, fontSize: number): GlyphMask {
    const key = `${fontSize}|${text}`;

    let mask = this.cache.get(key);
    if (mask === undefined) {
      mask = this.rasterizer.rasterize(text, fontSize);

      // Evict oldest entries if cache is full
      if (this.cache.size >= this.maxSize) {
        const firstKey = this.cache.keys().next().value;
        if (firstKey !== undefined) this.cache.delete(firstKey);
      }
      this.cache.set(key, mask);
    }

    return mask;
  }
}

export const defaultGlyphRasterizer: GlyphRasterizer = new GlyphMaskCache(new BlockGlyphRasterizer());
