// pattern: functional-core
import { get as getEmoji } from "node-emoji";

/**
 * Maps a named glyph (an emoji short name such as `point_right`) to the literal
 * string to print. Returns undefined when the name is unknown.
 */
export type GlyphResolver = (name: string) => string | undefined;

export const FALLBACK_GLYPH = "-";

export const POINTER_GLYPH = "point_right";
export const CLOCK_GLYPH = "watch";

/**
 * Resolves a glyph through the optional resolver, falling back to a plain dash.
 * Every renderer goes through here so the fallback stays identical across
 * collections.
 */
export function resolveGlyph(
  resolver: GlyphResolver | undefined,
  name: string,
): string {
  const glyph = resolver?.(name);
  return glyph && glyph.length > 0 ? glyph : FALLBACK_GLYPH;
}

/**
 * Creates a resolver backed by node-emoji's short-name table.
 */
export function createEmojiResolver(): GlyphResolver {
  return (name) => getEmoji(name);
}
