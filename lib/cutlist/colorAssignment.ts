export interface ColorTagOptions {
  /** HSL saturation in percent. Default: 70 */
  saturation?: number;
  /** HSL lightness in percent. Default: 80 */
  lightness?: number;
}

/**
 * 32-bit string hash (multiply by 31, wrap to int32).
 */
export function hashPartName(name: string): number {
  let hash = 0;
  for (let i = 0; i < name.length; i++) {
    hash = (Math.imul(hash, 31) + name.charCodeAt(i)) | 0;
  }
  return hash;
}

/**
 * Hue (0–359) for a piece name.
 * e.g. "a" -> 97, "ab" -> 225
 */
export function getPartHue(name: string): number {
  const mod = hashPartName(name) % 360;
  return mod < 0 ? mod + 360 : mod;
}

/**
 * Light pastel fill for drawing a piece on a sheet diagram.
 */
export function getPartColorTag(name: string, options: ColorTagOptions = {}): string {
  const saturation = options.saturation ?? 70;
  const lightness = options.lightness ?? 80;
  return `hsl(${getPartHue(name)}, ${saturation}%, ${lightness}%)`;
}
