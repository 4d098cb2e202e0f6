/**
 * Safe access and numeric helpers.
 * Use these instead of non-null assertions and ad-hoc parsing.
 */

/**
 * Get an element from an array at a specific index, throwing if out of bounds.
 */
export function getAt<T>(array: readonly T[], index: number, description = "array"): T {
  if (index < 0 || index >= array.length) {
    throw new Error(
      `Index ${index} out of bounds for ${description} with length ${array.length}`
    );
  }
  const value = array[index];
  if (value === undefined) {
    throw new Error(`Unexpected undefined at index ${index} in ${description}`);
  }
  return value;
}

/**
 * Lenient integer parse: leading whitespace and sign are accepted, trailing
 * junk is ignored, anything unparsable is 0. Result wraps to 32 bits.
 */
export function parseIntLoose(text: string): number {
  const value = Number.parseInt(text, 10);
  return Number.isNaN(value) ? 0 : value | 0;
}

export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/**
 * Uniform random 15-bit value, the granularity challenge tokens are built from.
 */
export function random15(random: () => number): number {
  return Math.floor(random() * 0x8000) & 0x7fff;
}
