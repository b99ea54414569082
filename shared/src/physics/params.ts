import type { BlockLayout } from "../state/types.js";

// Reference mass of the small block. Every count is relative to it.
export const MASS_SMALL = 1.0;

export const DEFAULT_LAYOUT: BlockLayout = {
  positionLarge: 400,
  positionSmall: 200,
  widthLarge: 150,
  widthSmall: 50
};

// One frame of a 60 Hz display loop.
export const DEFAULT_FRAME_DT = 1 / 60;

/**
 * Side length a renderer should use for the large block. Drawn to scale a
 * million-kilogram block would cover the screen, so the size grows with
 * log10 of the mass and is clamped to [80, 250].
 */
export function displaySizeForMass(massLarge: number): number {
  const scale = massLarge > 1 ? Math.log10(massLarge) * 20 : 20;
  return Math.max(80, Math.min(250, 50 + scale));
}
