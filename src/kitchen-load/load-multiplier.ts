/** Every full band of this many active orders adds one step. */
export const LOAD_SCALING_THRESHOLD = 5;
/** Per-band scaling factor: each band adds 20 %. */
export const LOAD_SCALING_STEP = 1.2;
export const MAX_LOAD_MULTIPLIER = 3.0;
export const HIGH_LOAD_MULTIPLIER = 2.0;

// Steps are counted in hundredths so 1.0 + 4 * 0.2 comes out as exactly 1.8.
const STEP_HUNDREDTHS = Math.round((LOAD_SCALING_STEP - 1) * 100);
const MAX_HUNDREDTHS = Math.round(MAX_LOAD_MULTIPLIER * 100);

/**
 * Scaling factor for a kitchen with `activeCount` active orders:
 * `min(1.0 + floor(activeCount / 5) * 0.2, 3.0)`.
 *
 * 0–4 active orders give 1.0, 5–9 give 1.2, 10–14 give 1.4 and anything from
 * 50 upwards is capped at 3.0.
 */
export function loadMultiplier(activeCount: number): number {
  const count = Number.isFinite(activeCount) ? Math.max(0, activeCount) : 0;
  const bands = Math.floor(count / LOAD_SCALING_THRESHOLD);
  const hundredths = Math.min(100 + bands * STEP_HUNDREDTHS, MAX_HUNDREDTHS);
  return hundredths / 100;
}

export function isHighLoad(multiplier: number): boolean {
  return multiplier > HIGH_LOAD_MULTIPLIER;
}

export function roundMultiplier(multiplier: number): number {
  return Math.round(multiplier * 100) / 100;
}
