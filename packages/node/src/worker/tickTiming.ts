const MIN_KEY_PUMP_INTERVAL_MS = 1;
const MAX_KEY_PUMP_INTERVAL_MS = 16;
const PUMPS_PER_FRAME = 4;

/**
 * How often the controlling thread moves pending keys into the shared ring.
 * Several pumps per frame so a key is rarely more than a frame late.
 */
export function computeKeyPumpInterval(frameDurationMs: number): number {
  if (!Number.isFinite(frameDurationMs) || frameDurationMs <= 0) return MAX_KEY_PUMP_INTERVAL_MS;
  const perFrame = Math.floor(frameDurationMs / PUMPS_PER_FRAME);
  return Math.min(MAX_KEY_PUMP_INTERVAL_MS, Math.max(MIN_KEY_PUMP_INTERVAL_MS, perFrame));
}
