import { createTotals, type OITotals, type OptionSide } from '../../domain/entities/snapshot.entity';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toOpenInterest(value: unknown): number {
  const numeric = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof numeric !== 'number' || !Number.isFinite(numeric) || numeric < 0) {
    return 0;
  }
  return Math.trunc(numeric);
}

function readSideTotal(filtered: Record<string, unknown>, side: OptionSide): number {
  const sideData = filtered[side];
  return isRecord(sideData) ? toOpenInterest(sideData.totOI) : 0;
}

/**
 * Reads `filtered.CE.totOI` / `filtered.PE.totOI`. Anything missing or malformed
 * counts as zero: the origin schema is not guaranteed.
 */
export function extractTotals(payload: unknown): OITotals {
  const filtered: Record<string, unknown> =
    isRecord(payload) && isRecord(payload.filtered) ? payload.filtered : {};
  return createTotals(readSideTotal(filtered, 'CE'), readSideTotal(filtered, 'PE'));
}
