export type OptionSide = 'CE' | 'PE';

export interface SideTotals {
  readonly totalOI: number;
}

/** Externally visible shape served by `GET /`. */
export type OITotals = Readonly<Record<OptionSide, SideTotals>>;

export interface Snapshot {
  readonly totals: OITotals;
  /** Epoch ms of the last successful update; 0 until the first one. */
  readonly timestamp: number;
}

/** Parsed origin JSON for one cycle. Shape is not guaranteed, so it stays opaque. */
export type RawMarketPayload = unknown;

export function createTotals(ce: number, pe: number): OITotals {
  return Object.freeze({
    CE: Object.freeze({ totalOI: ce }),
    PE: Object.freeze({ totalOI: pe }),
  });
}

export const EMPTY_SNAPSHOT: Snapshot = Object.freeze({
  totals: createTotals(0, 0),
  timestamp: 0,
});
