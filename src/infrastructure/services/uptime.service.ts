import { Injectable } from '../../shared/decorators';

const DURATION_UNITS: ReadonlyArray<readonly [label: string, ms: number]> = [
  ['d', 86_400_000],
  ['h', 3_600_000],
  ['m', 60_000],
  ['s', 1_000],
];

/** Up to three units, starting at the largest non-zero one: `1d 1h 1m`, `2m 5s`. */
export function formatDuration(ms: number): string {
  let rest = Math.max(0, Math.floor(ms));
  const amounts = DURATION_UNITS.map(([label, size]) => {
    const amount = Math.floor(rest / size);
    rest -= amount * size;
    return `${amount}${label}`;
  });

  const first = amounts.findIndex((part) => !part.startsWith('0'));
  return first === -1 ? '0s' : amounts.slice(first, first + 3).join(' ');
}

@Injectable()
export class UptimeService {
  private readonly startedAt = Date.now();

  public getUptimeMs(): number {
    return Date.now() - this.startedAt;
  }
}
