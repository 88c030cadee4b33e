import { Injectable } from '../../shared/decorators';
import { EMPTY_SNAPSHOT, type OITotals, type Snapshot } from '../../domain/entities/snapshot.entity';
import type { ISnapshotCache } from '../../domain/interfaces/services.interface';

/**
 * Single-slot store for the latest totals. Writes swap in a new frozen object;
 * readers hold whichever reference they got and never see a half-written one.
 */
@Injectable()
export class SnapshotCache implements ISnapshotCache {
  private current: Snapshot = EMPTY_SNAPSHOT;

  get(): Snapshot {
    return this.current;
  }

  set(totals: OITotals): Snapshot {
    const next: Snapshot = Object.freeze({
      totals,
      // wall clock may step back; the published timestamp must not
      timestamp: Math.max(Date.now(), this.current.timestamp),
    });
    this.current = next;
    return next;
  }

  hasData(): boolean {
    return this.current.timestamp !== 0;
  }
}
