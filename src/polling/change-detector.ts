/**
 * CHANGE DETECTOR
 * ===============
 * Compares two account snapshots and finds what changed.
 *
 * - Positions are matched by asset: opened, closed or resized/flipped.
 * - Fills are matched by id: anything in the current window that the
 *   previous window did not contain is a new trade.
 *
 * Stateless: the same pair of snapshots always yields the same events.
 * The fill window is bounded by the fetcher, so a burst of trades larger
 * than the window between two polls is only partially visible here.
 */

import { ChangeEvent, Fill, Position, Snapshot } from '../types';

export class ChangeDetector {
  /**
   * Size differences below this are treated as unchanged
   * (absorbs floating point rounding in the API's decimal strings)
   */
  private sizeEpsilon: number;

  constructor(sizeEpsilon: number = 1e-9) {
    this.sizeEpsilon = sizeEpsilon;
  }

  /**
   * Compare previous and current snapshots, find all changes
   *
   * @returns Position events ordered by asset, then new trades oldest first
   *
   * @example
   * const events = detector.detectChanges(previous, current);
   * for (const event of events) {
   *   console.log(ChangeDetector.formatChange(event));
   * }
   */
  detectChanges(previous: Snapshot, current: Snapshot): ChangeEvent[] {
    return [
      ...this.detectPositionChanges(previous.positions, current.positions),
      ...this.detectNewFills(previous.fills, current.fills),
    ];
  }

  private detectPositionChanges(
    previous: ReadonlyMap<string, Position>,
    current: ReadonlyMap<string, Position>
  ): ChangeEvent[] {
    // API order is not stable between calls, so walk the keys sorted
    const assets = [...new Set([...previous.keys(), ...current.keys()])].sort(compareAssets);
    const changes: ChangeEvent[] = [];

    for (const asset of assets) {
      const prevPos = previous.get(asset);
      const currPos = current.get(asset);

      if (!prevPos && currPos) {
        changes.push({ kind: 'position_opened', position: currPos });
      } else if (prevPos && !currPos) {
        changes.push({ kind: 'position_closed', position: prevPos });
      } else if (prevPos && currPos && this.isModified(prevPos, currPos)) {
        changes.push({ kind: 'position_modified', previous: prevPos, current: currPos });
      }
    }

    return changes;
  }

  private isModified(prevPos: Position, currPos: Position): boolean {
    if (prevPos.side !== currPos.side) return true;
    return Math.abs(currPos.size - prevPos.size) >= this.sizeEpsilon;
  }

  private detectNewFills(previous: readonly Fill[], current: readonly Fill[]): ChangeEvent[] {
    const seen = new Set(previous.map(f => f.id));
    const fresh: Fill[] = [];

    for (const fill of current) {
      if (seen.has(fill.id)) continue;
      seen.add(fill.id);
      fresh.push(fill);
    }

    // Snapshot order is newest first; notifications read oldest first
    return fresh.reverse().map(fill => ({ kind: 'new_trade' as const, fill }));
  }

  /**
   * Format a change for logging
   */
  static formatChange(change: ChangeEvent): string {
    switch (change.kind) {
      case 'position_opened':
        return `🟢 OPENED ${change.position.side} ${change.position.size} ${change.position.asset} @ ${change.position.entryPrice}`;
      case 'position_closed':
        return `🔵 CLOSED ${change.position.side} ${change.position.size} ${change.position.asset}`;
      case 'position_modified': {
        const { previous, current } = change;
        const sides = previous.side === current.side ? current.side : `${previous.side} → ${current.side}`;
        return `🟡 MODIFIED ${sides} ${current.asset} | ${previous.size} → ${current.size}`;
      }
      case 'new_trade': {
        const emoji = change.fill.side === 'BUY' ? '🟢' : '🔴';
        return `${emoji} TRADE ${change.fill.side} ${change.fill.size} ${change.fill.asset} @ ${change.fill.price} (id ${change.fill.id})`;
      }
    }
  }
}

function compareAssets(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
