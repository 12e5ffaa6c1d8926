/**
 * SNAPSHOT
 * ========
 * Builds the immutable point-in-time view the poller keeps between cycles.
 * Entries are frozen, so a stored snapshot cannot drift after the fact.
 */

import { Fill, Position, Snapshot } from '../types';

export function createSnapshot(
  positions: readonly Position[],
  fills: readonly Fill[],
  capturedAt: Date = new Date()
): Snapshot {
  const byAsset = new Map<string, Position>();
  for (const position of positions) {
    byAsset.set(position.asset, Object.freeze({ ...position }));
  }

  return Object.freeze({
    positions: byAsset,
    fills: Object.freeze(fills.map(f => Object.freeze({ ...f }))),
    capturedAt,
  });
}

/**
 * Current holdings ordered by asset symbol
 */
export function sortedPositions(snapshot: Snapshot): Position[] {
  return [...snapshot.positions.values()].sort((a, b) => (a.asset < b.asset ? -1 : a.asset > b.asset ? 1 : 0));
}
