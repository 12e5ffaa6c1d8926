/**
 * POLLING MODULE
 * ==============
 * Exports all polling-related classes
 */

export { AccountPoller, sleep } from './account-poller';
export { ChangeDetector } from './change-detector';
export { createSnapshot, sortedPositions } from './snapshot';

export type { PollerEvents, PollerDependencies, Sleeper } from './account-poller';
