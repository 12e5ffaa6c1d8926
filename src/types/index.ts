/**
 * TYPE DEFINITIONS FOR THE ACCOUNT MONITOR
 * ========================================
 */

// ============================================
// POSITION & FILL TYPES
// ============================================

export type PositionSide = "LONG" | "SHORT";

export type FillSide = "BUY" | "SELL";

/**
 * An open perpetual position held by the monitored address
 */
export interface Position {
  /** Asset symbol, e.g. "BTC" */
  asset: string;

  side: PositionSide;

  /** Absolute size in asset units (direction lives in `side`) */
  size: number;

  entryPrice: number;

  leverage: number;

  /** Notional value in USD at mark price */
  positionValue: number;

  unrealizedPnl: number;
}

/**
 * A single executed trade
 */
export interface Fill {
  /** Exchange trade id, or a key derived from the trade fields */
  id: string;
  asset: string;
  side: FillSide;
  price: number;
  size: number;
  fee: number;
  timestampMillis: number;

  /** "Open Long", "Close Short", ... when the exchange reports it */
  direction?: string;
  closedPnl?: number;
  hash?: string;
}

/**
 * Point-in-time capture of an address's positions and recent fills
 */
export interface Snapshot {
  positions: ReadonlyMap<string, Position>;

  /** Most recent first, bounded by the fetch window */
  fills: readonly Fill[];

  capturedAt: Date;
}

// ============================================
// EVENT TYPES
// ============================================

export interface PositionOpenedEvent {
  kind: "position_opened";
  position: Position;
}

export interface PositionClosedEvent {
  kind: "position_closed";
  /** Last known state before the position disappeared */
  position: Position;
}

export interface PositionModifiedEvent {
  kind: "position_modified";
  previous: Position;
  current: Position;
}

export interface NewTradeEvent {
  kind: "new_trade";
  fill: Fill;
}

/**
 * Something that changed between two snapshots
 */
export type ChangeEvent =
  | PositionOpenedEvent
  | PositionClosedEvent
  | PositionModifiedEvent
  | NewTradeEvent;

export interface StartupEvent {
  kind: "startup";
  address: string;
  /** Holdings at cold start, ordered by asset */
  positions: Position[];
  fillCount: number;
  at: Date;
}

export interface ShutdownEvent {
  kind: "shutdown";
  address: string;
  reason: string;
  at: Date;
}

export type ErrorKind = "network" | "api" | "unknown";

export interface ErrorEvent {
  kind: "error";
  address: string;
  errorKind: ErrorKind;
  message: string;
  consecutiveFailures: number;
  at: Date;
}

/**
 * Everything the notifier can be asked to deliver
 */
export type MonitorEvent = ChangeEvent | StartupEvent | ShutdownEvent | ErrorEvent;

// ============================================
// COLLABORATOR INTERFACES
// ============================================

/**
 * Source of account state. Implementations throw NetworkError or ApiError.
 */
export interface SnapshotFetcher {
  fetchPositions(address: string): Promise<Position[]>;

  /** Most recent first, at most `limit` entries */
  fetchFills(address: string, limit: number): Promise<Fill[]>;

  /**
   * Release pooled connections. With `force`, requests still in flight
   * are aborted instead of awaited.
   */
  close?(force?: boolean): Promise<void>;
}

/**
 * Delivery channel for monitor events. Implementations throw DeliveryError.
 */
export interface Notifier {
  notify(event: MonitorEvent): Promise<void>;

  close?(force?: boolean): Promise<void>;
}

// ============================================
// POLLER TYPES
// ============================================

export type PollerState =
  | { phase: "cold-start" }
  | { phase: "steady"; previous: Snapshot }
  | { phase: "shutdown" };

export type CycleStatus = "initialized" | "completed" | "failed" | "skipped";

export interface CycleResult {
  status: CycleStatus;
  events: ChangeEvent[];
  error?: Error;
}

export interface PollerConfig {
  address: string;
  intervalMs: number;
  fillsLimit: number;
  maxConsecutiveErrors: number;
  shutdownGraceMs: number;
}
