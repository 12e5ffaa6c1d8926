/**
 * HYPERLIQUID API CLIENT
 * ======================
 *
 * Read-only access to the public info endpoint (POST /info):
 *   - clearinghouseState → open perpetual positions
 *   - userFills          → recent executed trades (newest first)
 *
 * Position size comes back signed (`szi`): positive is long, negative short.
 * Fill side is "B" (bid, a buy) or "A" (ask, a sell).
 */

import { Agent, Dispatcher, Response as UndiciResponse, fetch as undiciFetch } from "undici";
import { Fill, FillSide, Position, SnapshotFetcher } from "../types";
import { API_CONFIG, API_URLS, DEFAULTS } from "../config";
import { ApiError, NetworkError, errorMessage, isTransientError } from "../utils/errors";
import { isRecord, toNumber } from "../utils/guards";
import { Logger, logger as defaultLogger } from "../utils/logger";
import { withRetry } from "../utils/retry";

type InfoRequest =
  | { type: "clearinghouseState"; user: string }
  | { type: "userFills"; user: string };

export interface HyperliquidAPIOptions {
  /** Defaults to mainnet */
  baseUrl?: string;
  timeoutMs?: number;
  /** Extra attempts for transient failures within one request */
  maxRetries?: number;
  retryDelayMs?: number;
  /** Supply a dispatcher (e.g. undici MockAgent); close() leaves it open */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export class HyperliquidAPI implements SnapshotFetcher {
  private baseUrl: string;
  private timeoutMs: number;
  private maxRetries: number;
  private retryDelayMs: number;
  private dispatcher: Dispatcher;
  private ownsDispatcher: boolean;
  private logger: Logger;
  /** Aborted by close(true) to cut requests still in flight */
  private inFlight = new AbortController();

  constructor(options: HyperliquidAPIOptions = {}) {
    this.baseUrl = (options.baseUrl ?? API_URLS.mainnet).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.requestTimeoutMs;
    this.maxRetries = options.maxRetries ?? DEFAULTS.maxRetries;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.logger = options.logger ?? defaultLogger;

    // Keep-alive pool: the same origin is hit twice per cycle
    this.ownsDispatcher = !options.dispatcher;
    this.dispatcher = options.dispatcher ?? new Agent({
      keepAliveTimeout: API_CONFIG.keepAliveTimeout,
      keepAliveMaxTimeout: API_CONFIG.keepAliveMaxTimeout,
      connections: API_CONFIG.connections,
    });
  }

  // ===================================
  // SNAPSHOT FETCHER
  // ===================================

  /**
   * Open positions for an address. Zero-size entries are dropped.
   */
  async fetchPositions(address: string): Promise<Position[]> {
    const data = await this.info({ type: "clearinghouseState", user: address });
    return this.transformPositions(data);
  }

  /**
   * Most recent fills for an address, newest first, at most `limit`.
   * The endpoint has no paging of its own, so the window is cut here.
   */
  async fetchFills(address: string, limit: number): Promise<Fill[]> {
    const data = await this.info({ type: "userFills", user: address });
    return this.transformFills(data).slice(0, limit);
  }

  async close(force = false): Promise<void> {
    if (force) {
      this.inFlight.abort();
    }
    if (!this.ownsDispatcher) return;
    // close() waits for pending requests; destroy() drops their sockets
    await (force ? this.dispatcher.destroy() : this.dispatcher.close());
  }

  // ===================================
  // TRANSPORT
  // ===================================

  private async info(request: InfoRequest): Promise<unknown> {
    return withRetry(() => this.post(request), {
      maxRetries: this.maxRetries,
      initialDelayMs: this.retryDelayMs,
      retryIf: (error) => !this.inFlight.signal.aborted && isTransientError(error),
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(
          `[API] ${request.type} attempt ${attempt}/${this.maxRetries} failed (${errorMessage(error)}), retrying in ${delayMs}ms`
        );
      },
    });
  }

  private async post(request: InfoRequest): Promise<unknown> {
    let response: UndiciResponse;
    try {
      response = await undiciFetch(`${this.baseUrl}/info`, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify(request),
        dispatcher: this.dispatcher,
        signal: AbortSignal.any([AbortSignal.timeout(this.timeoutMs), this.inFlight.signal]),
      });
    } catch (error) {
      const reason = this.inFlight.signal.aborted ? "client closed" : describeFetchError(error);
      throw new NetworkError(`${request.type} request failed: ${reason}`, { cause: error });
    }

    if (!response.ok) {
      if (response.status === 429) {
        throw new ApiError("RATE_LIMITED: Too many requests", 429);
      }
      throw new ApiError(`API_ERROR: ${response.status} ${response.statusText}`, response.status);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new ApiError(`${request.type} returned a body that is not JSON`, undefined, { cause: error });
    }
  }

  // ===================================
  // PAYLOAD PARSING
  // ===================================

  // A malformed entry fails the whole request: a snapshot missing one
  // position would read as that position having been closed.

  private transformPositions(data: unknown): Position[] {
    if (!isRecord(data) || !Array.isArray(data.assetPositions)) {
      throw new ApiError("Unexpected clearinghouseState payload: missing assetPositions");
    }

    return data.assetPositions
      .map((item, index) => this.transformPosition(item, index))
      .filter((p): p is Position => p !== null);
  }

  private transformPosition(item: unknown, index: number): Position | null {
    const raw = isRecord(item) && isRecord(item.position) ? item.position : null;
    const asset = raw && typeof raw.coin === "string" && raw.coin !== "" ? raw.coin : null;
    const signedSize = raw ? toNumber(raw.szi) : null;

    if (!raw || asset === null || signedSize === null) {
      throw new ApiError(`Malformed position entry at index ${index}`);
    }

    if (signedSize === 0) {
      return null;
    }

    const leverage = isRecord(raw.leverage) ? toNumber(raw.leverage.value) : toNumber(raw.leverage);

    return {
      asset,
      side: signedSize > 0 ? "LONG" : "SHORT",
      size: Math.abs(signedSize),
      entryPrice: toNumber(raw.entryPx) ?? 0,
      leverage: Math.round(leverage ?? 1),
      positionValue: toNumber(raw.positionValue) ?? 0,
      unrealizedPnl: toNumber(raw.unrealizedPnl) ?? 0,
    };
  }

  private transformFills(data: unknown): Fill[] {
    if (!Array.isArray(data)) {
      throw new ApiError("Unexpected userFills payload: expected an array");
    }

    // Stable sort keeps the exchange order for fills sharing a timestamp
    return data
      .map((item, index) => this.transformFill(item, index))
      .sort((a, b) => b.timestampMillis - a.timestampMillis);
  }

  private transformFill(item: unknown, index: number): Fill {
    if (!isRecord(item)) {
      throw new ApiError(`Malformed fill entry at index ${index}`);
    }

    const asset = typeof item.coin === "string" && item.coin !== "" ? item.coin : null;
    const side = parseFillSide(item.side);
    const price = toNumber(item.px);
    const size = toNumber(item.sz);
    const timestampMillis = toNumber(item.time);

    if (asset === null || side === null || price === null || size === null || timestampMillis === null) {
      throw new ApiError(`Malformed fill entry at index ${index}`);
    }

    const tid = typeof item.tid === "number" || typeof item.tid === "string" ? String(item.tid) : "";

    const fill: Fill = {
      id: tid !== "" ? tid : deriveFillId({ asset, side, price, size, timestampMillis }),
      asset,
      side,
      price,
      size,
      fee: toNumber(item.fee) ?? 0,
      timestampMillis,
    };

    if (typeof item.dir === "string") fill.direction = item.dir;
    const closedPnl = toNumber(item.closedPnl);
    if (closedPnl !== null) fill.closedPnl = closedPnl;
    if (typeof item.hash === "string") fill.hash = item.hash;

    return fill;
  }
}

/**
 * Identifier for fills the exchange returned without a trade id
 */
export function deriveFillId(fill: Pick<Fill, "asset" | "side" | "price" | "size" | "timestampMillis">): string {
  return `${fill.asset}:${fill.side}:${fill.price}:${fill.size}:${fill.timestampMillis}`;
}

function parseFillSide(value: unknown): FillSide | null {
  if (typeof value !== "string") return null;
  switch (value.toUpperCase()) {
    case "B":
    case "BUY":
      return "BUY";
    case "A":
    case "SELL":
      return "SELL";
    default:
      return null;
  }
}

function describeFetchError(error: unknown): string {
  if (error instanceof Error) {
    if (error.name === "TimeoutError") return "timed out";
    if (error.cause instanceof Error) return `${error.message} (${error.cause.message})`;
    return error.message;
  }
  return String(error);
}
