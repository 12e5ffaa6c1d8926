/**
 * TELEGRAM NOTIFIER
 * =================
 * Delivers monitor events to a Telegram chat through the Bot API.
 *
 * Failures surface as DeliveryError; the poller logs them and moves on,
 * so nothing is retried here.
 */

import { Agent, Dispatcher, Response as UndiciResponse, fetch as undiciFetch } from "undici";
import { MonitorEvent, Notifier } from "../types";
import { API_URLS, DEFAULTS } from "../config";
import { formatMessage } from "./message-formatter";
import { DeliveryError, errorMessage } from "../utils/errors";
import { isRecord } from "../utils/guards";
import { Logger, logger as defaultLogger } from "../utils/logger";

export interface TelegramNotifierOptions {
  /** Telegram bot token (from @BotFather) */
  botToken: string;
  /** Telegram chat ID to send messages to */
  chatId: string;
  /** Monitored address, shown in change messages */
  address: string;
  timeoutMs?: number;
  /** Supply a dispatcher (e.g. undici MockAgent); close() leaves it open */
  dispatcher?: Dispatcher;
  timeProvider?: () => number;
  logger?: Logger;
}

export class TelegramNotifier implements Notifier {
  private botToken: string;
  private chatId: string;
  private address: string;
  private timeoutMs: number;
  private dispatcher: Dispatcher;
  private ownsDispatcher: boolean;
  private timeProvider: () => number;
  private logger: Logger;
  private inFlight = new AbortController();

  constructor(options: TelegramNotifierOptions) {
    this.botToken = options.botToken;
    this.chatId = options.chatId;
    this.address = options.address;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.telegramTimeoutMs;
    this.timeProvider = options.timeProvider ?? Date.now;
    this.logger = options.logger ?? defaultLogger;

    this.ownsDispatcher = !options.dispatcher;
    this.dispatcher = options.dispatcher ?? new Agent({
      keepAliveTimeout: 30_000,
      connections: 2,
    });
  }

  async notify(event: MonitorEvent): Promise<void> {
    const text = formatMessage(event, {
      address: this.address,
      now: new Date(this.timeProvider()),
    });
    await this.send(text);
    this.logger.debug(`[ALERT] Telegram ${event.kind} notification sent`);
  }

  /**
   * Send raw HTML text to the configured chat
   */
  async send(text: string): Promise<void> {
    const url = `${API_URLS.telegram}/bot${this.botToken}/sendMessage`;

    let res: UndiciResponse;
    try {
      res = await undiciFetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: this.chatId,
          text,
          parse_mode: "HTML",
          disable_web_page_preview: true,
        }),
        dispatcher: this.dispatcher,
        signal: AbortSignal.any([AbortSignal.timeout(this.timeoutMs), this.inFlight.signal]),
      });
    } catch (error) {
      const reason = this.inFlight.signal.aborted ? "notifier closed" : errorMessage(error);
      throw new DeliveryError(`Telegram request failed: ${reason}`, { cause: error });
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (error) {
      throw new DeliveryError(`Telegram answered ${res.status} with a body that is not JSON`, { cause: error });
    }

    if (!res.ok || !isRecord(payload) || payload.ok !== true) {
      const description = isRecord(payload) && typeof payload.description === "string"
        ? payload.description
        : res.statusText;
      throw new DeliveryError(`Telegram send failed: ${res.status} ${description}`);
    }
  }

  /**
   * With `force`, an undelivered message is dropped rather than awaited
   */
  async close(force = false): Promise<void> {
    if (force) {
      this.inFlight.abort();
    }
    if (!this.ownsDispatcher) return;
    await (force ? this.dispatcher.destroy() : this.dispatcher.close());
  }
}
