/**
 * MESSAGE FORMATTER
 * =================
 * Renders monitor events as Telegram HTML messages.
 */

import {
  Fill,
  MonitorEvent,
  Position,
  PositionModifiedEvent,
  StartupEvent,
} from "../types";

export interface FormatContext {
  /** Monitored address, shown shortened in every change message */
  address: string;
  /** Time stamped on messages that have no time of their own */
  now: Date;
}

/** Longest holdings list in the startup message */
const MAX_LISTED_POSITIONS = 20;

export function formatMessage(event: MonitorEvent, context: FormatContext): string {
  switch (event.kind) {
    case "position_opened":
      return formatPosition("🔔", "Position OPENED", event.position, context);
    case "position_modified":
      return formatModified(event, context);
    case "position_closed":
      return formatClosed(event.position, context);
    case "new_trade":
      return formatTrade(event.fill, context);
    case "startup":
      return formatStartup(event);
    case "shutdown":
      return [
        "⚠️ <b>Monitoring Stopped</b>",
        "",
        `<b>Reason:</b> ${escapeHtml(event.reason)}`,
        `<b>Time:</b> ${formatTime(event.at)}`,
      ].join("\n");
    case "error":
      return [
        "❌ <b>Monitor Error</b>",
        "",
        `<b>Type:</b> ${event.errorKind}`,
        `<b>Details:</b> <pre>${escapeHtml(event.message)}</pre>`,
        `<b>Consecutive failures:</b> ${event.consecutiveFailures}`,
        `<b>Time:</b> ${formatTime(event.at)}`,
      ].join("\n");
  }
}

function formatPosition(emoji: string, title: string, position: Position, context: FormatContext): string {
  return [
    `${emoji} <b>${title}</b>`,
    "",
    `<b>Asset:</b> ${escapeHtml(position.asset)}`,
    `<b>Side:</b> ${position.side}`,
    `<b>Size:</b> ${position.size}`,
    ...positionDetails(position),
    ...footer(context.address, context.now),
  ].join("\n");
}

function formatModified(event: PositionModifiedEvent, context: FormatContext): string {
  const { previous, current } = event;
  const side = previous.side === current.side ? current.side : `${previous.side} → ${current.side}`;

  return [
    "🔔 <b>Position MODIFIED</b>",
    "",
    `<b>Asset:</b> ${escapeHtml(current.asset)}`,
    `<b>Side:</b> ${side}`,
    `<b>Size:</b> ${previous.size} → ${current.size}`,
    ...positionDetails(current),
    ...footer(context.address, context.now),
  ].join("\n");
}

function formatClosed(position: Position, context: FormatContext): string {
  return [
    "🔵 <b>Position CLOSED</b>",
    "",
    `<b>Asset:</b> ${escapeHtml(position.asset)}`,
    `<b>Side:</b> ${position.side}`,
    `<b>Previous Size:</b> ${position.size}`,
    `<b>Entry Price:</b> $${position.entryPrice}`,
    `<b>Last Unrealized PnL:</b> ${formatSignedUsd(position.unrealizedPnl)}`,
    ...footer(context.address, context.now),
  ].join("\n");
}

function formatTrade(fill: Fill, context: FormatContext): string {
  const emoji = fill.side === "BUY" ? "🟢" : "🔴";
  const lines = [
    `${emoji} <b>NEW TRADE</b>`,
    "",
    `<b>Asset:</b> ${escapeHtml(fill.asset)}`,
    `<b>Side:</b> ${fill.side}`,
    `<b>Price:</b> $${fill.price}`,
    `<b>Size:</b> ${fill.size}`,
    `<b>Fee:</b> $${fill.fee}`,
  ];

  if (fill.direction) {
    lines.push(`<b>Direction:</b> ${escapeHtml(fill.direction)}`);
  }
  if (fill.closedPnl !== undefined && fill.closedPnl !== 0) {
    lines.push(`<b>Closed PnL:</b> ${formatSignedUsd(fill.closedPnl)}`);
  }
  lines.push(`<b>Trade ID:</b> <code>${escapeHtml(fill.id)}</code>`);

  return [...lines, ...footer(context.address, new Date(fill.timestampMillis))].join("\n");
}

function formatStartup(event: StartupEvent): string {
  const lines = [
    "✅ <b>Monitoring Started</b>",
    "",
    "Now monitoring address:",
    `<code>${escapeHtml(event.address)}</code>`,
    "",
  ];

  if (event.positions.length === 0) {
    lines.push("<b>Open positions:</b> none");
  } else {
    lines.push(`<b>Open positions:</b> ${event.positions.length}`);
    for (const pos of event.positions.slice(0, MAX_LISTED_POSITIONS)) {
      lines.push(`• ${pos.side} ${pos.size} ${escapeHtml(pos.asset)} @ $${pos.entryPrice} (${pos.leverage}x)`);
    }
    if (event.positions.length > MAX_LISTED_POSITIONS) {
      lines.push(`... and ${event.positions.length - MAX_LISTED_POSITIONS} more`);
    }
  }

  lines.push(
    `<b>Recent fills:</b> ${event.fillCount}`,
    "",
    "You will receive notifications for:",
    "• New positions opened",
    "• Positions closed",
    "• Position size changes",
    "• New trades executed"
  );

  return lines.join("\n");
}

function positionDetails(position: Position): string[] {
  return [
    `<b>Entry Price:</b> $${position.entryPrice}`,
    `<b>Leverage:</b> ${position.leverage}x`,
    `<b>Position Value:</b> ${formatUsd(position.positionValue)}`,
    `<b>Unrealized PnL:</b> ${formatSignedUsd(position.unrealizedPnl)}`,
  ];
}

function footer(address: string, time: Date): string[] {
  return [
    "",
    `<b>Address:</b> <code>${escapeHtml(shortenAddress(address))}</code>`,
    `<b>Time:</b> ${formatTime(time)}`,
  ];
}

export function shortenAddress(address: string): string {
  if (address.length <= 14) return address;
  return `${address.slice(0, 8)}...${address.slice(-6)}`;
}

/**
 * "2024-03-09 14:05:00 UTC"
 */
export function formatTime(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export function formatUsd(value: number): string {
  const sign = value < 0 ? "-" : "";
  return `${sign}$${Math.abs(value).toFixed(2)}`;
}

export function formatSignedUsd(value: number): string {
  const sign = value > 0 ? "+" : value < 0 ? "-" : "";
  return `${sign}$${Math.abs(value).toFixed(2)}`;
}

export function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
