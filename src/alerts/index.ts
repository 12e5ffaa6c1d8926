export { TelegramNotifier } from "./telegram-notifier";
export type { TelegramNotifierOptions } from "./telegram-notifier";
export { formatMessage } from "./message-formatter";
export type { FormatContext } from "./message-formatter";
