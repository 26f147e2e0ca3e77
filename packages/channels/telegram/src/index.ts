export {
  TelegramChannel,
  toChannelMessage,
  splitMessage,
  TELEGRAM_MESSAGE_LIMIT,
  type TelegramChannelOptions,
  type TelegramTextMessage,
} from "./telegram-channel";
