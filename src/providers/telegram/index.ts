import { Api, GrammyError, HttpError } from "grammy";
import { describeError } from "../../orchestrator/errors.js";
import type { Notifier } from "../../orchestrator/types.js";

export type TelegramSender = {
  sendMessage(chatId: string, text: string): Promise<unknown>;
};

export type TelegramNotifierOptions = {
  bot_token: string;
  chat_id: string;
  api?: TelegramSender;
};

function describeSendError(error: unknown): Record<string, unknown> {
  if (error instanceof GrammyError) {
    return {
      kind: "api",
      error_code: error.error_code,
      error: error.description
    };
  }
  if (error instanceof HttpError) {
    return { kind: "network", error: describeError(error.error) };
  }
  return { kind: "unknown", error: describeError(error) };
}

/**
 * Best-effort delivery to the configured chat. A failed send is logged and
 * reported as `false`; it never rejects, so reporting a failure can't fail
 * the loop a second time.
 */
export function createTelegramNotifier(options: TelegramNotifierOptions): Notifier {
  const api = options.api ?? new Api(options.bot_token);
  const chatId = options.chat_id;

  return {
    async sendMessage(text: string): Promise<boolean> {
      try {
        await api.sendMessage(chatId, text);
        console.debug({ message: "telegram_message_sent", chat_id: chatId });
        return true;
      } catch (error) {
        console.error({
          message: "telegram_message_failed",
          chat_id: chatId,
          ...describeSendError(error)
        });
        return false;
      }
    }
  };
}
