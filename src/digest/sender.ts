// pattern: Imperative Shell
import type { Logger } from "pino";
import { errorMessage } from "../errors";

/**
 * Discriminated union result type for a single message delivery.
 */
export type SendResult =
  | { readonly success: true }
  | { readonly success: false; readonly error: string };

/**
 * Delivers one message unit. Never throws; failures come back in the result.
 */
export type SendMessageFn = (content: string, logger: Logger) => Promise<SendResult>;

export type DiscordSenderOptions = {
  readonly timeoutMs: number;
  readonly maxContentLength: number;
};

const MAX_ERROR_BODY_LENGTH = 500;

/**
 * Creates a sender bound to a Discord webhook URL.
 *
 * Mentions are disabled so paper titles cannot ping anyone. Content over the
 * length limit is refused without a request; empty content is a no-op.
 */
export function createDiscordSender(
  webhookUrl: string,
  options: DiscordSenderOptions,
): SendMessageFn {
  return async function sendMessage(
    content: string,
    logger: Logger,
  ): Promise<SendResult> {
    if (!content) {
      return { success: true };
    }
    if (content.length > options.maxContentLength) {
      const error = `content is too long: ${content.length} > ${options.maxContentLength}`;
      logger.error({ length: content.length }, "discord message refused");
      return { success: false, error };
    }

    try {
      const response = await fetch(webhookUrl, {
        method: "POST",
        signal: AbortSignal.timeout(options.timeoutMs),
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          content,
          allowed_mentions: { parse: [] },
        }),
      });

      if (response.status !== 200 && response.status !== 204) {
        const body = await response.text();
        const error = `discord webhook failed with status=${response.status}, body=${body.slice(0, MAX_ERROR_BODY_LENGTH)}`;
        logger.error({ status: response.status }, "discord message send failed");
        return { success: false, error };
      }

      logger.debug({ length: content.length }, "discord message sent");
      return { success: true };
    } catch (err) {
      const message = errorMessage(err);
      logger.error({ error: message }, "discord message send failed");
      return { success: false, error: message };
    }
  };
}
