import type { SendMessageOptions } from "node-telegram-bot-api";
import { sleep } from "../utils/timeouts.js";

// Type only the methods we actually use, so tests can pass a fake.
export type TelegramBotLike = {
  sendMessage: (chatId: number, text: string, options?: SendMessageOptions) => Promise<unknown>;
};

function chunkString(str: string, maxLen: number): string[] {
  if (str.length <= maxLen) return [str];
  const chunks: string[] = [];
  let i = 0;

  while (i < str.length) {
    let end = Math.min(i + maxLen, str.length);
    const slice = str.slice(i, end);
    const lastNewline = slice.lastIndexOf("\n");
    if (lastNewline > Math.floor(maxLen * 0.6)) end = i + lastNewline + 1;
    chunks.push(str.slice(i, end));
    i = end;
  }
  return chunks;
}

function field(obj: unknown, key: string): unknown {
  return typeof obj === "object" && obj !== null && key in obj ? Reflect.get(obj, key) : undefined;
}

/** Seconds Telegram asked us to wait (HTTP 429), if the error carries one. */
export function retryAfterSeconds(err: unknown): number | null {
  const params = field(field(field(err, "response"), "body"), "parameters");
  const retryAfter = field(params, "retry_after") ?? field(params, "retry_after_seconds");
  return typeof retryAfter === "number" && retryAfter > 0 ? retryAfter : null;
}

export async function sendTelegramMessageSafe(
  bot: TelegramBotLike,
  chatId: number,
  text: string,
  wait: (ms: number) => Promise<void> = sleep
): Promise<void> {
  const MAX = 3800;
  const chunks = chunkString(text, MAX);

  for (const part of chunks) {
    try {
      await bot.sendMessage(chatId, part, { disable_web_page_preview: true });
    } catch (err: unknown) {
      const retryAfter = retryAfterSeconds(err);
      if (retryAfter === null) throw err;
      await wait(retryAfter * 1000);
      await bot.sendMessage(chatId, part, { disable_web_page_preview: true });
    }
    if (chunks.length > 1) await wait(80);
  }
}
