import { createHash } from "crypto";
import { Markup } from "telegraf";

export const NOOP = "noop";

// Telegram rejects callback_data over 64 bytes
const MAX_CALLBACK_BYTES = 64;
const HASH_PREFIX = "h:";

function keyHash(key: string) {
  return createHash("sha256").update(key).digest("hex").slice(0, 16);
}

/** The key itself when it fits, otherwise a short hash of it. */
export function callbackDataFor(key: string) {
  const fits = Buffer.byteLength(key, "utf8") <= MAX_CALLBACK_BYTES;
  if (fits && key !== NOOP && !key.startsWith(HASH_PREFIX)) return key;
  return `${HASH_PREFIX}${keyHash(key)}`;
}

/**
 * Back from callback_data to an order key. A hash that matches none of
 * `keys` means the button outlived its order.
 */
export function keyFromCallbackData(data: string, keys: readonly string[]): string | null {
  if (data === NOOP) return null;
  if (data.startsWith(HASH_PREFIX)) {
    const hash = data.slice(HASH_PREFIX.length);
    return keys.find((key) => keyHash(key) === hash) ?? null;
  }
  return data;
}

/** One button per row, keys already sorted. */
export function ordersKeyboard(keys: readonly string[]) {
  if (!keys.length) {
    return Markup.inlineKeyboard([[Markup.button.callback("Пусто", NOOP)]]);
  }
  return Markup.inlineKeyboard(keys.map((key) => [Markup.button.callback(key, callbackDataFor(key))]));
}
