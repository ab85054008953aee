/**
 * Access Middleware
 * Restricts the bot to an optional allow-list of Telegram user ids.
 */

import type { Context, NextFunction } from "grammy";
import { BotMessages } from "../utils/errorMessages.js";

/**
 * An empty allow-list admits everyone.
 */
export function isUserAllowed(allowedUserIds: ReadonlySet<number>, userId: number | undefined): boolean {
  if (allowedUserIds.size === 0) return true;
  return userId !== undefined && allowedUserIds.has(userId);
}

/**
 * Middleware that drops updates from users outside the allow-list.
 */
export function requireAllowedUser(allowedUserIds: ReadonlySet<number>) {
  return async (ctx: Context, next: NextFunction): Promise<void> => {
    const userId = ctx.from?.id;
    if (isUserAllowed(allowedUserIds, userId)) {
      await next();
      return;
    }

    console.warn(`[bot] Rejected update from user ${userId ?? "unknown"} (not in allow-list)`);
    if (ctx.chat) {
      await ctx.reply(BotMessages.notAllowed);
    }
  };
}
