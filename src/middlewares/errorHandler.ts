/**
 * Error Handler Middleware
 * Centralized error handling for bot updates.
 */

import { BotError, GrammyError, HttpError, type Context } from "grammy";

/**
 * Global error handler for the bot.
 * Logs errors that escape any handler. MUST be registered with bot.catch.
 */
export function errorHandler(err: BotError<Context>): void {
  const updateId = err.ctx.update.update_id;
  const error = err.error;

  if (error instanceof GrammyError) {
    console.error(`[Error] update ${updateId} - Telegram API error ${error.error_code}: ${error.description}`);
  } else if (error instanceof HttpError) {
    console.error(`[Error] update ${updateId} - could not reach Telegram:`, error.error);
  } else {
    console.error(`[Error] update ${updateId} - unhandled error:`, error);
  }
}
