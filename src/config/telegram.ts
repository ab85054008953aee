/**
 * Telegram Configuration
 * Wires access control, commands and error handling onto the bot.
 */

import type { Bot } from "grammy";
import type { DownloadController } from "../controllers/downloadController.js";
import { requireAllowedUser } from "../middlewares/auth.middleware.js";
import { errorHandler } from "../middlewares/errorHandler.js";
import { registerBotCommands } from "../routes/botCommands.js";

export interface ConfigureBotOptions {
  allowedUserIds: ReadonlySet<number>;
  controller: DownloadController;
}

export function configureBot(bot: Bot, { allowedUserIds, controller }: ConfigureBotOptions): Bot {
  /** Access control - MUST be registered before commands. */
  bot.use(requireAllowedUser(allowedUserIds));

  registerBotCommands(bot, controller);

  /** Global error handler */
  bot.catch(errorHandler);

  return bot;
}
