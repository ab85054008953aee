/**
 * Bot Command Routes
 * Maps Telegram commands and messages to the download controller.
 */

import type { Bot, Context } from "grammy";
import type { DownloadController, IncomingMessage } from "../controllers/downloadController.js";

function toIncoming(ctx: Context, userId: number, text: string): IncomingMessage {
  return {
    userId,
    text,
    reply: (reply) => ctx.reply(reply),
  };
}

export function registerBotCommands(bot: Bot, controller: DownloadController): void {
  /** /start - welcome text and command list */
  bot.command("start", async (ctx) => {
    if (!ctx.from) return;
    await controller.start(toIncoming(ctx, ctx.from.id, ctx.message?.text ?? ""));
  });

  /** /audio <url> */
  bot.command("audio", async (ctx) => {
    if (!ctx.from) return;
    await controller.download(toIncoming(ctx, ctx.from.id, ctx.message?.text ?? ""), "audio", ctx.match);
  });

  /** /video <url> */
  bot.command("video", async (ctx) => {
    if (!ctx.from) return;
    await controller.download(toIncoming(ctx, ctx.from.id, ctx.message?.text ?? ""), "video", ctx.match);
  });

  /** /stop - cancel the active download */
  bot.command("stop", async (ctx) => {
    if (!ctx.from) return;
    await controller.stop(toIncoming(ctx, ctx.from.id, ctx.message?.text ?? ""));
  });

  /** Plain text links download audio; unknown commands are ignored. */
  bot.on("message:text", async (ctx) => {
    const text = ctx.message.text.trim();
    if (!ctx.from || text.startsWith("/")) return;
    await controller.text(toIncoming(ctx, ctx.from.id, text));
  });
}
