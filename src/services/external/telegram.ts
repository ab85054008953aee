/**
 * Telegram Transport
 * Sends text and media files to users through the grammY Api.
 */

import { InputFile, type Api } from "grammy";
import type { UserId } from "../business/sessionStore.js";
import type { ChatTransport } from "../../types/delivery.js";

export class TelegramTransport implements ChatTransport {
  constructor(private readonly api: Api) {}

  async sendText(userId: UserId, text: string): Promise<void> {
    await this.api.sendMessage(userId, text);
  }

  async sendAudio(userId: UserId, filePath: string, caption: string): Promise<void> {
    await this.api.sendAudio(userId, new InputFile(filePath), { caption });
  }

  async sendVideo(userId: UserId, filePath: string, caption: string): Promise<void> {
    await this.api.sendVideo(userId, new InputFile(filePath), { caption, supports_streaming: true });
  }
}
