/**
 * Download Controller
 * Thin handlers for bot commands. Pipeline runs are started in the
 * background so the update loop keeps serving other users.
 */

import type { MediaKind } from "../config/delivery.js";
import { extractSupportedUrl, parseSupportedUrl } from "../middlewares/validation.js";
import type { DeliveryPipeline, PipelineOutcome } from "../services/business/deliveryPipeline.js";
import type { SessionStore, UserId } from "../services/business/sessionStore.js";
import { BotMessages } from "../utils/errorMessages.js";

export interface IncomingMessage {
  userId: UserId;
  text: string;
  reply: (text: string) => Promise<unknown>;
}

export class DownloadController {
  private readonly inFlight = new Set<Promise<PipelineOutcome | void>>();

  constructor(
    private readonly sessions: SessionStore,
    private readonly pipeline: DeliveryPipeline
  ) {}

  async start(message: IncomingMessage): Promise<void> {
    await message.reply(BotMessages.welcome);
  }

  /** /audio and /video. `args` is the text after the command. */
  async download(message: IncomingMessage, kind: MediaKind, args: string): Promise<void> {
    const candidate = args.trim().split(/\s+/)[0] ?? "";
    if (!candidate) {
      await message.reply(BotMessages.usage(kind));
      return;
    }

    const url = parseSupportedUrl(candidate);
    if (!url) {
      await message.reply(BotMessages.invalidLink);
      return;
    }

    this.dispatch(message.userId, url, kind);
  }

  async stop(message: IncomingMessage): Promise<void> {
    const found = this.sessions.cancel(message.userId);
    await message.reply(found ? BotMessages.stopped : BotMessages.nothingToStop);
  }

  /** Plain text: a supported link starts an audio download. */
  async text(message: IncomingMessage): Promise<void> {
    const url = extractSupportedUrl(message.text);
    if (!url) {
      await message.reply(BotMessages.invalidLink);
      return;
    }

    this.dispatch(message.userId, url, "audio");
  }

  /** Resolves once every pipeline run started so far has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  private dispatch(userId: UserId, url: string, kind: MediaKind): void {
    const run = this.pipeline
      .run({ userId, url, kind })
      .then((outcome) => {
        console.log(`[bot] user ${userId} ${kind} request finished: ${outcome.kind}`);
        return outcome;
      })
      .catch((error: unknown) => {
        console.error(`[bot] ✗ pipeline crashed for user ${userId}:`, error);
      })
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }
}
