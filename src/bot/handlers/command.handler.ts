import type { Config } from '../../config.js';
import type { DeliveryOrchestrator } from '../../delivery/orchestrator.js';
import type { InFlightDeliveries } from '../../delivery/in-flight.js';
import { TelegramReplySink, type TelegramTransport } from '../../telegram/reply-sink.js';
import { parseCommandUrl } from '../../utils/url.js';

export interface BotServices {
  config: Pick<Config, 'YTDLP_MAX_HEIGHT'>;
  orchestrator: Pick<DeliveryOrchestrator, 'deliver'>;
  inFlight: Pick<InFlightDeliveries, 'run'>;
}

/** The part of grammY's `Context` the handlers read. */
export interface InboundContext {
  chat?: { id: number };
  message?: { message_id: number; text?: string };
  api: TelegramTransport;
  reply(text: string): Promise<unknown>;
}

export function buildHelpText(maxHeight: number): string {
  return (
    'Send me a YouTube URL or use /dl <URL>\n' +
    `I try to download a low-res copy (<=${maxHeight}p) and send it here.\n` +
    'If content requires login/age-check, set YTDLP_COOKIES_CONTENT env (cookies.txt content).'
  );
}

/**
 * Hand a URL to the orchestrator without awaiting it, so the update loop
 * keeps serving other chats while the download runs.
 */
export function startDelivery(ctx: InboundContext, url: string, services: BotServices): void {
  const chatId = ctx.chat?.id;
  if (chatId === undefined) return;

  const sink = new TelegramReplySink(ctx.api, chatId, ctx.message?.message_id);
  console.log(`[bot] Delivery requested in chat ${chatId}: ${url}`);
  services.inFlight.run(url, () => services.orchestrator.deliver({ url, sink }));
}

export async function handleStart(ctx: InboundContext, services: BotServices): Promise<void> {
  await ctx.reply(buildHelpText(services.config.YTDLP_MAX_HEIGHT));
}

export async function handleDl(ctx: InboundContext, services: BotServices): Promise<void> {
  const text = ctx.message?.text || '';
  // Drop the `/dl` (or `/dl@bot`) token; the URL may follow a newline or tab
  const args = text.trim().split(/\s+/).slice(1).join(' ');
  const url = parseCommandUrl(args);

  if (!url) {
    await ctx.reply('Usage: /dl <URL>');
    return;
  }

  startDelivery(ctx, url, services);
}
