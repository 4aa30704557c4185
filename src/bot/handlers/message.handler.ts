import { extractFirstUrl } from '../../utils/url.js';
import { startDelivery, type BotServices, type InboundContext } from './command.handler.js';

export async function handleMessage(ctx: InboundContext, services: BotServices): Promise<void> {
  const text = ctx.message?.text || '';
  const url = extractFirstUrl(text);
  if (!url) return;

  startDelivery(ctx, url, services);
}
