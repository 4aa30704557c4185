import * as fs from 'fs';
import { createBot } from './bot/bot.js';
import { loadConfig, loadEnvFile, toMegabytes, type Config } from './config.js';
import { InFlightDeliveries } from './delivery/in-flight.js';
import { DeliveryOrchestrator, deliverySettingsFromConfig } from './delivery/orchestrator.js';
import { ensureCookiesFile } from './media/cookies.js';
import { YtDlpFetcher, ytDlpOptionsFromConfig } from './media/fetcher.js';
import { setVerboseLogging } from './utils/debug-log.js';
import { getErrorMessage } from './utils/errors.js';

function readConfig(): Config {
  loadEnvFile();
  try {
    return loadConfig();
  } catch (error) {
    console.error(`❌ ${getErrorMessage(error)}`);
    process.exit(1);
  }
}

async function main() {
  const config = readConfig();
  setVerboseLogging(config.LOG_VERBOSE);

  console.log('🤖 Starting clipcourier...');
  console.log(
    `📦 Upload limit: ${toMegabytes(config.UPLOAD_LIMIT_BYTES)} MB, part size: ${toMegabytes(config.PART_SIZE_BYTES)} MB`
  );

  ensureCookiesFile(config);
  fs.mkdirSync(config.SCRATCH_DIR, { recursive: true });

  const orchestrator = new DeliveryOrchestrator({
    settings: deliverySettingsFromConfig(config),
    fetcher: new YtDlpFetcher(ytDlpOptionsFromConfig(config)),
  });
  const inFlight = new InFlightDeliveries();
  const bot = createBot(config, { config, orchestrator, inFlight });

  // Graceful shutdown
  const shutdown = async () => {
    console.log('\n👋 Shutting down...');
    await bot.stop();
    if (inFlight.size > 0) {
      // Downloads cannot be cancelled; let them finish and clean up
      console.log(`⏳ Waiting for ${inFlight.size} delivery task(s) in progress...`);
      await inFlight.drain();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  // Start the bot
  await bot.start({
    onStart: (botInfo) => {
      console.log(`✅ Bot started as @${botInfo.username}`);
      console.log('📱 Send /start in Telegram to begin');
    },
  });
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
