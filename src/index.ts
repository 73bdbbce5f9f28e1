import { createBot } from './bot/bot.js';
import { ConfigError, isTestEnvironment, loadConfig, loadEnvFile, type Config } from './config.js';
import { createLlmProvider } from './llm/providers.js';
import { createUnwireClient } from './news/unwire.js';
import { sanitizeError } from './utils/sanitize.js';

function readConfig(): Config {
  loadEnvFile();
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const config = readConfig();

  console.log(`🤖 Starting ${config.BOT_NAME}...`);
  console.log(`🌐 Environment: ${config.ENVIRONMENT}${isTestEnvironment(config) ? ' (test)' : ''}`);
  console.log(
    config.ALLOWED_USER_IDS.length > 0
      ? `📋 Allowed users: ${config.ALLOWED_USER_IDS.join(', ')}`
      : '📋 Allowed users: everyone'
  );

  const llm = createLlmProvider(config);
  if (!llm) {
    console.warn(`⚠️ No API key for LLM provider "${config.LLM_PROVIDER}", /ask is disabled`);
  }

  const news = createUnwireClient({
    baseUrl: config.NEWS_BASE_URL,
    timeZone: config.NEWS_TIME_ZONE,
    timeoutMs: config.NEWS_TIMEOUT_MS,
  });

  const { bot, tracker } = await createBot(config, { llm, news });

  // Graceful shutdown: stop polling, give running commands a grace period, then cancel the rest
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\n👋 Shutting down...');

    await bot.stop();
    const drained = await tracker.join(config.SHUTDOWN_GRACE_MS);
    if (!drained) {
      await tracker.cancelAll();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error('Shutdown failed:', sanitizeError(error));
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await bot.start({
    onStart: (botInfo) => {
      console.log(`✅ Bot started as @${botInfo.username}`);
      console.log('📱 Send /help in Telegram to begin');
    },
  });
}

main().catch((error) => {
  console.error('Fatal error:', sanitizeError(error));
  process.exit(1);
});
