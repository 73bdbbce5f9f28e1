import * as fs from 'fs';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { command, type CommandRegistry } from '../../core/command-registry.js';
import { isTestEnvironment, type Config } from '../../config.js';
import type { BotCommandHandler, CommandContext } from '../context.js';
import { withErrorReply } from '../handlers/errors.js';
import { getUptimeFormatted } from '../middleware/stale-filter.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DOG_ART_PATH = path.resolve(__dirname, '../../../assets/dog-art.json');

export const TEST_RESPONSE = 'Bot is running! This is a test response.';

export interface BasicCommandDeps {
  config: Config;
  llmProviderName?: string;
  /** Millisecond clock for /ping. */
  clock?: () => number;
  random?: () => number;
  dogArt?: readonly string[];
}

export function loadDogArt(filePath: string = DOG_ART_PATH): string[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return z.array(z.string()).min(1).parse(raw);
}

export function describeHost(config: Config): { service: string; location: string } {
  const service = config.AZURE_DEPLOYMENT || config.AZURE_WEBSITE_NAME ? 'Azure' : 'Local';
  return { service, location: config.AZURE_REGION || 'Unknown' };
}

export function createBasicHandlers(deps: BasicCommandDeps) {
  const { config } = deps;
  const clock = deps.clock ?? (() => performance.now());
  const random = deps.random ?? Math.random;
  let dogArt = deps.dogArt;

  // Latency is the round trip of our own reply, not a network probe
  const handlePing: BotCommandHandler = async (ctx) => {
    const start = clock();
    const message = await ctx.reply('Pinging...');
    const latency = Math.round((clock() - start) * 100) / 100;

    const { service, location } = describeHost(config);
    const response = `${latency}ms\nService: ${service}\nLocation: ${location}`;

    const chatId = ctx.chat?.id;
    if (chatId === undefined) {
      await ctx.reply(response);
      return;
    }
    await ctx.api.editMessageText(chatId, message.message_id, response);
  };

  const handleHiDog: BotCommandHandler = async (ctx) => {
    const arts = dogArt ?? (dogArt = loadDogArt());
    const index = Math.min(Math.floor(random() * arts.length), arts.length - 1);
    await ctx.reply(`Woof! Hello there! 🐶\n${arts[index]}`);
  };

  const handleTest: BotCommandHandler = async (ctx) => {
    await ctx.reply(TEST_RESPONSE);
  };

  const handleEnv: BotCommandHandler = async (ctx) => {
    await ctx.reply(`Environment: ${config.ENVIRONMENT.toUpperCase()}\n\n`);
  };

  const handleStatus: BotCommandHandler = async (ctx) => {
    const lines = [
      `🟢 ${config.BOT_NAME} is running`,
      '',
      `Environment: ${config.ENVIRONMENT.toUpperCase()}${isTestEnvironment(config) ? ' (test)' : ''}`,
      `Uptime: ${getUptimeFormatted()}`,
      `LLM: ${deps.llmProviderName ?? 'not configured'}`,
    ];
    await ctx.reply(lines.join('\n'));
  };

  return { handlePing, handleHiDog, handleTest, handleEnv, handleStatus };
}

export function registerBasicCommands(registry: CommandRegistry<CommandContext>, deps: BasicCommandDeps): void {
  const handlers = createBasicHandlers(deps);

  registry.register(command('ping'), withErrorReply(handlers.handlePing), { description: '🏓 Measure reply latency' });
  registry.register(command('hi_dog'), withErrorReply(handlers.handleHiDog), { description: '🐶 Say hi to a dog' });
  registry.register(command('test'), withErrorReply(handlers.handleTest), { description: '✅ Check the bot is running' });
  registry.register(command('env'), withErrorReply(handlers.handleEnv), { description: '🌐 Show the environment' });
  registry.register(command('.env'), withErrorReply(handlers.handleEnv));
  registry.register(command('status'), withErrorReply(handlers.handleStatus), { description: '📊 Show bot status' });
}
