import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../config.js';
import { CommandRegistry } from '../../core/command-registry.js';
import type { CommandContext } from '../context.js';
import { createFakeContext, invocation } from '../fake-context.test-utils.js';
import { TEST_RESPONSE, createBasicHandlers, describeHost, loadDogArt, registerBasicCommands } from './basic.commands.js';

const baseEnv = { TELEGRAM_BOT_TOKEN: 'test-token' };

describe('basic commands', () => {
  it('renders the environment name uppercased for /env', async () => {
    const { handleEnv } = createBasicHandlers({ config: loadConfig({ ...baseEnv, ENVIRONMENT: 'test' }) });
    const { ctx, reply } = createFakeContext('/env');

    await handleEnv(ctx, invocation('env'));

    expect(reply).toHaveBeenCalledTimes(1);
    expect(reply.mock.calls[0][0]).toBe('Environment: TEST\n\n');
  });

  it('answers /.env with the same handler as /env', async () => {
    const registry = new CommandRegistry<CommandContext>();
    registerBasicCommands(registry, { config: loadConfig({ ...baseEnv, ENVIRONMENT: 'staging' }) });
    const match = registry.match('/.env');
    const { ctx, reply } = createFakeContext('/.env');

    await match?.handler(ctx, invocation('.env'));

    expect(reply.mock.calls[0][0]).toBe('Environment: STAGING\n\n');
  });

  it('edits the ping reply with the measured round trip', async () => {
    const times = [100, 112.5];
    const { handlePing } = createBasicHandlers({
      config: loadConfig({ ...baseEnv, AZURE_WEBSITE_NAME: 'site', AZURE_REGION: 'eastasia' }),
      clock: () => times.shift() ?? 0,
    });
    const { ctx, reply, editMessageText } = createFakeContext('/ping');

    await handlePing(ctx, invocation('ping'));

    expect(reply.mock.calls[0][0]).toBe('Pinging...');
    expect(editMessageText).toHaveBeenCalledWith(555, 77, '12.5ms\nService: Azure\nLocation: eastasia');
  });

  it('reports a local host when no hosting variables are set', () => {
    expect(describeHost(loadConfig(baseEnv))).toEqual({ service: 'Local', location: 'Unknown' });
    expect(describeHost(loadConfig({ ...baseEnv, AZURE_DEPLOYMENT: '1' }))).toEqual({ service: 'Azure', location: 'Unknown' });
  });

  it('greets with a randomly chosen dog', async () => {
    const { handleHiDog } = createBasicHandlers({
      config: loadConfig(baseEnv),
      dogArt: ['first dog', 'second dog'],
      random: () => 0.99,
    });
    const { ctx, reply } = createFakeContext('/hi_dog');

    await handleHiDog(ctx, invocation('hi_dog'));

    expect(reply.mock.calls[0][0]).toBe('Woof! Hello there! 🐶\nsecond dog');
  });

  it('ships dog art with the project', () => {
    const arts = loadDogArt();
    expect(arts).toHaveLength(5);
    expect(arts.every((art) => art.trim().length > 0)).toBe(true);
  });

  it('confirms the bot is alive on /test', async () => {
    const { handleTest } = createBasicHandlers({ config: loadConfig(baseEnv) });
    const { ctx, reply } = createFakeContext('/test');

    await handleTest(ctx, invocation('test'));

    expect(reply.mock.calls[0][0]).toBe(TEST_RESPONSE);
  });

  it('summarises status', async () => {
    const { handleStatus } = createBasicHandlers({
      config: loadConfig({ ...baseEnv, BOT_NAME: 'Helper', ENVIRONMENT: 'prod' }),
      llmProviderName: 'grok',
    });
    const { ctx, reply } = createFakeContext('/status');

    await handleStatus(ctx, invocation('status'));

    const lines = String(reply.mock.calls[0][0]).split('\n');
    expect(lines[0]).toBe('🟢 Helper is running');
    expect(lines[2]).toBe('Environment: PROD');
    expect(lines[3]).toMatch(/^Uptime: \d+/);
    expect(lines[4]).toBe('LLM: grok');
  });
});
