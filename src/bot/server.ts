#!/usr/bin/env ts-node

// Load env first, then initialize structured logging
import * as dotenv from 'dotenv';
dotenv.config();
import { log } from '../utils/logger';

import { Client, Events, GatewayIntentBits } from 'discord.js';
import { HttpSheetSource } from '../api/sheet-client';
import { DeadlineReconciler } from '../core/deadline-reconciler';
import { ConfigError, errorMessage } from '../core/errors';
import { AliasRegistry } from '../store/alias-registry';
import { NotificationLedger } from '../store/notification-ledger';
import { commandPayload } from './commands/definitions';
import { handleInteraction } from './commands/handlers';
import { AppConfig, loadConfig } from './config';
import { DiscordRecipientGateway } from './discord/recipient-gateway';
import { createBaseApp } from './http/base-server';
import { DeadlineScheduler, startScheduler } from './scheduler';

async function registerCommands(client: Client<true>, guildIds: readonly string[]): Promise<void> {
  const payload = commandPayload();
  let synced = 0;
  for (const guildId of guildIds) {
    try {
      const commands = await client.application.commands.set(payload, guildId);
      synced++;
      log.info(`Synced ${commands.size} commands for guild ${guildId}`);
    } catch (e) {
      log.warn({ error: errorMessage(e) }, `Failed to sync commands for guild ${guildId}`);
    }
  }
  log.info(`Successfully synced commands to ${synced}/${guildIds.length} guilds`);
}

function startBot(config: AppConfig): void {
  const registry = AliasRegistry.load(config.charterFile);
  const ledger = NotificationLedger.load(config.notifyFile);
  const sheet = new HttpSheetSource(config.sheetApiUrl, config.sheetTimeoutMs);
  log.info(`State files ready • aliases=${registry.size} • sent keys=${ledger.size}`);

  const client = new Client({ intents: [GatewayIntentBits.Guilds] });
  const gateway = new DiscordRecipientGateway(client, config.guildIds);
  const reconciler = new DeadlineReconciler({ sheet, registry, ledger, gateway });
  let scheduler: DeadlineScheduler | null = null;

  client.once(Events.ClientReady, (ready) => {
    log.info(`Logged in as ${ready.user.tag}`);
    registerCommands(ready, config.guildIds)
      .catch((e) => log.error({ err: e }, 'command registration failed'))
      .finally(() => {
        scheduler = startScheduler({ task: () => reconciler.runPass() });
        log.info('Bot ready & deadline check started');
      });
  });

  client.on(Events.InteractionCreate, (interaction) => {
    void handleInteraction(interaction, { registry, sheet });
  });

  client.on(Events.Error, (e) => log.error({ err: e }, 'discord client error'));

  const app = createBaseApp();
  const server = app.listen(config.port, () => {
    log.info(`Health check server running on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received; shutting down`);
    scheduler?.stop();
    server.close();
    client
      .destroy()
      .catch((e) => log.warn({ error: errorMessage(e) }, 'client destroy failed'))
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  client.login(config.discordToken).catch((e) => {
    log.fatal({ err: e }, 'Discord login failed');
    process.exit(1);
  });
}

function main(): void {
  process.on('unhandledRejection', (reason) => {
    log.error({ err: reason }, 'unhandled rejection');
  });

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (e) {
    if (e instanceof ConfigError) {
      log.fatal({ code: e.code }, e.message);
      process.exit(1);
    }
    throw e;
  }
  startBot(config);
}

if (require.main === module) {
  main();
}
