import type express from "express";
import { ChatCompressionService } from "./compression/compressionService";
import { DEFAULT_COMPRESSION_CONFIG } from "./compression/types";
import type { GatewayConfig } from "./config";
import { createApp } from "./http/app";
import { createDefaultProviderFactory, type AIProviderFactory } from "./providers/providerFactory";
import { ChatRouter } from "./router";
import { SchedulerManager } from "./scheduler/schedulerManager";
import { ScheduledTaskStorage } from "./scheduler/taskStorage";
import { TaskBindingRegistry } from "./scheduler/types";
import { InMemoryConfigRepository } from "./sessions/configRepository";
import { PersistentSessionRepository } from "./sessions/persistentSessionRepository";
import { JsonSessionStorage } from "./sessions/sessionStorage";
import { createTokenCounterCache, type TokenCounter } from "./tokenizer/tokenCounter";
import type { HttpClient } from "./types";
import { Logger, logger as rootLogger } from "./utils/logger";

export interface GatewayDeps {
  config: GatewayConfig;
  httpClient: HttpClient;
  tokenCounterFor?: (model: string) => TokenCounter;
  logger?: Logger;
}

export interface Gateway {
  app: express.Express;
  factory: AIProviderFactory;
  sessions: PersistentSessionRepository;
  configs: InMemoryConfigRepository;
  router: ChatRouter;
  compression: ChatCompressionService;
  scheduler: SchedulerManager;
}

/** Wires every component around one shared HTTP client. */
export function createGateway({ config, httpClient, tokenCounterFor, logger }: GatewayDeps): Gateway {
  const log = logger ?? rootLogger;

  const factory = createDefaultProviderFactory({
    httpClient,
    tokenCounterFor: tokenCounterFor ?? createTokenCounterCache(),
    logger: log.child({ service: "AIProviderFactory" }),
  });
  const sessions = new PersistentSessionRepository({
    storage: new JsonSessionStorage(config.sessions.dataDir, log.child({ service: "JsonSessionStorage" })),
    saveDelayMs: config.sessions.saveDelayMs,
    logger: log.child({ service: "PersistentSessionRepository" }),
  });
  const configs = new InMemoryConfigRepository(config.providers);

  const compression = new ChatCompressionService({
    factory,
    sessions,
    configs,
    logger: log.child({ service: "ChatCompressionService" }),
  });
  const router = new ChatRouter({
    factory,
    sessions,
    configs,
    defaultProvider: config.defaultProvider,
    compression,
    autoCompress: config.compression.autoCompress,
    compressionConfig: { ...DEFAULT_COMPRESSION_CONFIG, strategy: config.compression.strategy },
    logger: log.child({ service: "ChatRouter" }),
  });
  const scheduler = new SchedulerManager({
    router,
    sessions,
    storage: new ScheduledTaskStorage(config.scheduler.dataDir, log.child({ service: "ScheduledTaskStorage" })),
    bindings: new TaskBindingRegistry(),
    minIntervalSeconds: config.scheduler.minIntervalSeconds,
    logger: log.child({ service: "SchedulerManager" }),
  });

  const app = createApp({
    router,
    sessions,
    configs,
    compression,
    scheduler,
    corsOrigins: config.corsOrigins,
    bodyLimit: config.bodyLimit,
    logger: log.child({ service: "http" }),
  });

  return { app, factory, sessions, configs, router, compression, scheduler };
}
