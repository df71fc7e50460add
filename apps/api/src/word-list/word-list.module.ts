import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { APP_FILTER } from "@nestjs/core";

import { WordListConfig } from "../config/word-list.config";
import { AdapterRegistry } from "./adapter.registry";
import { InterfaceManager } from "./interface-manager";
import { WordListController } from "./word-list.controller";
import { WordListExceptionFilter } from "./word-list.filter";
import { WORD_LIST_MANAGER } from "./word-list.constants";

// Adapters
import { BUILTIN_ADAPTERS } from "./adapters";

@Module({
  controllers: [WordListController],
  providers: [
    {
      provide: AdapterRegistry,
      useFactory: () => new AdapterRegistry(BUILTIN_ADAPTERS),
    },
    {
      // async factory: Nest resolves it before the app accepts requests
      provide: WORD_LIST_MANAGER,
      inject: [ConfigService, AdapterRegistry],
      useFactory: (config: ConfigService, registry: AdapterRegistry) => {
        const cfg = config.getOrThrow<WordListConfig>("wordList");
        return InterfaceManager.initialize(registry, cfg.credentials, {
          exclude: cfg.exclude,
          initPolicy: cfg.initPolicy,
          deps: { retry: cfg.retry, handshakeTimeoutMs: cfg.timeoutMs },
        });
      },
    },
    { provide: APP_FILTER, useClass: WordListExceptionFilter },
  ],
  exports: [WORD_LIST_MANAGER, AdapterRegistry],
})
export class WordListModule {}
