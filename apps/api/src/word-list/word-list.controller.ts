import { Body, Controller, Get, HttpCode, Inject, Post } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { WordListConfig } from "../config/word-list.config";
import { InterfaceManager } from "./interface-manager";
import { createRequestDescriptor } from "./request-descriptor";
import { WORD_LIST_MANAGER } from "./word-list.constants";
import { WordListResponse, parseWordListBody } from "./word-list.dto";

@Controller("word-list")
export class WordListController {
  constructor(
    @Inject(WORD_LIST_MANAGER) private readonly manager: InterfaceManager,
    private readonly config: ConfigService,
  ) {}

  @Get("platforms")
  platforms() {
    return this.manager.capabilities();
  }

  @Post()
  @HttpCode(200)
  async wordList(@Body() body: unknown): Promise<WordListResponse> {
    const cfg = this.config.getOrThrow<WordListConfig>("wordList");
    const { input, timeoutMs, partialOnCancel } = parseWordListBody(body, cfg.maxItemsLimit);
    const request = createRequestDescriptor(input);

    const result = await this.manager.dispatch(request, {
      timeoutMs: timeoutMs ?? cfg.timeoutMs,
      partialOnCancel,
    });

    return {
      platform: request.platform,
      sourceType: request.sourceType,
      sourceValue: request.sourceValue,
      items: result.items,
      partial: result.partial,
      words: result.words,
    };
  }
}
