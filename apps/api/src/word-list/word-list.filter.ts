import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from "@nestjs/common";
import { HttpAdapterHost } from "@nestjs/core";
import { WordListError, WordListErrorCode } from "./word-list.errors";

const STATUS: Record<WordListErrorCode, number> = {
  invalid_request: HttpStatus.BAD_REQUEST,
  unsupported_source_type: HttpStatus.BAD_REQUEST,
  unsupported_sort_mode: HttpStatus.BAD_REQUEST,
  unsupported_time_window: HttpStatus.BAD_REQUEST,
  unknown_platform: HttpStatus.NOT_FOUND,
  provider_fetch: HttpStatus.BAD_GATEWAY,
  cancelled: HttpStatus.GATEWAY_TIMEOUT,
  provider_init: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function statusFor(err: WordListError) {
  return STATUS[err.code];
}

@Catch(WordListError)
export class WordListExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(WordListExceptionFilter.name);

  constructor(private readonly adapterHost: HttpAdapterHost) {}

  catch(err: WordListError, host: ArgumentsHost) {
    const { httpAdapter } = this.adapterHost;
    const ctx = host.switchToHttp();
    const status = statusFor(err);

    if (status >= 500) this.logger.error(err.message, err.stack);

    httpAdapter.reply(
      ctx.getResponse(),
      { statusCode: status, error: err.code, message: err.message },
      status,
    );
  }
}
