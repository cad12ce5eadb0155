import { CallHandler, ExecutionContext, Global, Inject, Injectable, Module, NestInterceptor } from "@nestjs/common";
import pino, { Logger as PinoLoggerInstance } from "pino";
import { randomUUID } from "crypto";
import { Observable, tap } from "rxjs";

export interface ILogger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

export interface LogContext extends Record<string, unknown> {
  traceId?: string;
  userId?: string;
  game?: string;
  roundId?: number;
}

export const LOGGER = Symbol("LOGGER");
export const TRACE_ID_HEADER = "x-trace-id";

export interface PinoLoggerOptions {
  level?: string;
  name?: string;
}

export class PinoLogger implements ILogger {
  private readonly logger: PinoLoggerInstance;

  constructor(options: PinoLoggerOptions = {}) {
    this.logger = pino({
      level: options.level ?? process.env.LOG_LEVEL ?? "info",
      name: options.name ?? process.env.SERVICE_NAME ?? "wagerhouse",
    });
  }

  debug(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.debug(meta, msg);
  }

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.info(meta, msg);
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.warn(meta, msg);
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.error(meta, msg);
  }
}

/** Prefixes every record with fixed context, e.g. the game a table serves. */
export class ScopedLogger implements ILogger {
  constructor(private readonly inner: ILogger, private readonly context: LogContext) {}

  debug(msg: string, meta: Record<string, unknown> = {}): void {
    this.inner.debug(msg, { ...this.context, ...meta });
  }

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.inner.info(msg, { ...this.context, ...meta });
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.inner.warn(msg, { ...this.context, ...meta });
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.inner.error(msg, { ...this.context, ...meta });
  }
}

interface TracedRequest {
  method?: string;
  url?: string;
  headers: Record<string, string | string[] | undefined>;
  traceId?: string;
}

@Injectable()
export class CorrelationIdInterceptor implements NestInterceptor {
  constructor(@Inject(LOGGER) private readonly logger: ILogger) {}

  intercept(context: ExecutionContext, next: CallHandler<unknown>): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<TracedRequest>();
    const response = http.getResponse<{ setHeader?: (key: string, value: string) => void }>();

    const header = request.headers[TRACE_ID_HEADER];
    const traceId = (Array.isArray(header) ? header[0] : header) ?? randomUUID();
    request.traceId = traceId;
    if (typeof response.setHeader === "function") {
      response.setHeader(TRACE_ID_HEADER, traceId);
    }

    const start = Date.now();
    const fields = { traceId, method: request.method, url: request.url };
    return next.handle().pipe(
      tap({
        next: () => this.logger.info("request.completed", { ...fields, durationMs: Date.now() - start }),
        error: (err: unknown) =>
          this.logger.warn("request.failed", {
            ...fields,
            durationMs: Date.now() - start,
            err: err instanceof Error ? err.message : String(err),
          }),
      })
    );
  }
}

@Global()
@Module({
  providers: [
    {
      provide: LOGGER,
      useFactory: () => new PinoLogger(),
    },
    CorrelationIdInterceptor,
  ],
  exports: [LOGGER, CorrelationIdInterceptor],
})
export class LoggingModule {}
