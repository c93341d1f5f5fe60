import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from "@nestjs/common";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";

interface HttpRequestLike {
  method: string;
  url: string;
}

interface HttpResponseLike {
  statusCode: number;
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const { method, url } = http.getRequest<HttpRequestLike>();

    const start = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const { statusCode } = http.getResponse<HttpResponseLike>();
          this.logger.debug(
            `${method} ${url} ${statusCode} - ${Date.now() - start}ms`,
          );
        },
        error: (error: unknown) => {
          this.logger.debug(
            `${method} ${url} failed (${error instanceof Error ? error.name : "Error"}) - ${Date.now() - start}ms`,
          );
        },
      }),
    );
  }
}
