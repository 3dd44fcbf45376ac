import { ArgumentsHost, Catch, HttpException } from "@nestjs/common";
import { BaseExceptionFilter, HttpAdapterHost } from "@nestjs/core";
import type { Request } from "express";

import { captureException } from "./sentry.js";

/** Client errors (4xx) are expected for bad render requests and are not reported. */
const isServerFailure = (exception: unknown): boolean =>
  !(exception instanceof HttpException) || exception.getStatus() >= 500;

@Catch()
export class SentryExceptionFilter extends BaseExceptionFilter {
  constructor(httpAdapterHost: HttpAdapterHost) {
    super(httpAdapterHost.httpAdapter);
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    if (isServerFailure(exception)) {
      const req = host.switchToHttp().getRequest<Request>();
      captureException(exception, {
        filter: "SentryExceptionFilter",
        route: `${req.method} ${req.originalUrl}`
      });
    }

    super.catch(exception, host);
  }
}
