import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import type { Response } from "express";
import {
  GatewayError,
  type GatewayErrorKind,
  UpstreamAuthFailedError,
  UpstreamRequestFailedError,
} from "../errors/index.js";

export interface GatewayErrorResponse {
  error: {
    message: string;
    kind: GatewayErrorKind | "BadRequest" | "HttpError" | "InternalError";
    upstream_status: number | null;
  };
}

function upstreamStatus(exception: GatewayError): number | null {
  if (exception instanceof UpstreamAuthFailedError || exception instanceof UpstreamRequestFailedError) {
    return exception.upstreamStatus;
  }
  return null;
}

/**
 * Message of a plain HttpException, whose response is either a string or
 * Nest's `{ message, error, statusCode }` object.
 */
function httpExceptionMessage(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === "string") {
    return response;
  }
  if (typeof response === "object" && "message" in response) {
    const { message } = response;
    if (typeof message === "string") return message;
    if (Array.isArray(message)) return message.map(String).join("; ");
  }
  return exception.message;
}

/**
 * Renders every failure as `{ error: { message, kind, upstream_status } }`
 */
@Catch()
export class GatewayErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(GatewayErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, body } = this.toResponse(exception);

    if (status >= 500) {
      this.logger.error(`${body.error.kind}: ${body.error.message}`);
    }

    if (response.headersSent) {
      response.end();
      return;
    }
    response.status(status).json(body);
  }

  private toResponse(exception: unknown): { status: number; body: GatewayErrorResponse } {
    if (exception instanceof GatewayError) {
      return {
        status: exception.getStatus(),
        body: {
          error: {
            message: exception.message,
            kind: exception.kind,
            upstream_status: upstreamStatus(exception),
          },
        },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return {
        status,
        body: {
          error: {
            message: httpExceptionMessage(exception),
            kind: status === HttpStatus.BAD_REQUEST ? "BadRequest" : "HttpError",
            upstream_status: null,
          },
        },
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        error: {
          message: exception instanceof Error ? exception.message : "An unexpected error occurred",
          kind: "InternalError",
          upstream_status: null,
        },
      },
    };
  }
}
