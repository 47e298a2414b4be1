import { Body, Controller, HttpCode, HttpStatus, Logger, Post, Req, Res, UseGuards } from "@nestjs/common";
import type { Response } from "express";
import { type AuthenticatedRequest, IdentityGuard } from "../auth/identity.guard.js";
import { parseInput } from "../common/validation.utils.js";
import { InferenceRequestSchema } from "./inference.schema.js";
import { InferenceService } from "./inference.service.js";
import type { InferenceResponse } from "./inference.types.js";
import { formatSseEvent, SSE_DONE } from "./sse.utils.js";

type SseResponse = Pick<Response, "setHeader" | "write" | "end">;

@Controller("v1/chat")
@UseGuards(IdentityGuard)
export class InferenceController {
  private readonly logger = new Logger(InferenceController.name);

  constructor(private readonly inferenceService: InferenceService) {}

  /**
   * Chat inference against one deployment
   * POST /v1/chat/inference
   */
  @Post("inference")
  @HttpCode(HttpStatus.OK)
  async inference(
    @Req() req: AuthenticatedRequest,
    @Res({ passthrough: true }) res: SseResponse,
    @Body() body: unknown,
  ): Promise<InferenceResponse | undefined> {
    const request = parseInput(InferenceRequestSchema, body);

    if (!request.stream) {
      return this.inferenceService.run(req.identity, request);
    }

    const events = await this.inferenceService.openStream(req.identity, request);

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");

    try {
      for await (const event of events) {
        res.write(formatSseEvent(event));
      }
      res.write(formatSseEvent(SSE_DONE));
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      this.logger.error(`Streaming inference failed: ${message}`);
      res.write(`event: error\n${formatSseEvent(JSON.stringify({ error: message }))}`);
    } finally {
      res.end();
    }
    return undefined;
  }
}
