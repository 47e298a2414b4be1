import { Injectable, Logger } from "@nestjs/common";
import type { CallerIdentity } from "../auth/identity.types.js";
import { ConfigService } from "../config/config.service.js";
import { DeploymentsService } from "../deployments/deployments.service.js";
import type { LocatedDeployment } from "../deployments/deployments.types.js";
import { DeploymentNotFoundError, UpstreamRequestFailedError } from "../errors/index.js";
import { TenantResolverService } from "../tenant/tenant-resolver.service.js";
import { TenantApiClient } from "../token/tenant-api.client.js";
import { isSuccess } from "../upstream/upstream-http.client.js";
import { PROTOCOL_ADAPTERS, type ProtocolAdapter, type UpstreamCall } from "./adapters/index.js";
import { trimMessages } from "./context-window.js";
import type { InferenceRequest, InferenceResponse } from "./inference.types.js";
import { classifyProtocol, extractModelName } from "./protocol.classifier.js";
import { readSseData, SSE_DONE } from "./sse.utils.js";

interface PreparedCall {
  tenantId: string;
  modelName: string;
  adapter: ProtocolAdapter;
  call: UpstreamCall;
}

@Injectable()
export class InferenceService {
  private readonly logger = new Logger(InferenceService.name);

  constructor(
    private readonly deploymentsService: DeploymentsService,
    private readonly tenantResolver: TenantResolverService,
    private readonly api: TenantApiClient,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Send one chat request to a deployment and normalize the answer
   */
  async run(identity: CallerIdentity, request: InferenceRequest): Promise<InferenceResponse> {
    const prepared = await this.prepare(identity, request, false);
    const response = await this.api.request(prepared.tenantId, {
      method: "POST",
      target: prepared.call.url,
      body: prepared.call.body,
      timeoutMs: this.configService.get("inferenceTimeout"),
    });
    if (!isSuccess(response.status)) {
      throw new UpstreamRequestFailedError(response.status, response.body);
    }
    return prepared.adapter.parseResponse(response.body, prepared.modelName);
  }

  /**
   * Open the streaming variant of the call. Failures up to the upstream status
   * reject here; the returned events are SSE data payloads, without the final [DONE].
   */
  async openStream(
    identity: CallerIdentity,
    request: InferenceRequest,
  ): Promise<AsyncGenerator<string, void, undefined>> {
    const prepared = await this.prepare(identity, request, true);
    const upstream = await this.api.stream(prepared.tenantId, {
      method: "POST",
      target: prepared.call.url,
      body: prepared.call.body,
      timeoutMs: this.configService.get("inferenceTimeout"),
    });
    if (!isSuccess(upstream.status)) {
      throw new UpstreamRequestFailedError(upstream.status, await upstream.text());
    }
    return this.relay(upstream.chunks, prepared);
  }

  private async *relay(
    chunks: AsyncIterable<Uint8Array>,
    prepared: PreparedCall,
  ): AsyncGenerator<string, void, undefined> {
    for await (const data of readSseData(chunks)) {
      if (data === SSE_DONE) {
        return;
      }

      let event: unknown;
      try {
        event = JSON.parse(data);
      } catch (error) {
        this.logger.warn(
          `Skipping unparseable stream event: ${error instanceof Error ? error.message : String(error)}`,
        );
        continue;
      }

      const converted = prepared.adapter.convertChunk?.(event, prepared.modelName);
      yield converted ? JSON.stringify(converted) : data;
    }
  }

  private async prepare(
    identity: CallerIdentity,
    request: InferenceRequest,
    stream: boolean,
  ): Promise<PreparedCall> {
    const { tenantId, deployment } = await this.locate(identity, request);
    if (!deployment.deploymentUrl) {
      throw new DeploymentNotFoundError(
        deployment.id,
        `Deployment ${deployment.id} has no inference URL`,
      );
    }

    const modelName = extractModelName(deployment.details) ?? "";
    const protocol = classifyProtocol(deployment.scenarioId, modelName);
    const adapter = PROTOCOL_ADAPTERS[protocol];
    const messages = trimMessages(request.messages, modelName);
    if (messages.length < request.messages.length) {
      this.logger.debug(
        `Trimmed conversation from ${String(request.messages.length)} to ${String(messages.length)} messages`,
      );
    }

    const call = adapter.buildRequest({
      deploymentUrl: deployment.deploymentUrl.replace(/\/+$/, ""),
      modelName,
      messages,
      max_tokens: request.max_tokens,
      temperature: request.temperature,
      top_p: request.top_p,
      stream,
    });
    this.logger.log(
      `Inference on deployment ${deployment.id} of tenant ${tenantId} (${protocol}${modelName ? `, ${modelName}` : ""})`,
    );
    return { tenantId, modelName, adapter, call };
  }

  private async locate(identity: CallerIdentity, request: InferenceRequest): Promise<LocatedDeployment> {
    if (request.tenant) {
      const tenantId = await this.tenantResolver.resolveTarget(identity, request.tenant);
      const deployment = await this.deploymentsService.getDeploymentDetails(tenantId, request.deploymentId);
      return { tenantId, deployment };
    }
    const scope = await this.tenantResolver.resolve(identity);
    return this.deploymentsService.findDeployment(scope, request.deploymentId);
  }
}
