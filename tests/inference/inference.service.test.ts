import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { ConfigService } from "../../src/config/config.service.js";
import { CredentialStoreService } from "../../src/credentials/credential-store.service.js";
import { DeploymentsService } from "../../src/deployments/deployments.service.js";
import {
  ConfigMissingError,
  DeploymentNotFoundError,
  UpstreamAuthFailedError,
  UpstreamRequestFailedError,
} from "../../src/errors/index.js";
import { InferenceService } from "../../src/inference/inference.service.js";
import type { InferenceRequest } from "../../src/inference/inference.types.js";
import { TenantResolverService } from "../../src/tenant/tenant-resolver.service.js";
import type { UpstreamHttpClient } from "../../src/upstream/upstream-http.client.js";
import type { UpstreamRequest, UpstreamResponse, UpstreamStream } from "../../src/upstream/upstream.types.js";
import {
  createDirectory,
  createTenantApi,
  identity,
  jsonResponse,
  staticSource,
  type TenantApiHarness,
} from "../helpers.js";

const INFERENCE_URL = "https://inference.example.com/v2/inference/deployments";
const LIST_URL = "https://api.team-x.example.com/v2/lm/deployments";

function deployment(id: string, overrides: Record<string, unknown> = {}) {
  return {
    id,
    scenarioId: "foundation-models",
    status: "RUNNING",
    deploymentUrl: `${INFERENCE_URL}/${id}`,
    ...overrides,
  };
}

function withModel(name: string) {
  return { resources: { backend_details: { model: { name, version: "latest" } } } };
}

const DEPLOYMENTS = [
  deployment("d-orch", { scenarioId: "orchestration-v2", deploymentUrl: `${INFERENCE_URL}/d-orch/` }),
  deployment("d-claude", { details: withModel("anthropic--claude-3.5-sonnet") }),
  deployment("d-gemini", { details: { resources: { backendDetails: { model: { name: "gemini-1.5-flash" } } } } }),
  deployment("d-empty", { deploymentUrl: "" }),
];

function request(overrides: Partial<InferenceRequest> = {}): InferenceRequest {
  return {
    deploymentId: "d-orch",
    messages: [{ role: "user", content: "Hello" }],
    ...overrides,
  };
}

function sentBody(req: UpstreamRequest | undefined): unknown {
  return JSON.parse(req?.body ?? "null");
}

function streamOf(status: number, ...parts: string[]): UpstreamStream {
  const encoder = new TextEncoder();
  async function* chunks(): AsyncGenerator<Uint8Array, void, undefined> {
    for (const part of parts) {
      yield encoder.encode(part);
    }
  }
  return { status, chunks: chunks(), text: async () => parts.join("") };
}

async function collect(events: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const event of events) {
    out.push(event);
  }
  return out;
}

describe("InferenceService", () => {
  let service: InferenceService;
  let send: MockInstance<UpstreamHttpClient["send"]>;
  let stream: MockInstance<UpstreamHttpClient["stream"]>;

  function answer(responses: Record<string, UpstreamResponse>): void {
    send.mockImplementation(async (req: UpstreamRequest) => {
      const response = responses[`${req.method} ${req.url}`];
      if (response) {
        return response;
      }
      if (req.method === "GET" && req.url === LIST_URL) {
        return jsonResponse(200, { count: DEPLOYMENTS.length, resources: DEPLOYMENTS });
      }
      return { status: 404, body: "not found" };
    });
  }

  function createService(harness: TenantApiHarness): InferenceService {
    send = vi.spyOn(harness.http, "send");
    stream = vi.spyOn(harness.http, "stream");
    answer({});
    const directory = createDirectory({
      organizations: [{ id: "org-1", name: "Platform", owner: "olivia" }],
      groups: [{ id: "grp-1", organizationId: "org-1", name: "Runtime", owner: "maria" }],
      teams: [{ id: "team-1", groupId: "grp-1", name: "team-x" }],
    });
    const config = new ConfigService();
    const resolver = new TenantResolverService(directory, harness.credentialStore, config);
    const deployments = new DeploymentsService(harness.api, resolver);
    return new InferenceService(deployments, resolver, harness.api, config);
  }

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2025-01-01T00:00:00Z"));
    service = createService(createTenantApi(["team-x"]));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("run", () => {
    it("should send an orchestration deployment without a model to /completion with gpt-4o-mini", async () => {
      answer({
        [`POST ${INFERENCE_URL}/d-orch/completion`]: jsonResponse(200, {
          orchestration_result: {
            choices: [{ index: 0, message: { role: "assistant", content: "Hi there" }, finish_reason: "stop" }],
          },
        }),
      });

      const response = await service.run(identity(), request());

      const call = send.mock.calls.map(([req]) => req).find((req) => req.method === "POST");
      expect(call?.url).toBe(`${INFERENCE_URL}/d-orch/completion`);
      expect(call?.timeoutMs).toBe(120_000);
      expect(call?.headers).toEqual({
        Authorization: "Bearer test-token",
        "Content-Type": "application/json",
        "AI-Resource-Group": "default",
      });
      expect(sentBody(call)).toMatchObject({
        orchestration_config: {
          module_configurations: {
            templating_module_config: { template: [{ role: "user", content: "Hello" }] },
            llm_module_config: { model_name: "gpt-4o-mini" },
          },
        },
      });
      expect(response).toEqual({
        id: "orch-1735689600",
        object: "chat.completion",
        created: 1735689600,
        model: "gpt-4o-mini",
        choices: [{ index: 0, message: { role: "assistant", content: "Hi there" }, finish_reason: "stop" }],
        usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
      });
    });

    it("should look the deployment up in the hinted tenant", async () => {
      answer({
        [`GET ${LIST_URL}/d-claude`]: jsonResponse(200, DEPLOYMENTS[1]),
        [`POST ${INFERENCE_URL}/d-claude/invoke`]: jsonResponse(200, {
          id: "msg_1",
          content: [{ type: "text", text: "Bonjour" }],
          usage: { input_tokens: 3, output_tokens: 1 },
        }),
      });

      const response = await service.run(identity(), request({ deploymentId: "d-claude", tenant: "team-x" }));

      expect(send.mock.calls.map(([req]) => `${req.method} ${req.url}`)).toEqual([
        `GET ${LIST_URL}/d-claude`,
        `POST ${INFERENCE_URL}/d-claude/invoke`,
      ]);
      expect(response.choices[0]?.message.content).toBe("Bonjour");
      expect(response.model).toBe("anthropic--claude-3.5-sonnet");
    });

    it("should trim the conversation to the model's context window", async () => {
      answer({
        [`POST ${INFERENCE_URL}/d-claude/invoke`]: jsonResponse(200, { id: "msg_2", content: [] }),
      });
      const messages = Array.from({ length: 40 }, (_, i): InferenceRequest["messages"][number] => ({
        role: i % 2 === 0 ? "user" : "assistant",
        content: `turn ${String(i)}`,
      }));

      await service.run(identity(), request({ deploymentId: "d-claude", messages }));

      const call = send.mock.calls.map(([req]) => req).find((req) => req.method === "POST");
      expect(sentBody(call)).toHaveProperty("messages.length", 35);
      expect(sentBody(call)).toHaveProperty("messages.0.content", "turn 5");
    });

    it("should reject with UpstreamRequestFailed on a non-2xx inference answer", async () => {
      answer({ [`POST ${INFERENCE_URL}/d-orch/completion`]: { status: 429, body: "slow down" } });

      const error = await service.run(identity(), request()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamRequestFailedError);
      expect(error).toMatchObject({ upstreamStatus: 429, upstreamBody: "slow down" });
    });

    it("should reject a deployment without an inference URL", async () => {
      await expect(service.run(identity(), request({ deploymentId: "d-empty" }))).rejects.toThrow(
        "Deployment d-empty has no inference URL",
      );
    });

    it("should report the owning tenant's upstream failure rather than not found", async () => {
      answer({ [`GET ${LIST_URL}`]: { status: 503, body: "maintenance" } });

      const error = await service.run(identity(), request()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamRequestFailedError);
      expect(error).toMatchObject({ upstreamStatus: 503, upstreamBody: "maintenance" });
      expect(send).toHaveBeenCalledTimes(1);
    });

    it("should report a failed token exchange rather than not found", async () => {
      const harness = createTenantApi(["team-x"]);
      vi.spyOn(harness.tokenCache, "getTokenFor").mockRejectedValue(
        new UpstreamAuthFailedError("team-x", 401, "invalid_client"),
      );
      service = createService(harness);

      await expect(service.run(identity(), request())).rejects.toBeInstanceOf(UpstreamAuthFailedError);
    });

    it("should report missing credentials rather than not found", async () => {
      service = createService(createTenantApi([], new CredentialStoreService(staticSource(undefined))));

      await expect(service.run(identity(), request())).rejects.toBeInstanceOf(ConfigMissingError);
      expect(send).not.toHaveBeenCalled();
    });

    it("should reject an unknown deployment", async () => {
      await expect(service.run(identity(), request({ deploymentId: "d-missing" }))).rejects.toBeInstanceOf(
        DeploymentNotFoundError,
      );
    });
  });

  describe("openStream", () => {
    it("should convert Gemini chunks, forward other events and stop at [DONE]", async () => {
      stream.mockResolvedValue(
        streamOf(
          200,
          'data: {"candidates":[{"content":{"parts":[{"text":"Hi"}]}}]}\n\n',
          "data: not-json\n\n",
          'data: {"usageMetadata":{"totalTokenCount":3}}\n\ndata: [DONE]\n\ndata: {"late":true}\n\n',
        ),
      );

      const events = await collect(await service.openStream(identity(), request({ deploymentId: "d-gemini" })));

      expect(stream.mock.calls[0]?.[0].url).toBe(`${INFERENCE_URL}/d-gemini/models/gemini-1.5-flash:streamGenerateContent`);
      expect(events).toHaveLength(2);
      expect(JSON.parse(events[0] ?? "null")).toEqual({
        id: "gemini-1735689600000",
        object: "chat.completion.chunk",
        created: 1735689600,
        model: "gemini-1.5-flash",
        choices: [{ index: 0, delta: { content: "Hi" }, finish_reason: null }],
      });
      expect(events[1]).toBe('{"usageMetadata":{"totalTokenCount":3}}');
    });

    it("should forward non-Gemini events unchanged", async () => {
      stream.mockResolvedValue(streamOf(200, 'data: {"type":"content_block_delta"}\n\n'));

      const events = await collect(await service.openStream(identity(), request({ deploymentId: "d-claude" })));

      expect(stream.mock.calls[0]?.[0].url).toBe(`${INFERENCE_URL}/d-claude/invoke-with-response-stream`);
      expect(events).toEqual(['{"type":"content_block_delta"}']);
    });

    it("should reject before any event when the upstream status is not 2xx", async () => {
      stream.mockResolvedValue(streamOf(503, "overloaded"));

      const error = await service.openStream(identity(), request()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamRequestFailedError);
      expect(error).toMatchObject({ upstreamStatus: 503, upstreamBody: "overloaded" });
    });
  });
});
