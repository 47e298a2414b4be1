import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { DecodeFailedError, UpstreamRequestFailedError } from "../../src/errors/index.js";
import { ModelsService } from "../../src/models/models.service.js";
import type { UpstreamHttpClient } from "../../src/upstream/upstream-http.client.js";
import { createTenantApi, jsonResponse } from "../helpers.js";

const CATALOG = {
  count: 2,
  resources: [
    {
      model: "gpt-4o",
      executableId: "azure-openai",
      description: "Multimodal GPT model",
      versions: [{ name: "2024-08-06", isLatest: true, contextLength: 128000 }],
    },
    {
      model: "anthropic--claude-3.5-sonnet",
      executableId: "aws-bedrock",
      description: "Claude 3.5 Sonnet",
      provider: "Anthropic",
      versions: [{ name: "1", isLatest: true, deprecated: false, streamingSupported: true }],
    },
  ],
};

describe("ModelsService", () => {
  let service: ModelsService;
  let send: MockInstance<UpstreamHttpClient["send"]>;

  beforeEach(() => {
    const harness = createTenantApi(["team-x"]);
    send = vi.spyOn(harness.http, "send").mockResolvedValue(jsonResponse(200, CATALOG));
    service = new ModelsService(harness.api);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("listModels", () => {
    it("should list the scenario's models for the tenant", async () => {
      const result = await service.listModels("team-x", "foundation-models");

      expect(send).toHaveBeenCalledWith(
        expect.objectContaining({
          method: "GET",
          url: "https://api.team-x.example.com/v2/lm/scenarios/foundation-models/models",
        }),
      );
      expect(result.count).toBe(2);
      expect(result.resources.map((m) => m.model)).toEqual(["gpt-4o", "anthropic--claude-3.5-sonnet"]);
      expect(result.resources[0]?.versions[0]).toMatchObject({ name: "2024-08-06", isLatest: true, deprecated: false });
      expect(result.resources[1]).toMatchObject({ provider: "Anthropic" });
    });

    it("should count the resources when the upstream omits count", async () => {
      send.mockResolvedValue(jsonResponse(200, { resources: [CATALOG.resources[0]] }));

      const result = await service.listModels("team-x", "foundation-models");

      expect(result.count).toBe(1);
    });

    it("should encode the scenario id into the path", async () => {
      await service.listModels("team-x", "my scenario/1");

      expect(send.mock.calls[0]?.[0].url).toBe(
        "https://api.team-x.example.com/v2/lm/scenarios/my%20scenario%2F1/models",
      );
    });

    it("should fail with UpstreamRequestFailed on a non-200 answer", async () => {
      send.mockResolvedValue({ status: 404, body: "scenario not found" });

      await expect(service.listModels("team-x", "nope")).rejects.toBeInstanceOf(UpstreamRequestFailedError);
    });

    it("should fail with DecodeFailed on a malformed catalog", async () => {
      send.mockResolvedValue(jsonResponse(200, { resources: [{ description: "no model name" }] }));

      await expect(service.listModels("team-x", "foundation-models")).rejects.toBeInstanceOf(DecodeFailedError);
    });
  });
});
