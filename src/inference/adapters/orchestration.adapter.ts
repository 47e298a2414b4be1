import { z } from "zod";
import { decodeJson } from "../../upstream/decode.js";
import type { InferenceMessage, InferenceResponse } from "../inference.types.js";
import { InferenceProtocol } from "../protocol.classifier.js";
import {
  type AdapterInput,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type ProtocolAdapter,
  type UpstreamCall,
} from "./adapter.types.js";
import { unixSeconds } from "./content.utils.js";

export const DEFAULT_ORCHESTRATION_MODEL = "gpt-4o-mini";

export interface OrchestrationRequestBody {
  orchestration_config: {
    module_configurations: {
      templating_module_config: { template: InferenceMessage[] };
      llm_module_config: {
        model_name: string;
        model_params: {
          max_tokens: number;
          temperature: number;
          frequency_penalty: number;
          presence_penalty: number;
        };
        model_version: string;
      };
    };
  };
  input_params: Record<string, string>;
  stream?: boolean;
}

const OrchestrationResponseSchema = z.object({
  orchestration_result: z.object({
    choices: z
      .array(
        z.object({
          index: z.number().int().default(0),
          message: z.object({ content: z.string().default("") }),
          finish_reason: z.string().default(""),
        }),
      )
      .default([]),
  }),
});

function orchestrationModel(modelName: string): string {
  return modelName || DEFAULT_ORCHESTRATION_MODEL;
}

/**
 * The conversation goes into the templating module verbatim; the LLM module
 * falls back to gpt-4o-mini when the deployment names no model.
 */
export function buildOrchestrationRequest(input: AdapterInput): UpstreamCall<OrchestrationRequestBody> {
  const body: OrchestrationRequestBody = {
    orchestration_config: {
      module_configurations: {
        templating_module_config: {
          template: input.messages.map(({ role, content }) => ({ role, content })),
        },
        llm_module_config: {
          model_name: orchestrationModel(input.modelName),
          model_params: {
            max_tokens: input.max_tokens ?? DEFAULT_MAX_TOKENS,
            temperature: input.temperature ?? DEFAULT_TEMPERATURE,
            frequency_penalty: 0,
            presence_penalty: 0,
          },
          model_version: "latest",
        },
      },
    },
    input_params: {},
  };
  if (input.stream) {
    body.stream = true;
  }

  return { url: `${input.deploymentUrl}/completion`, body };
}

// Token counts are not reported by the orchestration service
export function parseOrchestrationResponse(body: string, modelName: string): InferenceResponse {
  const resp = decodeJson(body, OrchestrationResponseSchema, "orchestration response");
  const now = unixSeconds();

  return {
    id: `orch-${String(now)}`,
    object: "chat.completion",
    created: now,
    model: orchestrationModel(modelName),
    choices: resp.orchestration_result.choices.map((choice) => ({
      index: choice.index,
      message: { role: "assistant", content: choice.message.content },
      finish_reason: choice.finish_reason,
    })),
    usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
  };
}

export const orchestrationAdapter: ProtocolAdapter = {
  protocol: InferenceProtocol.Orchestration,
  buildRequest: buildOrchestrationRequest,
  parseResponse: parseOrchestrationResponse,
};
