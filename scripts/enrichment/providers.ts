import fetch, { type Response } from "node-fetch";
import { z } from "zod";

import type { DomainContext, GeneratorProviderId, Item } from "@shared/enrichment";

import { GeneratorRequestError } from "./errors";
import { buildBatchPrompt } from "./prompts";

const REQUEST_HEADERS = {
  Accept: "application/json",
  "User-Agent": "wordlist-enricher/1.0 (data enrichment pipeline)",
};

const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta/models";
const OPENAI_CHAT_COMPLETIONS = "https://api.openai.com/v1/chat/completions";

export const DEFAULT_MODELS: Record<GeneratorProviderId, string> = {
  gemini: "gemini-2.0-flash",
  openai: "gpt-4o-mini",
};

const SYSTEM_INSTRUCTION =
  "You are a linguistics assistant that builds vocabulary study material. Respond with valid JSON only.";

/**
 * Generative text service used by the scheduler. Implementations make exactly
 * one request per call; retries and pacing belong to the caller.
 */
export interface Generator {
  readonly id: string;
  readonly model?: string;
  generate(items: readonly Item[], context: DomainContext): Promise<string>;
}

export type GeneratorCapability =
  | { available: true; generator: Generator }
  | { available: false; reason: string };

export interface GeneratorOptions {
  enableAi: boolean;
  provider: GeneratorProviderId;
  model?: string;
  geminiApiKey?: string;
  openAiApiKey?: string;
  temperature?: number;
}

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
      }),
    )
    .optional(),
});

const openAiResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      }),
    )
    .optional(),
});

async function readPayload(providerId: string, response: Response): Promise<unknown> {
  if (!response.ok) {
    throw new GeneratorRequestError(
      providerId,
      `${providerId} request failed with status ${response.status}: ${await response.text()}`,
      response.status,
    );
  }
  try {
    return await response.json();
  } catch (error) {
    throw new GeneratorRequestError(providerId, `${providerId} returned a non-JSON payload`, response.status, {
      cause: error,
    });
  }
}

export function createGeminiGenerator(apiKey: string, model: string, temperature = 0.3): Generator {
  return {
    id: "gemini",
    model,
    async generate(items, context) {
      const body = {
        systemInstruction: { parts: [{ text: SYSTEM_INSTRUCTION }] },
        contents: [{ role: "user", parts: [{ text: buildBatchPrompt(items, context) }] }],
        generationConfig: {
          responseMimeType: "application/json",
          temperature,
        },
      };

      const response = await fetch(`${GEMINI_API_BASE}/${encodeURIComponent(model)}:generateContent`, {
        method: "POST",
        headers: {
          ...REQUEST_HEADERS,
          "Content-Type": "application/json",
          "x-goog-api-key": apiKey,
        },
        body: JSON.stringify(body),
      });

      const payload = geminiResponseSchema.safeParse(await readPayload("gemini", response));
      const text = payload.success
        ? (payload.data.candidates?.[0]?.content?.parts ?? [])
            .map((part) => part.text ?? "")
            .join("")
        : "";
      if (!text.trim()) {
        throw new GeneratorRequestError("gemini", "No text response from Gemini", response.status);
      }
      return text;
    },
  };
}

export function createOpenAiGenerator(apiKey: string, model: string, temperature = 0.2): Generator {
  return {
    id: "openai",
    model,
    async generate(items, context) {
      const body = {
        model,
        temperature,
        messages: [
          { role: "system", content: SYSTEM_INSTRUCTION },
          { role: "user", content: buildBatchPrompt(items, context) },
        ],
      };

      const response = await fetch(OPENAI_CHAT_COMPLETIONS, {
        method: "POST",
        headers: {
          ...REQUEST_HEADERS,
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
      });

      const payload = openAiResponseSchema.safeParse(await readPayload("openai", response));
      const content = payload.success ? payload.data.choices?.[0]?.message?.content : undefined;
      if (!content?.trim()) {
        throw new GeneratorRequestError("openai", "No text response from OpenAI", response.status);
      }
      return content;
    },
  };
}

/**
 * Decides once, at startup, whether generator calls can happen in this run.
 */
export function resolveGeneratorCapability(options: GeneratorOptions): GeneratorCapability {
  if (!options.enableAi) {
    return { available: false, reason: "AI generation disabled" };
  }

  const model = options.model ?? DEFAULT_MODELS[options.provider];
  if (options.provider === "openai") {
    if (!options.openAiApiKey) {
      return { available: false, reason: "OPENAI_API_KEY is missing" };
    }
    return {
      available: true,
      generator: createOpenAiGenerator(options.openAiApiKey, model, options.temperature),
    };
  }

  if (!options.geminiApiKey) {
    return { available: false, reason: "GEMINI_API_KEY is missing" };
  }
  return {
    available: true,
    generator: createGeminiGenerator(options.geminiApiKey, model, options.temperature),
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
