/**
 * Tagline suggestions for banner subtitles.
 *
 * With a MODEL_ID, asks Claude via Bedrock InvokeModel with a forced
 * tool_use so the answer is structured JSON. Without one, or when the call
 * fails, answers from a small offline table.
 */

import { BedrockRuntimeClient, InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import { z } from "zod";

const FALLBACK_TAGLINES: Readonly<Record<string, readonly string[]>> = {
  bannerforge: ["Forge Your Visual Identity", "Create. Design. Deploy.", "Professional Banners Made Simple"],
  default: ["See What Others Miss", "Innovation Through Design", "Crafted with Precision"],
};

export interface SuggestOptions {
  /** Bedrock model ID; when absent the offline table is used */
  modelId?: string;
  region?: string;
  /** Injected for tests and for sharing one client across calls */
  client?: Pick<BedrockRuntimeClient, "send">;
}

/**
 * Deterministic suggestions: the first table key contained in the text
 * (case and punctuation ignored) wins, otherwise the default list.
 */
export function fallbackTaglines(text: string, count: number): string[] {
  const normalized = text.toLowerCase().replace(/[^a-z0-9]/g, "");
  const key = Object.keys(FALLBACK_TAGLINES).find((k) => k !== "default" && normalized.includes(k)) ?? "default";
  return FALLBACK_TAGLINES[key].slice(0, Math.max(0, count));
}

const responseSchema = z.object({
  content: z.array(z.object({ type: z.string(), input: z.unknown().optional() })),
});

const taglinesSchema = z.object({
  taglines: z.array(z.string()),
});

async function invokeTaglines(
  client: Pick<BedrockRuntimeClient, "send">,
  modelId: string,
  text: string,
  count: number
): Promise<string[]> {
  const response = await client.send(
    new InvokeModelCommand({
      modelId,
      contentType: "application/json",
      accept: "application/json",
      body: JSON.stringify({
        anthropic_version: "bedrock-2023-05-31",
        max_tokens: 512,
        system: "You write short, punchy taglines for banner subtitles. Each tagline is at most 40 characters.",
        messages: [{ role: "user", content: `Suggest ${count} taglines for a banner titled "${text}".` }],
        tool_choice: { type: "tool", name: "respond" },
        tools: [
          {
            name: "respond",
            description: "Return the tagline suggestions",
            input_schema: {
              type: "object",
              properties: {
                taglines: {
                  type: "array",
                  items: { type: "string" },
                  description: "Tagline suggestions, best first",
                },
              },
              required: ["taglines"],
            },
          },
        ],
      }),
    })
  );

  const result = responseSchema.parse(JSON.parse(new TextDecoder().decode(response.body)));

  // Search by type: Claude may emit a text block before the tool call
  const toolUse = result.content.find((block) => block.type === "tool_use");
  if (!toolUse) {
    throw new Error("Model did not return a tool_use block");
  }
  return taglinesSchema
    .parse(toolUse.input)
    .taglines.map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, count);
}

export async function suggestTaglines(text: string, count: number, options: SuggestOptions = {}): Promise<string[]> {
  const { modelId } = options;
  if (!modelId) {
    return fallbackTaglines(text, count);
  }

  const client = options.client ?? new BedrockRuntimeClient({ region: options.region });
  try {
    const taglines = await invokeTaglines(client, modelId, text, count);
    if (taglines.length > 0) {
      return taglines;
    }
    console.warn("[suggest] Model returned no taglines, using offline suggestions");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[suggest] Tagline request failed: ${reason}. Using offline suggestions`);
  }
  return fallbackTaglines(text, count);
}
