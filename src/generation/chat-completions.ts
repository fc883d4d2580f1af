/**
 * Story generator backed by an OpenAI-compatible chat completions endpoint.
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { GeneratorConfig } from "../config/index.js";
import { createQuietLogger, type Logger } from "../logging/index.js";
import {
  parseStoryText,
  type GeneratedStory,
  type StoryGenerator,
  type StoryRequest,
} from "./story.js";

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

export class ChatCompletionsGenerator implements StoryGenerator {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: GeneratorConfig,
    private readonly logger: Logger = createQuietLogger("generator"),
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create({ baseURL: config.baseUrl, timeout: config.timeoutMs });
  }

  async generate(request: StoryRequest): Promise<GeneratedStory> {
    if (!this.config.apiKey) {
      throw new Error("LLM_API_KEY is not set");
    }

    this.logger.debug("Requesting story", { pmid: request.pmid, model: this.config.model });

    const response = await this.http.post<unknown>(
      "/chat/completions",
      {
        model: this.config.model,
        messages: [{ role: "user", content: request.promptText }],
        response_format: { type: "json_object" },
      },
      { headers: { Authorization: `Bearer ${this.config.apiKey}` } }
    );

    const parsed = ChatCompletionSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error("Unexpected chat completions response shape");
    }
    const content = parsed.data.choices[0]?.message.content ?? "";
    return parseStoryText(content, request.metadata.title || "Untitled study");
  }
}
