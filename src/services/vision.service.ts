import OpenAI from "openai";
import type { Chat } from "openai/resources";
import { logger } from "../utils/logger";
import { retry, statusOf } from "../utils/retry";
import { VisionErrors } from "../errors";
import { LOG_MESSAGES, LOG_SOURCES } from "../constants/log";
import { VISION_CONFIG, VISION_MIME_TYPES } from "../constants/vision";
import { MENU_EXTRACTION_SYSTEM_PROMPT, buildMenuExtractionUserPrompt } from "../prompts/menu-extraction.prompt";
import { VisionCallOptions, VisionCapability, VisionItem, VisionRequest, VisionResponse } from "../types/vision.types";

export interface OpenAIVisionOptions {
  apiKey?: string;
  model?: string;
  retries?: number;
  retryDelayMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class OpenAIVisionService implements VisionCapability {
  constructor(private readonly options: OpenAIVisionOptions = {}) {}

  private getOpenAIClient(): OpenAI {
    const apiKey = this.options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new VisionErrors.ApiKeyMissingError();
    }

    return new OpenAI({ apiKey });
  }

  async extract(request: VisionRequest, call?: VisionCallOptions): Promise<VisionResponse> {
    const client = this.getOpenAIClient();
    const meta = { mimeType: request.mimeType, page: request.pageNumber, bytes: request.data.length };

    logger.info(LOG_SOURCES.VISION, LOG_MESSAGES.VISION_REQUEST_STARTED, meta);

    const content = await retry(() => this.complete(client, request, call), {
      retries: this.options.retries ?? VISION_CONFIG.RETRIES,
      delay: this.options.retryDelayMs ?? VISION_CONFIG.RETRY_DELAY_MS,
      onRetry: (error, attempt) => {
        logger.warn(LOG_SOURCES.VISION, LOG_MESSAGES.VISION_RATE_LIMITED, { ...meta, attempt, error });
      }
    });

    const response = this.toResponse(content);
    logger.info(LOG_SOURCES.VISION, LOG_MESSAGES.VISION_REQUEST_SUCCESSFUL, {
      ...meta,
      kind: response.kind,
      items: response.kind === "structured" ? response.items.length : undefined
    });

    return response;
  }

  private async complete(client: OpenAI, request: VisionRequest, call?: VisionCallOptions): Promise<string> {
    const messages: Chat.ChatCompletionMessageParam[] = [
      {
        role: "system",
        content: MENU_EXTRACTION_SYSTEM_PROMPT
      },
      {
        role: "user",
        content: [
          {
            type: "text",
            text: buildMenuExtractionUserPrompt({ pageNumber: request.pageNumber, instruction: request.instruction })
          },
          this.attachmentPart(request)
        ]
      }
    ];

    const body: Chat.ChatCompletionCreateParamsNonStreaming = {
      model: this.options.model ?? VISION_CONFIG.DEFAULT_MODEL,
      messages,
      response_format: { type: "json_object" },
      temperature: VISION_CONFIG.TEMPERATURE,
      max_completion_tokens: VISION_CONFIG.MAX_OUTPUT_TOKENS
    };

    try {
      const response = call
        ? await client.chat.completions.create(body, {
            signal: call.signal,
            ...(call.timeoutMs !== undefined ? { timeout: call.timeoutMs } : {})
          })
        : await client.chat.completions.create(body);

      const content = response.choices[0]?.message.content;
      if (!content || content.trim().length === 0) {
        throw new VisionErrors.InvalidResponseError({ page: request.pageNumber });
      }
      return content;
    } catch (error) {
      if (statusOf(error) === 429) {
        throw new VisionErrors.RateLimitedError({ page: request.pageNumber });
      }
      throw error;
    }
  }

  private attachmentPart(request: VisionRequest): Chat.ChatCompletionContentPart {
    const dataUrl = `data:${request.mimeType};base64,${request.data.toString("base64")}`;

    if (request.mimeType === VISION_MIME_TYPES.PDF) {
      return {
        type: "file",
        file: { filename: "menu.pdf", file_data: dataUrl }
      };
    }

    return {
      type: "image_url",
      image_url: { url: dataUrl, detail: "high" }
    };
  }

  /**
   * JSON with an items array is a structured response; anything else the
   * model sent back is kept as free text.
   */
  private toResponse(content: string): VisionResponse {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      logger.debug(LOG_SOURCES.VISION, LOG_MESSAGES.VISION_TEXT_FALLBACK, { length: content.length });
      return { kind: "text", text: content };
    }

    if (isRecord(parsed) && Array.isArray(parsed.items)) {
      const items: VisionItem[] = parsed.items.filter(isRecord);
      return { kind: "structured", items };
    }

    logger.debug(LOG_SOURCES.VISION, LOG_MESSAGES.VISION_TEXT_FALLBACK, { length: content.length });
    return { kind: "text", text: content };
  }
}
