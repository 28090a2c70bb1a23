import axios from "axios";
import { logger } from "../utils/logger";
import { FetchErrors } from "../errors";
import { LOG_SOURCES, LOG_MESSAGES } from "../constants/log";
import { PIPELINE_DEFAULTS } from "../constants/pipeline";
import { Resource } from "../types/menu.types";

export interface ResourceSpec {
  url: string;
  hint?: string;
  menuName?: string;
  location?: string;
}

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export class FetchService {
  constructor(private readonly timeoutMs: number = PIPELINE_DEFAULTS.FETCH_TIMEOUT_MS) {}

  async fetchResource(spec: ResourceSpec): Promise<Resource> {
    const { url } = spec;
    try {
      logger.info(LOG_SOURCES.FETCH, LOG_MESSAGES.FETCH_STARTED, { url });

      const response = await axios.get<ArrayBuffer>(url, {
        responseType: "arraybuffer",
        headers: {
          "User-Agent": USER_AGENT,
          Accept: "text/html,application/pdf,image/*;q=0.9,*/*;q=0.8"
        },
        timeout: this.timeoutMs
      });

      const bytes = Buffer.from(response.data);
      if (bytes.length === 0) {
        logger.warn(LOG_SOURCES.FETCH, LOG_MESSAGES.EMPTY_RESPONSE_BODY, { url });
        throw new FetchErrors.EmptyBodyError({ url });
      }

      const header = response.headers["content-type"];
      const contentType = typeof header === "string" ? header : "";

      logger.info(LOG_SOURCES.FETCH, LOG_MESSAGES.FETCH_SUCCESSFUL, { url, size: bytes.length, contentType });

      return {
        bytes,
        contentType,
        url,
        ...(spec.hint !== undefined ? { hint: spec.hint } : {}),
        ...(spec.menuName !== undefined ? { menuName: spec.menuName } : {}),
        ...(spec.location !== undefined ? { location: spec.location } : {})
      };
    } catch (error) {
      if (error instanceof FetchErrors.EmptyBodyError) {
        throw error;
      }

      if (axios.isAxiosError(error)) {
        logger.error(LOG_SOURCES.FETCH, LOG_MESSAGES.FETCH_FAILED, { url, reason: error.message });
        throw new FetchErrors.FetchFailedError({ url, reason: error.message, status: error.response?.status });
      }

      const reason = error instanceof Error ? error.message : String(error);
      logger.error(LOG_SOURCES.FETCH, LOG_MESSAGES.FETCH_FAILED, { url, reason });
      throw new FetchErrors.FetchFailedError({ url, reason });
    }
  }
}
