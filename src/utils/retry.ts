/**
 * Retry utility with exponential backoff
 * Retries failed operations with increasing delays between attempts
 * Only retries on network errors, throttling (429) or 5xx server errors
 */

import axios from "axios";
import { VisionErrors } from "../errors";

export interface RetryOptions {
  retries?: number;
  delay?: number;
  factor?: number;
  onRetry?: (error: unknown, attempt: number) => void;
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { retries = 3, delay = 300, factor = 2, onRetry } = options;
  
  let lastError: unknown;
  
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      
      // Don't retry on last attempt
      if (attempt === retries) {
        break;
      }
      
      if (!shouldRetry(error)) {
        throw error;
      }

      onRetry?.(error, attempt + 1);
      
      const backoffDelay = delay * Math.pow(factor, attempt);
      await new Promise(resolve => setTimeout(resolve, backoffDelay));
    }
  }
  
  throw lastError;
}

export function statusOf(error: unknown): number | undefined {
  if (error && typeof error === "object" && "status" in error) {
    const status = error.status;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

/**
 * Determines if an error should trigger a retry
 */
export function shouldRetry(error: unknown): boolean {
  if (error instanceof VisionErrors.RateLimitedError) {
    return true;
  }

  if (axios.isAxiosError(error)) {
    // Network errors (no response)
    if (!error.response) {
      return true;
    }
    
    if (error.response.status === 429 || error.response.status >= 500) {
      return true;
    }
    
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.code === 'ENOTFOUND') {
      return true;
    }
  }
  
  // OpenAI API errors carry the HTTP status
  const status = statusOf(error);
  if (status !== undefined && (status === 429 || status >= 500)) {
    return true;
  }
  
  return false;
}
