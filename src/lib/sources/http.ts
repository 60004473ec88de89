/**
 * HTTP access for ingestion adapters
 */

import { FetchError } from "../errors";

export interface HttpOptions {
  timeoutMs: number;
  userAgent: string;
}

export const DEFAULT_HTTP_OPTIONS: HttpOptions = {
  timeoutMs: 15000,
  userAgent: "LaborNewsBot/2.0",
};

/**
 * GET a URL and return the body text; any failure becomes a FetchError
 */
export async function fetchText(url: string, options: HttpOptions = DEFAULT_HTTP_OPTIONS): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { "User-Agent": options.userAgent },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new FetchError(url, undefined, error instanceof Error ? error.message : String(error));
  }

  if (!response.ok) {
    throw new FetchError(url, response.status, response.statusText || "request failed");
  }

  try {
    return await response.text();
  } catch (error) {
    throw new FetchError(url, response.status, `failed to read body: ${error instanceof Error ? error.message : String(error)}`);
  }
}
