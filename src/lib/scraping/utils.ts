import { ProxyAgent, fetch as undiciFetch } from "undici";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpError";
  }
}

export interface RequestOptions {
  timeoutMs: number;
  userAgent: string;
}

let dispatcher: ProxyAgent | null | undefined;

function getProxyDispatcher(): ProxyAgent | undefined {
  if (dispatcher === undefined) {
    const proxyUrl =
      process.env.HTTPS_PROXY ||
      process.env.https_proxy ||
      process.env.HTTP_PROXY ||
      process.env.http_proxy;
    dispatcher = proxyUrl ? new ProxyAgent(proxyUrl) : null;
  }
  return dispatcher ?? undefined;
}

async function request(url: string, options: RequestOptions) {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const fetchOptions: Parameters<typeof undiciFetch>[1] = {
      headers: {
        "User-Agent": options.userAgent,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
      signal: controller.signal,
      dispatcher: getProxyDispatcher(),
    };
    const response = await undiciFetch(url, fetchOptions);
    return { response, timeout };
  } catch (error: unknown) {
    clearTimeout(timeout);
    if (error instanceof Error && error.name === "AbortError") {
      throw new Error(`Timed out after ${options.timeoutMs}ms: ${url}`);
    }
    throw error;
  }
}

/**
 * GET a page and return its body. Throws HttpError on a non-2xx status and
 * plain errors for timeouts and network failures. No retries.
 */
export async function fetchPage(url: string, options: RequestOptions): Promise<string> {
  const { response, timeout } = await request(url, options);
  try {
    if (!response.ok) {
      await response.body?.cancel();
      throw new HttpError(response.status, url);
    }
    return await response.text();
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * GET a URL and report only its status; the body is discarded unread.
 */
export async function fetchStatus(url: string, options: RequestOptions): Promise<number> {
  const { response, timeout } = await request(url, options);
  try {
    await response.body?.cancel();
    return response.status;
  } finally {
    clearTimeout(timeout);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
