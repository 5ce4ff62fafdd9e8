import { FetchError, describeError } from "../utils/pipeline-errors.js";

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/145.0.0.0 Safari/537.36";

export interface FetchOptions {
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export interface FetchedPage {
  html: string;
  finalUrl: string;
  charset: string;
}

const CHARSET_SNIFF_BYTES = 2048;
const META_CHARSET_PATTERN = /<meta[^>]+charset\s*=\s*["']?([\w-]+)/i;
const HEADER_CHARSET_PATTERN = /charset\s*=\s*["']?([\w-]+)/i;

/**
 * Header charset first, then a `<meta>` declaration near the top of the
 * document, then UTF-8.
 */
export const detectCharset = (contentType: string | null, body: Uint8Array): string => {
  const fromHeader = contentType ? HEADER_CHARSET_PATTERN.exec(contentType)?.[1] : undefined;
  if (fromHeader) {
    return fromHeader.toLowerCase();
  }

  const head = Buffer.from(body.subarray(0, CHARSET_SNIFF_BYTES)).toString("latin1");
  const fromMeta = META_CHARSET_PATTERN.exec(head)?.[1];
  if (fromMeta) {
    return fromMeta.toLowerCase();
  }

  return "utf-8";
};

// Unknown charset labels make the constructor throw; those pages decode as UTF-8.
const createDecoder = (charset: string) => {
  try {
    return new TextDecoder(charset);
  } catch {
    return new TextDecoder("utf-8");
  }
};

export const decodeBody = (body: Uint8Array, charset: string): string =>
  createDecoder(charset).decode(body);

/**
 * Single GET with a timeout. Non-2xx, abort and network failures all surface
 * as {@link FetchError}; there is no retry here, the next scheduled run is
 * the retry.
 */
export const fetchBytes = async (
  url: string,
  accept: string,
  options: FetchOptions
): Promise<{ body: Uint8Array; response: Response }> => {
  const fetchImpl = options.fetchImpl ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      headers: {
        "User-Agent": BROWSER_USER_AGENT,
        Accept: accept
      },
      signal: AbortSignal.timeout(options.timeoutMs)
    });
  } catch (error) {
    const reason =
      error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")
        ? `timed out after ${options.timeoutMs}ms`
        : describeError(error);
    throw new FetchError(url, reason, null, error);
  }

  if (!response.ok) {
    throw new FetchError(url, `HTTP ${response.status}`, response.status);
  }

  try {
    return { body: new Uint8Array(await response.arrayBuffer()), response };
  } catch (error) {
    throw new FetchError(url, `body read failed: ${describeError(error)}`, response.status, error);
  }
};

export const fetchStationPage = async (
  url: string,
  options: FetchOptions
): Promise<FetchedPage> => {
  const { body, response } = await fetchBytes(
    url,
    "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    options
  );

  const charset = detectCharset(response.headers.get("content-type"), body);

  return {
    html: decodeBody(body, charset),
    finalUrl: response.url || url,
    charset
  };
};
