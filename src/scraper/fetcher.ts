import { ScrapeError, describeCause } from "../errors.js";
import { extractTitle } from "./html.js";

export const USER_AGENT = "PersonalServer/1.0";
export const DEFAULT_TIMEOUT_MS = 20_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchedPage {
  finalUrl: string;
  html: string;
  title: string;
}

export interface FetchOptions {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export function charsetOf(contentType: string | null): string {
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType ?? "");
  return match?.[1]?.toLowerCase() ?? "utf-8";
}

function decodeBody(bytes: ArrayBuffer, charset: string): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    // Unknown label
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(bytes);
}

export async function fetchUrl(url: string, opts: FetchOptions = {}): Promise<FetchedPage> {
  const fetchImpl = opts.fetchImpl ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      headers: { "User-Agent": USER_AGENT },
      redirect: "follow",
      signal: AbortSignal.timeout(opts.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (err) {
    throw new ScrapeError(describeCause(err));
  }

  if (!response.ok) {
    throw new ScrapeError(`HTTP ${response.status} from ${url}`);
  }

  let bytes: ArrayBuffer;
  try {
    bytes = await response.arrayBuffer();
  } catch (err) {
    throw new ScrapeError(describeCause(err));
  }

  const html = decodeBody(bytes, charsetOf(response.headers.get("content-type")));
  return { finalUrl: response.url || url, html, title: extractTitle(html) };
}
