import { LolqaError, errorMessage } from "@lolqa/core";

export const USER_AGENT = "Mozilla/5.0 (compatible; lolqa-collector/0.1)";

async function request(url: string, opts: { timeoutMs: number; headers?: Record<string, string> }) {
  let res: Response;
  try {
    res = await fetch(url, {
      headers: { "user-agent": USER_AGENT, ...opts.headers },
      signal: AbortSignal.timeout(opts.timeoutMs),
    });
  } catch (err) {
    throw new LolqaError(`GET ${url} failed: ${errorMessage(err)}`, { cause: err });
  }
  if (!res.ok) {
    throw new LolqaError(`GET ${url} failed: ${res.status} ${res.statusText}`);
  }
  return res;
}

export async function fetchJson(
  url: string,
  opts: { timeoutMs: number; headers?: Record<string, string> }
): Promise<unknown> {
  const res = await request(url, opts);
  return res.json();
}

export async function fetchText(
  url: string,
  opts: { timeoutMs: number; headers?: Record<string, string> }
): Promise<string> {
  const res = await request(url, opts);
  return res.text();
}
