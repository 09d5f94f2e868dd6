import { Logger } from '@contratos/core';

export type RecordedRequest = {
  url: string;
  headers: Headers;
};

/**
 * In-process fetch stand-in that replays queued responses in order
 */
export function stubFetch(responses: Array<() => Response | Promise<Response>>) {
  const requests: RecordedRequest[] = [];
  const impl: typeof fetch = async (input, init) => {
    requests.push({ url: String(input), headers: new Headers(init?.headers) });
    const next = responses.shift();
    if (!next) {
      throw new Error(`unexpected request to ${String(input)}`);
    }
    return next();
  };
  return { impl, requests };
}

export function jsonResponse(body: unknown, status = 200): () => Response {
  return () =>
    new Response(JSON.stringify(body), {
      status,
      headers: { 'content-type': 'application/json' },
    });
}

export function captureLogger() {
  const lines: string[] = [];
  const logger = new Logger({ format: 'json', level: 'debug', sink: (line) => lines.push(line) });
  const records = (): Array<{ level: string; msg: string; [key: string]: unknown }> =>
    lines.map((line) => JSON.parse(line));
  return { logger, records };
}

/** Local-time date at the given hour, independent of the machine timezone */
export function atHour(hour: number): () => Date {
  return () => new Date(2024, 0, 15, hour, 30, 0);
}
