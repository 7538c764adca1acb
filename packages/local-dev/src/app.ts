/**
 * Node http adapter for the analyze API
 */

import { errorResponse, routeRequest, type AnalyzeDeps, type HttpResult } from "@pump-advisor/functions";

export interface IncomingRequest extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
}

export interface OutgoingResponse {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  end(body: string): unknown;
}

export class PayloadTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

export async function readBody(req: IncomingRequest, limit: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    size += buffer.length;
    if (size > limit) {
      throw new PayloadTooLargeError(limit);
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Largest JSON body accepted: the base64 archive plus room for settings
 */
export function bodyLimit(maxUploadBytes: number): number {
  return Math.ceil((maxUploadBytes * 4) / 3) + 64 * 1024;
}

export function createRequestListener(deps: AnalyzeDeps) {
  const limit = bodyLimit(deps.config.maxUploadBytes);

  return async (req: IncomingRequest, res: OutgoingResponse): Promise<void> => {
    const started = Date.now();
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";

    let result: HttpResult;
    try {
      const body = method === "POST" ? await readBody(req, limit) : undefined;
      result = await routeRequest(
        {
          method,
          path: url.pathname,
          query: Object.fromEntries(url.searchParams),
          body,
        },
        deps
      );
    } catch (error) {
      if (!(error instanceof PayloadTooLargeError)) throw error;
      result = errorResponse(413, "File too large");
    }

    res.writeHead(result.statusCode, result.headers);
    res.end(result.body);
    console.log(`${method} ${url.pathname} ${result.statusCode} ${Date.now() - started}ms`);
  };
}
