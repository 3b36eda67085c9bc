import http from 'node:http';
import { config } from './config.js';
import { aggregateMany, estimateValue } from './pipeline.js';
import { createEbaySoldSource } from './scrapers/ebay.js';
import type { ListingSource } from './scrapers/types.js';

const PORT = parseInt(process.env.PORT || '3000', 10);

export interface ServerOptions {
  /** When set, requests must carry `Authorization: Bearer <token>`. */
  apiToken?: string;
  defaultMaxResults?: number;
}

class BadRequestError extends Error {}

function json(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString()));
    req.on('error', reject);
  });
}

function parseMaxResults(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') return fallback;
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed <= 0) {
    throw new BadRequestError('"max_results" must be a positive integer');
  }
  return parsed;
}

function parseBatchBody(
  body: string,
  fallbackMax: number
): { queries: string[]; maxResults: number } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new BadRequestError('Body must be valid JSON');
  }
  if (typeof parsed !== 'object' || parsed === null) {
    throw new BadRequestError('Body must be a JSON object');
  }

  const queries = 'queries' in parsed ? parsed.queries : undefined;
  const maxResults = 'max_results' in parsed ? parsed.max_results : undefined;
  if (!Array.isArray(queries) || !queries.every((q): q is string => typeof q === 'string')) {
    throw new BadRequestError('Missing or invalid "queries" field');
  }
  return { queries, maxResults: parseMaxResults(maxResults, fallbackMax) };
}

export function createValuationServer(
  source: ListingSource,
  opts: ServerOptions = {}
): http.Server {
  const apiToken = opts.apiToken ?? '';
  const defaultMax = opts.defaultMaxResults ?? config.MAX_RESULTS;

  function authenticate(req: http.IncomingMessage): boolean {
    if (!apiToken) return true; // no token configured = open (dev mode)
    return req.headers.authorization === `Bearer ${apiToken}`;
  }

  async function route(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    url: URL
  ): Promise<void> {
    // GET / or /health
    if (req.method === 'GET' && (url.pathname === '/' || url.pathname === '/health')) {
      json(res, 200, { status: 'ok' });
      return;
    }

    const isValue = req.method === 'GET' && url.pathname === '/value';
    const isBatch = req.method === 'POST' && url.pathname === '/value/batch';
    if (!isValue && !isBatch) {
      json(res, 404, { error: 'Not found' });
      return;
    }

    if (!authenticate(req)) {
      json(res, 401, { error: 'Unauthorized' });
      return;
    }

    // GET /value?q=...
    if (isValue) {
      const query = url.searchParams.get('q')?.trim();
      if (!query) {
        throw new BadRequestError('Missing "q" query parameter');
      }
      const maxResults = parseMaxResults(url.searchParams.get('max_results'), defaultMax);
      json(res, 200, await estimateValue(query, { maxResults, source }));
      return;
    }

    // POST /value/batch
    const { queries, maxResults } = parseBatchBody(await readBody(req), defaultMax);
    const results = await aggregateMany(queries, maxResults, source);
    json(res, 200, { results });
  }

  return http.createServer((req, res) => {
    const url = new URL(req.url || '/', `http://localhost:${PORT}`);

    // CORS headers for frontend
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Authorization, Content-Type');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    route(req, res, url).catch((err) => {
      if (err instanceof BadRequestError) {
        json(res, 400, { error: err.message });
        return;
      }
      const msg = err instanceof Error ? err.message : String(err);
      console.error(`[server] ${req.method} ${url.pathname} failed: ${msg}`);
      json(res, 500, { error: msg });
    });
  });
}

export function startServer() {
  const server = createValuationServer(createEbaySoldSource(), {
    apiToken: process.env.VALUATION_API_TOKEN || '',
  });
  server.listen(PORT, '0.0.0.0', () => {
    console.log(`[server] Valuation HTTP server listening on port ${PORT}`);
    console.log(`[server] GET /value?q=<item> or POST /value/batch`);
  });
}
