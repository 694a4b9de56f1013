/**
 * NewsScout — Google News Link Decoding
 *
 * Google News RSS items link to `news.google.com/rss/articles/<id>`
 * redirect pages. The publisher URL is obtained in two requests:
 *
 *   1. GET the article page and read its signature and timestamp
 *      (`data-n-a-sg`, `data-n-a-ts`)
 *   2. POST them with the article id to the `batchexecute` endpoint,
 *      whose reply carries the decoded URL
 */

import { z } from 'zod';
import type { LinkResolver } from './resolver';

const GOOGLE_NEWS_HOST = 'news.google.com';
const ARTICLE_PAGE_URL = 'https://news.google.com/rss/articles/';
const BATCH_EXECUTE_URL = 'https://news.google.com/_/DotsSplashUi/data/batchexecute';
const DECODE_RPC_ID = 'Fbv4je';

const REQUEST_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (compatible; NewsScout/1.0)',
};

export interface DecodingParams {
  signature: string;
  timestamp: number;
}

/**
 * Article id of a Google News redirect link, or null for any other link.
 */
export function googleNewsArticleId(link: string): string | null {
  let url: URL;
  try {
    url = new URL(link);
  } catch {
    return null;
  }

  if (url.hostname !== GOOGLE_NEWS_HOST) return null;

  const segments = url.pathname.split('/').filter(segment => segment.length > 0);
  const marker = segments.length >= 2 ? segments[segments.length - 2] : undefined;
  const id = segments.at(-1);

  return (marker === 'articles' || marker === 'read') && id ? id : null;
}

/**
 * Read the signature and timestamp attributes from an article page.
 */
export function decodingParams(html: string): DecodingParams | null {
  const signature = /data-n-a-sg="([^"]+)"/.exec(html)?.[1];
  const timestamp = Number(/data-n-a-ts="([^"]+)"/.exec(html)?.[1]);

  if (!signature || !Number.isFinite(timestamp)) return null;
  return { signature, timestamp };
}

/**
 * Form body for the batchexecute decode call.
 */
export function buildDecodeRequestBody(articleId: string, params: DecodingParams): string {
  const request = JSON.stringify([
    'garturlreq',
    [
      ['X', 'X', ['X', 'X'], null, null, 1, 1, 'US:en', null, 1, null, null, null, null, null, 0, 1],
      'X',
      'X',
      1,
      [1, 1, 1],
      1,
      1,
      null,
      0,
      0,
      null,
      0,
    ],
    articleId,
    params.timestamp,
    params.signature,
  ]);

  return `f.req=${encodeURIComponent(JSON.stringify([[[DECODE_RPC_ID, request, null, 'generic']]]))}`;
}

const EnvelopeSchema = z.array(z.array(z.unknown())).min(1);
const DecodedPayloadSchema = z.tuple([z.literal('garturlres'), z.string().url()]).rest(z.unknown());

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pull the decoded URL out of a batchexecute reply. The reply is an
 * anti-JSON prefix, a blank line, then a JSON envelope whose first entry
 * holds the RPC payload as a JSON string.
 */
export function parseDecodeResponse(text: string): string | null {
  const body = text.split('\n\n')[1];
  if (body === undefined) return null;

  const envelope = EnvelopeSchema.safeParse(parseJson(body));
  if (!envelope.success) return null;

  const payloadText = envelope.data[0][2];
  if (typeof payloadText !== 'string') return null;

  const payload = DecodedPayloadSchema.safeParse(parseJson(payloadText));
  return payload.success ? payload.data[1] : null;
}

/**
 * Resolves Google News redirect links; any other link comes back as is
 * without a request.
 */
export class GoogleNewsLinkResolver implements LinkResolver {
  async resolve(link: string, signal: AbortSignal): Promise<string> {
    const articleId = googleNewsArticleId(link);
    if (!articleId) return link;

    const page = await fetch(`${ARTICLE_PAGE_URL}${articleId}`, { headers: REQUEST_HEADERS, signal });
    if (!page.ok) {
      throw new Error(`HTTP ${page.status} fetching article page for ${articleId}`);
    }

    const params = decodingParams(await page.text());
    if (!params) {
      throw new Error(`No decoding parameters on article page for ${articleId}`);
    }

    const response = await fetch(BATCH_EXECUTE_URL, {
      method: 'POST',
      headers: {
        ...REQUEST_HEADERS,
        'Content-Type': 'application/x-www-form-urlencoded;charset=UTF-8',
      },
      body: buildDecodeRequestBody(articleId, params),
      signal,
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} decoding ${articleId}`);
    }

    const decoded = parseDecodeResponse(await response.text());
    if (!decoded) {
      throw new Error(`Unrecognized decode response for ${articleId}`);
    }

    return decoded;
  }
}
