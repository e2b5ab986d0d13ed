/**
 * 원문 문서(PDF / HTML) 수집
 * - HTTP 오류 / 네트워크 오류는 FetchSourceError 로 감싼다
 * - HTML 은 Content-Type 또는 <meta> 의 charset 으로 디코딩 (Shift_JIS 페이지가 많다)
 * - iframeFirst: 본문이 iframe 안에 있는 고시 페이지는 iframe 문서를 가져온다
 */

import * as cheerio from 'cheerio';

export type FetchSourceErrorCode = 'FETCH_FAILED' | 'UNEXPECTED_CONTENT' | `HTTP_ERROR_${number}`;

export class FetchSourceError extends Error {
  constructor(
    public code: FetchSourceErrorCode,
    message: string,
    public url?: string,
    public status?: number
  ) {
    super(message);
    this.name = 'FetchSourceError';
  }
}

export type FetchOptions = {
  timeoutMs?: number;
};

export type FetchHtmlResult = {
  html: string;
  url: string;
  fetchedAt: string;
};

const DEFAULT_TIMEOUT_MS = 30000;

const REQUEST_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Accept-Language': 'ja,en-US;q=0.8,en;q=0.6',
};

async function request(url: string, accept: string, options: FetchOptions): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, {
      redirect: 'follow',
      headers: { ...REQUEST_HEADERS, Accept: accept },
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (error) {
    throw new FetchSourceError(
      'FETCH_FAILED',
      `Failed to fetch ${url}: ${error instanceof Error ? error.message : String(error)}`,
      url
    );
  }

  if (!response.ok) {
    throw new FetchSourceError(
      `HTTP_ERROR_${response.status}`,
      `HTTP ${response.status} ${response.statusText}`,
      url,
      response.status
    );
  }

  return response;
}

/**
 * PDF 등 바이너리 문서 다운로드
 */
export async function fetchDocumentBytes(url: string, options: FetchOptions = {}): Promise<Uint8Array> {
  const response = await request(url, 'application/pdf,*/*;q=0.8', options);
  const bytes = new Uint8Array(await response.arrayBuffer());
  if (bytes.length === 0) {
    throw new FetchSourceError('UNEXPECTED_CONTENT', `Empty response body from ${url}`, url, response.status);
  }
  return bytes;
}

/**
 * charset 판별: Content-Type 헤더 → <meta charset> → <meta http-equiv> → utf-8
 */
export function detectCharset(contentType: string | null, head: string): string {
  const fromHeader = contentType?.match(/charset=["']?([\w-]+)/i);
  if (fromHeader) return fromHeader[1].toLowerCase();

  const fromMeta = head.match(/<meta[^>]+charset=["']?([\w-]+)/i);
  if (fromMeta) return fromMeta[1].toLowerCase();

  return 'utf-8';
}

export function decodeHtml(bytes: Uint8Array, contentType: string | null): string {
  // meta 태그 탐색용으로 앞부분만 latin1 로 읽는다
  const head = new TextDecoder('latin1').decode(bytes.subarray(0, 2048));
  const charset = detectCharset(contentType, head);
  try {
    return new TextDecoder(charset).decode(bytes);
  } catch (error) {
    if (error instanceof RangeError) {
      console.warn(`[Fetch] Unsupported charset "${charset}", decoding as utf-8`);
      return new TextDecoder('utf-8').decode(bytes);
    }
    throw error;
  }
}

async function fetchHtmlOnce(url: string, options: FetchOptions): Promise<string> {
  const response = await request(url, 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8', options);
  const bytes = new Uint8Array(await response.arrayBuffer());
  return decodeHtml(bytes, response.headers.get('content-type'));
}

export function findIframeUrl(html: string, baseUrl: string): string | null {
  const $ = cheerio.load(html);
  const src = $('iframe[src]').first().attr('src');
  if (!src) return null;
  return new URL(src, baseUrl).toString();
}

export async function fetchHtmlDocument(
  url: string,
  options: FetchOptions & { iframeFirst?: boolean } = {}
): Promise<FetchHtmlResult> {
  const outer = await fetchHtmlOnce(url, options);

  if (options.iframeFirst) {
    const innerUrl = findIframeUrl(outer, url);
    if (innerUrl) {
      console.log(`[Fetch] Following iframe: ${innerUrl}`);
      return { html: await fetchHtmlOnce(innerUrl, options), url: innerUrl, fetchedAt: new Date().toISOString() };
    }
  }

  return { html: outer, url, fetchedAt: new Date().toISOString() };
}
