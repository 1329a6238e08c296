export interface StaticAsset {
  /** File contents */
  body: ArrayBuffer;
  /** HTTP content-type header value */
  contentType: string;
  /** Strong ETag for conditional requests */
  etag: string;
  /** Cache-Control header value */
  cacheControl: string;
}

/** URL path (e.g. `/assets/index-abc123.js`) to asset */
export type AssetMap = Record<string, StaticAsset>;
