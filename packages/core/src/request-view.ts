export type MultiValue = string | readonly string[] | undefined;

export type MultiMap = Readonly<Record<string, MultiValue>>;

/**
 * Read-only projection of an HTTP request. Header names are lower-case;
 * the body is never needed.
 */
export interface RequestView {
  readonly path: string;
  readonly method: string;
  readonly headers: MultiMap;
  readonly query: MultiMap;
  readonly accept: string | null;
}

export interface RequestViewInput {
  /** Request target; a query string here is parsed when `query` is absent. */
  url: string;
  method: string;
  headers?: MultiMap;
  query?: MultiMap;
}

export function firstValue(value: MultiValue): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  return value[0];
}

function lowerCaseKeys(headers: MultiMap): Record<string, MultiValue> {
  const result: Record<string, MultiValue> = {};
  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    const existing = result[key];
    if (existing === undefined || value === undefined) {
      result[key] = existing ?? value;
      continue;
    }
    result[key] = [...toArray(existing), ...toArray(value)];
  }
  return result;
}

function toArray(value: string | readonly string[]): readonly string[] {
  return typeof value === 'string' ? [value] : value;
}

function parseQuery(search: string): Record<string, MultiValue> {
  const result: Record<string, MultiValue> = {};
  for (const [key, value] of new URLSearchParams(search)) {
    const existing = result[key];
    result[key] = existing === undefined ? value : [...toArray(existing), value];
  }
  return result;
}

export function createRequestView(input: RequestViewInput): RequestView {
  const queryIndex = input.url.indexOf('?');
  const path = queryIndex === -1 ? input.url : input.url.slice(0, queryIndex);
  const search = queryIndex === -1 ? '' : input.url.slice(queryIndex + 1);
  const headers = lowerCaseKeys(input.headers ?? {});
  const accept = headers.accept;

  return Object.freeze({
    path: path.length > 0 ? path : '/',
    method: input.method.toUpperCase(),
    headers: Object.freeze(headers),
    query: Object.freeze(input.query ? { ...input.query } : parseQuery(search)),
    accept: accept === undefined ? null : toArray(accept).join(', ')
  });
}

/** First non-empty value of a header, trimmed. */
export function headerValue(request: RequestView, name: string): string | undefined {
  const value = request.headers[name.toLowerCase()];
  if (value === undefined) return undefined;
  for (const entry of toArray(value)) {
    const trimmed = entry.trim();
    if (trimmed.length > 0) return trimmed;
  }
  return undefined;
}
