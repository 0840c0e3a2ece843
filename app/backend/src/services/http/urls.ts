export type QueryParams = Readonly<Record<string, string>>;

/**
 * Returns the value of the first key present in `query`, trying `names` in
 * order. Empty values count as absent.
 */
export function arg(query: QueryParams, fallback: string, ...names: string[]): string;
export function arg(query: QueryParams, fallback: undefined, ...names: string[]): string | undefined;
export function arg(query: QueryParams, fallback: string | undefined, ...names: string[]) {
  for (const name of names) {
    const value = query[name];
    if (value) {
      return value;
    }
  }
  return fallback;
}

/** True when the value looks like an absolute http(s) URL. */
export const isSchemeLike = (value: string): boolean => /^https?:\/\//i.test(value);

export const flag = (query: QueryParams, name: string, fallback: boolean): boolean => {
  const value = query[name]?.trim().toLowerCase();
  if (!value) {
    return fallback;
  }
  return !['false', '0', 'no', 'off'].includes(value);
};

export const omit = (query: QueryParams, ...names: string[]): Record<string, string> =>
  Object.fromEntries(Object.entries(query).filter(([key]) => !names.includes(key)));

export const queryFrom = (search: URLSearchParams): QueryParams => Object.fromEntries(search);

/** Joins a path and query, dropping empty parameters and a bare `?`. */
export const buildUrl = (pathname: string, query: QueryParams = {}): string => {
  const search = new URLSearchParams(Object.entries(query).filter(([, value]) => value !== ''));
  const encoded = search.toString();
  return encoded ? `${pathname}?${encoded}` : pathname;
};

/** Removes empty query parameters from a path or absolute URL. */
export const clean = (url: string): string => {
  const index = url.indexOf('?');
  if (index === -1) {
    return url;
  }
  return buildUrl(url.slice(0, index), queryFrom(new URLSearchParams(url.slice(index + 1))));
};

export const encodePath = (value: string): string =>
  value.split('/').map(encodeURIComponent).join('/');
