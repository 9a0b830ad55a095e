export type QueryParams = Record<string, string>;

// application/x-www-form-urlencoded, so "+" decodes to a space and a segment
// without "=" maps to an empty value. Malformed escapes are kept as written.
// Keys become own properties, "__proto__" included.
export function decodeQuery(queryString: string | undefined): QueryParams {
  if (!queryString) {
    return {};
  }
  return Object.fromEntries(new URLSearchParams(queryString));
}

export function encodeQuery(params: QueryParams): string {
  return new URLSearchParams(params).toString();
}

export function splitRequestUrl(url: string): {
  path: string;
  queryString: string;
} {
  const queryStart = url.indexOf("?");
  if (queryStart === -1) {
    return { path: url, queryString: "" };
  }
  return {
    path: url.slice(0, queryStart),
    queryString: url.slice(queryStart + 1),
  };
}
