import type HttpResponse from "../response";

const decoder = new TextDecoder("utf-8");

function headerLines(headers: Headers): string[] {
  const lines: string[] = [];
  headers.forEach((value, name) => {
    lines.push(`${name}: ${value}`);
  });
  return lines;
}

function bodyText(body: string | Uint8Array | undefined): string {
  if (body === undefined) {
    return "";
  }
  return typeof body === "string" ? body : decoder.decode(body);
}

/**
 * Formats the elapsed time of an execution as `end - start`.
 */
export function formatSummary(startedAt?: Date, endedAt?: Date): string {
  if (!startedAt || !endedAt) {
    return "Summary: not executed";
  }
  const cost = endedAt.getTime() - startedAt.getTime();
  return `Summary: start at ${startedAt.toISOString()}, end at ${endedAt.toISOString()}, cost ${cost}ms`;
}

/**
 * Renders a request/response exchange in an HTTP/1.1-like text layout,
 * followed by a timing summary. Reads the response body through the
 * response's cache, so the exchange is never re-executed.
 */
export async function dumpExchange(response: HttpResponse): Promise<string> {
  const { wire, request } = response;
  const target = `${wire.url.pathname}${wire.url.search}`;

  const requestPart = [
    `${wire.method} ${target} HTTP/1.1`,
    `host: ${wire.url.host}`,
    ...headerLines(wire.headers),
    "",
    bodyText(wire.body),
  ];

  const responsePart = [
    `HTTP/1.1 ${response.status} ${response.statusText}`.trimEnd(),
    ...headerLines(response.headers),
    "",
    await response.text(),
  ];

  return [
    ...requestPart,
    ...responsePart,
    formatSummary(request.startedAt, request.endedAt),
  ].join("\n");
}
