import { describe, expect, test, vi } from "vitest";
import {
  MediaWikiClient,
  NetworkError,
  ProtocolError,
  fetchPageHistory,
  requirePageHistory,
  PageNotFoundError,
  DEFAULT_CONFIG,
} from "../packages/core/src/index.js";

const API_URL = "https://en.wikipedia.org/w/api.php";

function createClient(timeoutMs = 1000): MediaWikiClient {
  return new MediaWikiClient({ apiUrl: API_URL, userAgent: "test-agent/0.1", timeoutMs });
}

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

function stubFetch(impl: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("MediaWikiClient", () => {
  test("buildUrl adds format parameters and skips undefined values", () => {
    const url = createClient().buildUrl({ action: "query", titles: "Test Page", rvprop: "timestamp|user", rvcontinue: undefined });
    expect(url).toBe(
      "https://en.wikipedia.org/w/api.php?format=json&formatversion=2&action=query&titles=Test+Page&rvprop=timestamp%7Cuser"
    );
  });

  test("sends one GET with the configured headers and returns parsed JSON", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ batchcomplete: true }));

    const result = await createClient().get({ action: "query" });

    expect(result).toEqual({ batchcomplete: true });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://en.wikipedia.org/w/api.php?format=json&formatversion=2&action=query");
    expect(init?.headers).toEqual({ "User-Agent": "test-agent/0.1", Accept: "application/json" });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  test("reports the URL before sending", async () => {
    stubFetch(async () => jsonResponse({}));
    const seen: string[] = [];
    const client = new MediaWikiClient({
      apiUrl: API_URL,
      userAgent: "test-agent/0.1",
      timeoutMs: 1000,
      onRequest: (url) => seen.push(url),
    });

    await client.get({ action: "query" });
    expect(seen).toEqual(["https://en.wikipedia.org/w/api.php?format=json&formatversion=2&action=query"]);
  });

  test("maps transport failures to NetworkError without retrying", async () => {
    const fetchMock = stubFetch(async () => {
      throw new TypeError("fetch failed", { cause: new Error("getaddrinfo ENOTFOUND en.wikipedia.org") });
    });

    const request = createClient().get({ action: "query" });
    await expect(request).rejects.toBeInstanceOf(NetworkError);
    await expect(request).rejects.toThrow("fetch failed (getaddrinfo ENOTFOUND en.wikipedia.org)");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test("maps non-2xx statuses to NetworkError without retrying", async () => {
    const fetchMock = stubFetch(async () =>
      new Response("busy", { status: 503, statusText: "Service Unavailable" })
    );

    await expect(createClient().get({ action: "query" })).rejects.toThrow(
      new NetworkError("HTTP 503: Service Unavailable")
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test("maps a non-JSON body to ProtocolError", async () => {
    stubFetch(async () => new Response("<html>oops</html>", { status: 200 }));

    const request = createClient().get({ action: "query" });
    await expect(request).rejects.toBeInstanceOf(ProtocolError);
    await expect(request).rejects.toThrow("Invalid response from Wikipedia API (not JSON)");
  });

  test("aborts after the timeout and reports a NetworkError", async () => {
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const error = new Error("This operation was aborted");
            error.name = "AbortError";
            reject(error);
          });
        })
    );

    await expect(createClient(5).get({ action: "query" })).rejects.toThrow("Request timed out after 5ms");
  });
});

describe("fetchPageHistory", () => {
  test("requests the revision query and interprets the result", async () => {
    const fetchMock = stubFetch(async () =>
      jsonResponse({
        query: {
          pages: [{ pageid: 1, title: "Test Page", revisions: [{ user: "A", timestamp: "2023-09-23T17:28:39Z" }] }],
        },
      })
    );

    const history = await fetchPageHistory("Test Page", { ...DEFAULT_CONFIG, limit: 7 });

    expect(history).toEqual({
      kind: "found",
      title: "Test Page",
      revisions: [{ timestamp: "2023-09-23T17:28:39Z", editor: "A" }],
    });
    const params = new URL(fetchMock.mock.calls[0][0]).searchParams;
    expect(params.get("titles")).toBe("Test Page");
    expect(params.get("prop")).toBe("revisions");
    expect(params.get("rvprop")).toBe("timestamp|user");
    expect(params.get("rvlimit")).toBe("7");
    expect(params.get("rvdir")).toBe("older");
    expect(params.get("redirects")).toBe("1");
    expect(params.get("format")).toBe("json");
  });

  test("requirePageHistory raises PageNotFoundError for a missing page", async () => {
    stubFetch(async () => jsonResponse({ query: { pages: [{ ns: 0, title: "Nowhere", missing: true }] } }));

    const request = requirePageHistory("Nowhere", DEFAULT_CONFIG);
    await expect(request).rejects.toBeInstanceOf(PageNotFoundError);
    await expect(request).rejects.toThrow('No Wikipedia page found for "Nowhere"');
  });
});
