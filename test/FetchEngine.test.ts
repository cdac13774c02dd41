import { FetchEngine, FetchEngineHttpError } from "../src/FetchEngine.js";
import { OrgConversionError } from "../src/errors.js";
import { vi, describe, it, expect, beforeEach, afterAll } from "vitest";

// Mock global fetch
const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

const MOCK_URL = "http://example.com/docs/";
const PAGE = '<html><head><title>Test</title></head><body><a href="/about">About</a></body></html>';

function mockResponse(overrides: { ok?: boolean; status?: number; contentType?: string; body?: string; url?: string } = {}) {
  return {
    ok: overrides.ok ?? true,
    status: overrides.status ?? 200,
    headers: new Headers({ "Content-Type": overrides.contentType ?? "text/html; charset=utf-8" }),
    text: async () => overrides.body ?? PAGE,
    url: overrides.url ?? MOCK_URL,
  };
}

afterAll(() => {
  vi.unstubAllGlobals();
});

describe("FetchEngine - Headers", () => {
  const DEFAULT_BASE_HEADERS = {
    "User-Agent":
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36",
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.9",
  };

  beforeEach(() => {
    mockFetch.mockReset();
    mockFetch.mockResolvedValue(mockResponse());
  });

  it("should use default headers if no custom headers are provided", async () => {
    const engine = new FetchEngine();
    await engine.fetchHTML(MOCK_URL);
    expect(mockFetch).toHaveBeenCalledWith(MOCK_URL, { redirect: "follow", headers: DEFAULT_BASE_HEADERS });
  });

  it("should merge constructor headers with defaults", async () => {
    const constructorHeaders = { "X-Custom-Header": "constructor-value", "User-Agent": "CustomConstructorAgent/1.0" };
    const engine = new FetchEngine({ headers: constructorHeaders });
    await engine.fetchHTML(MOCK_URL);
    expect(mockFetch).toHaveBeenCalledWith(
      MOCK_URL,
      expect.objectContaining({ headers: { ...DEFAULT_BASE_HEADERS, ...constructorHeaders } })
    );
  });

  it("should merge fetchHTML options headers with defaults", async () => {
    const fetchOptionsHeaders = { "X-Fetch-Option-Header": "fetch-option-value" };
    const engine = new FetchEngine();
    await engine.fetchHTML(MOCK_URL, { headers: fetchOptionsHeaders });
    expect(mockFetch).toHaveBeenCalledWith(
      MOCK_URL,
      expect.objectContaining({ headers: { ...DEFAULT_BASE_HEADERS, ...fetchOptionsHeaders } })
    );
  });

  it("should use fetchHTML options headers, overriding constructor headers", async () => {
    const constructorHeaders = { "X-Constructor-Header": "constructor-val", "User-Agent": "ConstructorAgent" };
    const fetchOptionsHeaders = { "X-Fetch-Header": "fetch-val", "User-Agent": "FetchAgent" };
    const engine = new FetchEngine({ headers: constructorHeaders });
    await engine.fetchHTML(MOCK_URL, { headers: fetchOptionsHeaders });

    expect(mockFetch).toHaveBeenCalledWith(
      MOCK_URL,
      expect.objectContaining({
        headers: {
          ...DEFAULT_BASE_HEADERS,
          "X-Constructor-Header": "constructor-val",
          "X-Fetch-Header": "fetch-val",
          "User-Agent": "FetchAgent",
        },
      })
    );
  });

  it("should not carry call headers over to the next call", async () => {
    const engine = new FetchEngine();
    await engine.fetchHTML(MOCK_URL, { headers: { Authorization: "Bearer test-secret" } });
    await engine.fetchHTML(MOCK_URL);
    expect(mockFetch).toHaveBeenLastCalledWith(MOCK_URL, expect.objectContaining({ headers: DEFAULT_BASE_HEADERS }));
  });
});

describe("FetchEngine - Content", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("should return the raw HTML and its title by default", async () => {
    mockFetch.mockResolvedValue(mockResponse());
    const result = await new FetchEngine().fetchHTML(MOCK_URL);

    expect(result).toEqual({ content: PAGE, contentType: "html", title: "Test", url: MOCK_URL, statusCode: 200 });
  });

  it("should convert to Org relative to the final URL", async () => {
    mockFetch.mockResolvedValue(mockResponse());
    const result = await new FetchEngine({ org: true }).fetchHTML(MOCK_URL);

    expect(result.contentType).toBe("org");
    expect(result.content).toBe("#+TITLE: Test\n\n[[http://example.com/about][About]]");
  });

  it("should let the call switch Org conversion on", async () => {
    mockFetch.mockResolvedValue(mockResponse());
    const result = await new FetchEngine().fetchHTML(MOCK_URL, { org: true });
    expect(result.contentType).toBe("org");
  });

  it("should prefer a base URL from the conversion options", async () => {
    mockFetch.mockResolvedValue(mockResponse());
    const engine = new FetchEngine({ org: true, conversion: { baseUrl: "https://mirror.example.org/" } });
    const result = await engine.fetchHTML(MOCK_URL);

    expect(result.content).toBe("#+TITLE: Test\n\n[[https://mirror.example.org/about][About]]");
  });

  it("should pass the other conversion options through", async () => {
    mockFetch.mockResolvedValue(mockResponse());
    const result = await new FetchEngine({ org: true, conversion: { omitLinks: true } }).fetchHTML(MOCK_URL);
    expect(result.content).toBe("#+TITLE: Test\n\nAbout");
  });

  it("should report the redirected URL", async () => {
    mockFetch.mockResolvedValue(mockResponse({ url: "http://example.com/moved/" }));
    const result = await new FetchEngine({ org: true }).fetchHTML(MOCK_URL);

    expect(result.url).toBe("http://example.com/moved/");
    expect(result.content).toBe("#+TITLE: Test\n\n[[http://example.com/about][About]]");
  });

  it("should fall back to the requested URL when the response has none", async () => {
    mockFetch.mockResolvedValue(mockResponse({ url: "", body: '<a href="page">Page</a>' }));
    const result = await new FetchEngine({ org: true }).fetchHTML(MOCK_URL);

    expect(result.url).toBe(MOCK_URL);
    expect(result.title).toBeNull();
    expect(result.content).toBe("[[http://example.com/docs/page][Page]]");
  });
});

describe("FetchEngine - Errors", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("should throw FetchEngineHttpError for non-ok responses", async () => {
    mockFetch.mockResolvedValue(mockResponse({ ok: false, status: 404 }));
    const promise = new FetchEngine().fetchHTML(MOCK_URL);

    await expect(promise).rejects.toBeInstanceOf(FetchEngineHttpError);
    await expect(promise).rejects.toMatchObject({
      code: "ERR_HTTP_ERROR",
      statusCode: 404,
      message: "HTTP error! status: 404",
    });
  });

  it("should reject non-HTML content", async () => {
    mockFetch.mockResolvedValue(mockResponse({ contentType: "application/pdf" }));
    await expect(new FetchEngine().fetchHTML(MOCK_URL)).rejects.toMatchObject({
      code: "ERR_NON_HTML_CONTENT",
      message: "Content-Type is not text/html",
    });
  });

  it("should wrap network failures", async () => {
    mockFetch.mockRejectedValue(new Error("socket hang up"));
    const promise = new FetchEngine().fetchHTML(MOCK_URL);

    await expect(promise).rejects.toBeInstanceOf(OrgConversionError);
    await expect(promise).rejects.toMatchObject({ code: "ERR_FETCH_FAILED", message: "Fetch failed: socket hang up" });
  });

  it("should surface conversion errors unchanged", async () => {
    mockFetch.mockResolvedValue(mockResponse({ body: '<a href="http://[::1">x</a>' }));
    await expect(new FetchEngine({ org: true }).fetchHTML(MOCK_URL)).rejects.toMatchObject({
      code: "ERR_INVALID_URL",
    });
  });
});
