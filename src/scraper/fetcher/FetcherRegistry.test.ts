import { describe, expect, it, vi } from "vitest";
import { InvalidReferenceError } from "../../utils/errors";
import { FetcherRegistry } from "./FetcherRegistry";
import type { ContentFetcher } from "./types";

vi.mock("../../utils/logger");

function createFetcher(prefix: string): ContentFetcher {
  return {
    canFetch: vi.fn((source: string) => source.startsWith(prefix)),
    fetch: vi.fn(async (source: string) => ({
      content: Buffer.from(prefix),
      mimeType: "application/octet-stream",
      source,
    })),
  };
}

describe("FetcherRegistry", () => {
  it("should delegate to the first fetcher that accepts the source", async () => {
    const http = createFetcher("https://");
    const file = createFetcher("file://");
    const registry = new FetcherRegistry([http, file]);

    const result = await registry.fetch("file:///tmp/a.png", { timeout: 10 });

    expect(result.content.toString()).toBe("file://");
    expect(file.fetch).toHaveBeenCalledWith("file:///tmp/a.png", { timeout: 10 });
    expect(http.fetch).not.toHaveBeenCalled();
  });

  it("should reject an empty reference without consulting any fetcher", async () => {
    const http = createFetcher("https://");
    const registry = new FetcherRegistry([http]);

    await expect(registry.fetch("")).rejects.toBeInstanceOf(InvalidReferenceError);
    expect(http.canFetch).not.toHaveBeenCalled();
    expect(http.fetch).not.toHaveBeenCalled();
  });

  it("should reject a reference no fetcher supports", async () => {
    const registry = new FetcherRegistry([createFetcher("https://")]);

    await expect(registry.fetch("ftp://example.com/a.png")).rejects.toThrow(
      "Invalid URL: ftp://example.com/a.png. Must be an HTTP/HTTPS URL or a file:// URL.",
    );
  });

  it("should report whether any fetcher can handle a source", () => {
    const registry = new FetcherRegistry();
    expect(registry.canFetch("https://example.com")).toBe(true);
    expect(registry.canFetch("file:///tmp/x")).toBe(true);
    expect(registry.canFetch("mailto:someone@example.com")).toBe(false);
  });
});
