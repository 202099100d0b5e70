import { describe, expect, it } from "vitest";
import { basename, imageEntryName, resolveSource } from "./url";

describe("basename", () => {
  it("should return the last path segment", () => {
    expect(basename("https://x/a.png")).toBe("a.png");
    expect(basename("https://cdn.example.com/img/2024/photo.jpg")).toBe("photo.jpg");
  });

  it("should keep the query string", () => {
    expect(basename("https://x/a.png?w=200")).toBe("a.png?w=200");
  });

  it("should return an empty string for a trailing slash", () => {
    expect(basename("https://x/dir/")).toBe("");
  });
});

describe("imageEntryName", () => {
  it("should prefix the basename with the index", () => {
    expect(imageEntryName(0, "https://x/a.png")).toBe("0-a.png");
    expect(imageEntryName(12, "https://y/a.png")).toBe("12-a.png");
  });
});

describe("resolveSource", () => {
  const page = "https://example.com/gallery/page.html";

  it("should leave absolute URLs unchanged", () => {
    expect(resolveSource("https://cdn.example.com/a.png", page)).toBe(
      "https://cdn.example.com/a.png",
    );
  });

  it("should resolve relative and root-relative paths", () => {
    expect(resolveSource("img/a.png", page)).toBe("https://example.com/gallery/img/a.png");
    expect(resolveSource("/static/b.png", page)).toBe("https://example.com/static/b.png");
  });

  it("should resolve protocol-relative URLs", () => {
    expect(resolveSource("//cdn.example.com/c.png", page)).toBe(
      "https://cdn.example.com/c.png",
    );
  });

  it("should keep empty sources empty", () => {
    expect(resolveSource("", page)).toBe("");
    expect(resolveSource("   ", page)).toBe("");
  });
});
