import { vol } from "memfs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError, loadPageConfigs } from "./PageConfig";

vi.mock("node:fs/promises", () => ({ default: vol.promises }));

describe("loadPageConfigs", () => {
  beforeEach(() => {
    vol.reset();
  });

  it("should load every configured page", async () => {
    vol.fromJSON({
      "/config/pages.json": JSON.stringify({
        pages: [
          {
            url: "https://example.com/gallery",
            titleSelector: "h1",
            imageSelector: ".gallery img",
          },
        ],
      }),
    });

    await expect(loadPageConfigs("/config/pages.json")).resolves.toEqual([
      { url: "https://example.com/gallery", titleSelector: "h1", imageSelector: ".gallery img" },
    ]);
  });

  it("should report a missing file", async () => {
    await expect(loadPageConfigs("/config/pages.json")).rejects.toThrow(
      "/config/pages.json: cannot read configuration file",
    );
  });

  it("should report malformed JSON", async () => {
    vol.fromJSON({ "/config/pages.json": "{ pages: [" });

    await expect(loadPageConfigs("/config/pages.json")).rejects.toThrow(
      "/config/pages.json: configuration file is not valid JSON",
    );
  });

  it("should report schema violations with their path", async () => {
    vol.fromJSON({
      "/config/pages.json": JSON.stringify({
        pages: [{ url: "https://example.com", titleSelector: "", imageSelector: "img" }],
      }),
    });

    const error = await loadPageConfigs("/config/pages.json").catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError && error.message).toContain("pages.0.titleSelector");
  });
});
