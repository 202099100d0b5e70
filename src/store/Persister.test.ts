import path from "node:path";
import { vol } from "memfs";
import { type MockInstance, beforeEach, describe, expect, it, vi } from "vitest";
import { IncompleteWriteError, PersistError } from "./errors";
import { Persister } from "./Persister";

vi.mock("node:fs/promises", () => ({ default: vol.promises }));
vi.mock("../utils/logger");

describe("Persister", () => {
  const archive = Buffer.from([0x50, 0x4b, 0x05, 0x06, 1, 2, 3]);

  beforeEach(() => {
    vol.reset();
  });

  it("should create the downloads directory and write <title>.zip", async () => {
    const persister = new Persister();

    const bytesWritten = await persister.persist("My_Title", archive);

    const target = path.resolve("downloads", "My_Title.zip");
    expect(bytesWritten).toBe(archive.length);
    expect(vol.readFileSync(target)).toEqual(archive);
    expect(vol.statSync(target).size).toBe(bytesWritten);
  });

  it("should write into an existing directory", async () => {
    vol.fromJSON({ "/out/other.zip": "x" });
    const persister = new Persister({ directory: "/out" });

    await persister.persist("Gallery", archive);

    expect(vol.readdirSync("/out").sort()).toEqual(["Gallery.zip", "other.zip"]);
  });

  it("should overwrite an earlier archive with the same title", async () => {
    const persister = new Persister({ directory: "/out" });
    const longer = Buffer.alloc(64, 7);

    await persister.persist("Gallery", longer);
    const first = await persister.persist("Gallery", archive);
    const second = await persister.persist("Gallery", archive);

    expect(first).toBe(archive.length);
    expect(second).toBe(archive.length);
    expect(vol.readFileSync("/out/Gallery.zip")).toEqual(archive);
    expect(vol.readdirSync("/out")).toEqual(["Gallery.zip"]);
  });

  it("should honour a custom extension", async () => {
    const persister = new Persister({ directory: "/out", extension: ".cbz" });

    await persister.persist("Issue_1", archive);

    expect(persister.pathFor("Issue_1")).toBe(path.join("/out", "Issue_1.cbz"));
    expect(vol.existsSync("/out/Issue_1.cbz")).toBe(true);
  });

  it("should fail when the directory cannot be created", async () => {
    vol.fromJSON({ "/blocked": "a file, not a directory" });
    const persister = new Persister({ directory: "/blocked/downloads" });

    await expect(persister.persist("Title", archive)).rejects.toBeInstanceOf(PersistError);
  });

  it("should fail when the file cannot be created", async () => {
    const persister = new Persister({ directory: "/out" });

    // Titles are not re-sanitized, so a slash points into a missing directory
    await expect(persister.persist("missing/Title", archive)).rejects.toThrow(
      `Failed to create ${path.join("/out", "missing/Title.zip")}`,
    );
  });

  it("should fail on a short write and still close the file", async () => {
    const persister = new Persister({ directory: "/out" });
    const open = vol.promises.open.bind(vol.promises);
    let close: MockInstance | undefined;
    vi.spyOn(vol.promises, "open").mockImplementationOnce(async (...args) => {
      const handle = await open(...args);
      vi.spyOn(handle, "write").mockResolvedValueOnce({ bytesWritten: 3, buffer: archive });
      close = vi.spyOn(handle, "close");
      return handle;
    });

    const failure = persister.persist("Short", archive);

    await expect(failure).rejects.toBeInstanceOf(IncompleteWriteError);
    await expect(failure).rejects.toMatchObject({
      path: path.join("/out", "Short.zip"),
      expected: archive.length,
      written: 3,
    });
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("should reject an empty title", async () => {
    const persister = new Persister({ directory: "/out" });

    await expect(persister.persist("", archive)).rejects.toThrow(
      "Cannot persist an archive without a title",
    );
    expect(vol.existsSync("/out")).toBe(false);
  });
});
