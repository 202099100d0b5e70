import JSZip from "jszip";
import { describe, expect, it, vi } from "vitest";
import { Archiver } from "./Archiver";
import { ArchiveError, DuplicateEntryError } from "./errors";

vi.mock("../utils/logger");

describe("Archiver", () => {
  const images = [
    { name: "0-a.png", content: Buffer.from([1, 2, 3]) },
    { name: "1-b.png", content: Buffer.from([4, 5]) },
  ];

  it("should write one entry per image with the exact payload", async () => {
    const archiver = new Archiver();

    const archive = await archiver.archive(images);
    const entries = await archiver.read(archive);

    expect(entries).toEqual([
      { name: "0-a.png", content: Buffer.from([1, 2, 3]) },
      { name: "1-b.png", content: Buffer.from([4, 5]) },
    ]);
  });

  it("should produce a standard zip readable by other tools", async () => {
    const archive = await new Archiver().archive(images);

    const zip = await JSZip.loadAsync(archive);

    expect(Object.keys(zip.files).sort()).toEqual(["0-a.png", "1-b.png"]);
    expect(await zip.file("1-b.png")?.async("nodebuffer")).toEqual(Buffer.from([4, 5]));
    expect(zip.file("0-a.png")?.date.toISOString()).toBe("2000-01-01T00:00:00.000Z");
  });

  it("should be deterministic for equal input", async () => {
    const archiver = new Archiver();

    const first = await archiver.archive(images);
    const second = await archiver.archive([...images]);

    expect(first.equals(second)).toBe(true);
  });

  it("should keep arbitrary binary payloads and entry names intact", async () => {
    const archiver = new Archiver({ compression: "DEFLATE" });
    const payload = Buffer.from(Array.from({ length: 512 }, (_, i) => (i * 31) % 256));
    const unusual = [
      { name: "0-photo%20one.jpg?w=200", content: payload },
      { name: "1-größe.png", content: Buffer.alloc(0) },
    ];

    const entries = await archiver.read(await archiver.archive(unusual));

    expect(entries.map((entry) => entry.name)).toEqual(["0-photo%20one.jpg?w=200", "1-größe.png"]);
    expect(entries[0].content.equals(payload)).toBe(true);
    expect(entries[1].content.length).toBe(0);
  });

  it("should not create folder entries for names containing slashes", async () => {
    const archiver = new Archiver();

    const entries = await archiver.read(
      await archiver.archive([{ name: "0-nested/a.png", content: Buffer.from([9]) }]),
    );

    expect(entries).toEqual([{ name: "0-nested/a.png", content: Buffer.from([9]) }]);
  });

  it("should produce an empty archive for no images", async () => {
    const archiver = new Archiver();

    expect(await archiver.read(await archiver.archive([]))).toEqual([]);
  });

  it("should reject duplicate entry names", async () => {
    const archiver = new Archiver();
    const duplicated = [
      { name: "0-a.png", content: Buffer.from([1]) },
      { name: "0-a.png", content: Buffer.from([2]) },
    ];

    await expect(archiver.archive(duplicated)).rejects.toBeInstanceOf(DuplicateEntryError);
    await expect(archiver.archive(duplicated)).rejects.toThrow(
      'Archive already contains an entry named "0-a.png"',
    );
  });

  it("should reject data that is not an archive", async () => {
    await expect(new Archiver().read(Buffer.from("not a zip"))).rejects.toBeInstanceOf(
      ArchiveError,
    );
  });
});
