import fs from "node:fs/promises";
import { z } from "zod";

export const PageConfigSchema = z.object({
  /** Page opened for the user; also the default page to scrape */
  url: z.string().url(),
  /** CSS selector whose text becomes the archive title */
  titleSelector: z.string().min(1),
  /** CSS selector matching the image elements to download */
  imageSelector: z.string().min(1),
});

export const PagesFileSchema = z.object({
  pages: z.array(PageConfigSchema),
});

export type PageConfig = z.infer<typeof PageConfigSchema>;
export type PagesFile = z.infer<typeof PagesFileSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    super(`${path}: ${message}`);
    this.name = this.constructor.name;
  }
}

/**
 * Reads and validates the list of pages to scrape.
 * @throws {ConfigError} if the file is missing, not JSON, or fails validation
 */
export async function loadPageConfigs(configPath: string): Promise<PageConfig[]> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError("cannot read configuration file", configPath, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError("configuration file is not valid JSON", configPath, error);
  }

  const result = PagesFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid configuration (${issues})`, configPath, result.error);
  }
  return result.data.pages;
}
