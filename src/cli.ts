#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import inquirer from "inquirer";
import packageJson from "../package.json";
import { Archiver } from "./archive";
import { DEFAULT_CONFIG_FILE, DEFAULT_DOWNLOAD_DIR, DEFAULT_MAX_CONCURRENCY } from "./config";
import { PagePipeline } from "./pipeline/PagePipeline";
import { PipelineManager } from "./pipeline/PipelineManager";
import { interruptJobs, reportJobs } from "./pipeline/report";
import { type PageConfig, PageConfigSchema, loadPageConfigs } from "./scraper/PageConfig";
import { Persister } from "./store";
import { LogLevel, logger, parseLogLevel, setLogLevel } from "./utils/logger";

interface PipelineCliOptions {
  config: string;
  outputDir: string;
  maxConcurrency?: number;
  timeout?: number;
  deflate: boolean;
}

interface ScrapeCliOptions extends PipelineCliOptions {
  titleSelector?: string;
  imageSelector?: string;
  page?: number;
}

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
};

const parseIndex = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return parsed;
};

function createManager(options: PipelineCliOptions): PipelineManager {
  const pipeline = new PagePipeline(
    {
      archiver: new Archiver({ compression: options.deflate ? "DEFLATE" : "STORE" }),
      persister: new Persister({ directory: options.outputDir }),
    },
    {
      maxConcurrency: options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY,
      fetchOptions: options.timeout ? { timeout: options.timeout } : undefined,
    },
  );
  const manager = new PipelineManager(pipeline);
  manager.setCallbacks({
    onJobStageChange: (job, change) => {
      logger.debug(`${job.url}: ${change.state}${change.title ? ` (${change.title})` : ""}`);
    },
  });

  // An interrupted prompt never settles, so the summary and exit happen here
  process.once("SIGINT", () => {
    interruptJobs(manager)
      .catch((error) => {
        console.error("Error:", error instanceof Error ? error.message : String(error));
      })
      .finally(() => process.exit(1));
  });

  return manager;
}

async function resolveScrapePage(url: string, options: ScrapeCliOptions): Promise<PageConfig> {
  if (options.page !== undefined) {
    const pages = await loadPageConfigs(options.config);
    const page = pages[options.page];
    if (!page) {
      throw new Error(
        `No page at index ${options.page} in ${options.config} (${pages.length} configured)`,
      );
    }
    return { ...page, url };
  }

  const result = PageConfigSchema.safeParse({
    url,
    titleSelector: options.titleSelector,
    imageSelector: options.imageSelector,
  });
  if (!result.success) {
    throw new Error(
      "Provide a valid URL with --title-selector and --image-selector, or --page <index>",
    );
  }
  return result.data;
}

const addPipelineOptions = (command: Command): Command =>
  command
    .option("--config <path>", "Page configuration file", DEFAULT_CONFIG_FILE)
    .option("-o, --output-dir <dir>", "Directory archives are written to", DEFAULT_DOWNLOAD_DIR)
    .option(
      "-c, --max-concurrency <number>",
      "Maximum concurrent image downloads per page (default: unbounded)",
      parsePositiveInt,
    )
    .option("-t, --timeout <ms>", "Request timeout in milliseconds", parsePositiveInt)
    .option("--deflate", "Compress archive entries instead of storing them", false);

async function main(): Promise<number> {
  const envLevel = parseLogLevel(process.env.LOG_LEVEL);
  if (envLevel !== undefined) {
    setLogLevel(envLevel);
  }

  let exitCode = 0;
  const program = new Command();

  program
    .name("image-archiver")
    .description("Download every image on a web page and save them as a ZIP archive")
    .version(packageJson.version)
    .option("--verbose", "Enable verbose (debug) logging", false)
    .option("--silent", "Disable all logging except errors", false);

  addPipelineOptions(
    program
      .command("scrape <url>")
      .description("Archive the images of a single page")
      .option("--title-selector <selector>", "CSS selector of the page title")
      .option("--image-selector <selector>", "CSS selector of the images to download")
      .option("-p, --page <index>", "Take selectors from the configured page at <index>", parseIndex),
  ).action(async (url: string, options: ScrapeCliOptions) => {
    const page = await resolveScrapePage(url, options);
    const manager = createManager(options);
    await manager.start();
    await manager.enqueueJob(page, url);
    exitCode = (await reportJobs(manager)) > 0 ? 1 : 0;
  });

  addPipelineOptions(
    program
      .command("interactive", { isDefault: true })
      .description("Prompt for URLs of every configured page and archive them concurrently"),
  ).action(async (options: PipelineCliOptions) => {
    const pages = await loadPageConfigs(options.config);
    const manager = createManager(options);
    await manager.start();

    for (const page of pages) {
      console.log(`Page ${page.url} (leave empty to continue)`);
      while (true) {
        const { url } = await inquirer.prompt<{ url: string }>([
          { type: "input", name: "url", message: "URL:" },
        ]);
        const trimmed = url.trim();
        if (!trimmed) break;
        await manager.enqueueJob(page, trimmed);
      }
    }

    exitCode = (await reportJobs(manager)) > 0 ? 1 : 0;
  });

  program.hook("preAction", (thisCommand) => {
    const options = thisCommand.opts<{ silent: boolean; verbose: boolean }>();
    if (options.silent) {
      setLogLevel(LogLevel.ERROR);
    } else if (options.verbose) {
      setLogLevel(LogLevel.DEBUG);
    }
  });

  await program.parseAsync();
  return exitCode;
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error("Error:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
