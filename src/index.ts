export * from "./archive";
export * from "./collector";
export * from "./config";
export { PagePipeline } from "./pipeline/PagePipeline";
export type { PagePipelineDependencies } from "./pipeline/PagePipeline";
export { PipelineManager } from "./pipeline/PipelineManager";
export { interruptJobs, reportJobs } from "./pipeline/report";
export { CancellationError, PipelineError, PipelineStateError } from "./pipeline/errors";
export { PageState, PipelineJobStatus } from "./pipeline/types";
export type {
  PagePipelineCallbacks,
  PagePipelineOptions,
  PageStateChange,
  PipelineJob,
  PipelineManagerCallbacks,
} from "./pipeline/types";
export * from "./scraper/fetcher";
export { ConfigError, PageConfigSchema, PagesFileSchema, loadPageConfigs } from "./scraper/PageConfig";
export type { PageConfig, PagesFile } from "./scraper/PageConfig";
export { PageScraper } from "./scraper/PageScraper";
export * from "./store";
export type * from "./types";
export { Channel } from "./utils/Channel";
export { WaitGroup } from "./utils/WaitGroup";
export * from "./utils/errors";
export { LogLevel, logger, setLogLevel } from "./utils/logger";
