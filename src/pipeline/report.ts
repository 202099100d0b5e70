import { logger } from "../utils/logger";
import type { PipelineManager } from "./PipelineManager";
import { PipelineJobStatus } from "./types";

const reports = new WeakMap<PipelineManager, Promise<number>>();

async function printReport(manager: PipelineManager): Promise<number> {
  const jobs = await manager.waitForAll();
  await manager.stop();

  let failed = 0;
  for (const job of jobs) {
    if (job.status === PipelineJobStatus.COMPLETED && job.result) {
      console.log(
        `✅ ${job.url} → ${job.result.path} (${job.result.imageCount} images, ${job.result.bytesWritten} bytes)`,
      );
    } else {
      failed++;
      console.error(`❌ ${job.url}: ${job.error?.message ?? job.status}`);
    }
  }
  console.log(`${jobs.length - failed} of ${jobs.length} pages archived.`);
  return failed;
}

/**
 * Waits for every job and prints one line per page, then a total. The summary
 * is printed once per manager; later calls share the first one's result.
 * @returns the number of pages that did not produce an archive
 */
export function reportJobs(manager: PipelineManager): Promise<number> {
  let report = reports.get(manager);
  if (!report) {
    report = printReport(manager);
    reports.set(manager, report);
  }
  return report;
}

/**
 * Cancels every queued and running job, then reports.
 */
export async function interruptJobs(manager: PipelineManager): Promise<number> {
  logger.warn("Interrupted, cancelling jobs...");
  const jobs = await manager.getJobs();
  await Promise.all(jobs.map((job) => manager.cancelJob(job.id)));
  return reportJobs(manager);
}
