#!/usr/bin/env node

import { loadProcessingConfig } from "../config/env";
import { runProcessingJob } from "../jobs/processingJob";

async function main() {
  const config = loadProcessingConfig();

  try {
    console.log(
      "========================================\n",
      `🚀 Starting Job: process ${config.paths.newVideosFile}`,
      "\n========================================"
    );
    const { summary } = await runProcessingJob(config);
    if (summary) {
      console.log(
        `\nDone! Processed ${summary.processed.length} new video(s), skipped ${summary.skipped.length}, failed ${summary.failed.length}`
      );
    }
    process.exitCode = 0;
  } catch (err) {
    console.error("💥 Fatal Job Error [process]:", err);
    process.exitCode = 1;
  }
}

void main();
