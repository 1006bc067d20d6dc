#!/usr/bin/env node

import { YouTubeClient } from "../clients/youtubeClient";
import { loadDiscoveryConfig } from "../config/env";
import { StateRepository } from "../db/stateRepository";
import {
  ExitCode,
  parseMonitorArgs,
  runDiscoveryJob
} from "../jobs/discoveryJob";
import { DiscoveryService } from "../services/discoveryService";
import { JobReporter } from "../services/jobReporter";

async function main() {
  try {
    const options = parseMonitorArgs(process.argv.slice(2));
    const config = loadDiscoveryConfig();

    const service = new DiscoveryService(
      new YouTubeClient(config.youtubeApiKey, config.channelId),
      new StateRepository(config.stateFile)
    );

    // JSON mode keeps INFO lines off stdout so the output can be piped
    const reporter = new JobReporter("monitor", { quiet: options.json });

    process.exitCode = await runDiscoveryJob(service, options, { reporter });
  } catch (err: unknown) {
    console.error(
      "💥 Monitor failed:",
      err instanceof Error ? err.message : String(err)
    );
    process.exitCode = ExitCode.FATAL;
  }
}

void main();
