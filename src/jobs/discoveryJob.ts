import { watchUrl } from "../config/yt-dlp";
import type { UploadRecord } from "../db/types";
import { DiscoveryMode, type DiscoveryService } from "../services/discoveryService";
import { JobReporter } from "../services/jobReporter";
import { parseCaseInfo } from "../utils/caseInfo";

/** Exit statuses a scheduler can branch on */
export enum ExitCode {
  FOUND = 0,
  NONE_FOUND = 1,
  FATAL = 2
}

export interface DiscoveryOptions {
  mode: DiscoveryMode;
  /** Number of uploads to show in list mode */
  listCount: number;
  /** Machine output: JSON on stdout, state left untouched */
  json: boolean;
}

export const MONITOR_USAGE =
  "Usage: monitor [--init] [--list N] [--all] [--json]";

/**
 * Parses the monitor command line. Accepts both `--list N` and `--list=N`.
 * Precedence when several modes are given: list, then init, then all.
 * @throws Error with the usage line on unknown flags or a bad list count
 */
export function parseMonitorArgs(argv: string[]): DiscoveryOptions {
  let listCount: number | null = null;
  let init = false;
  let all = false;
  let json = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--init") init = true;
    else if (arg === "--all") all = true;
    else if (arg === "--json") json = true;
    else if (arg === "--list" || arg.startsWith("--list=")) {
      const raw = arg === "--list" ? argv[++i] : arg.split("=")[1];
      const count = Number(raw);
      if (!raw || !Number.isInteger(count) || count < 1) {
        throw new Error(`--list expects a positive integer\n${MONITOR_USAGE}`);
      }
      listCount = count;
    } else {
      throw new Error(`Unknown argument: ${arg}\n${MONITOR_USAGE}`);
    }
  }

  let mode = DiscoveryMode.CHECK;
  if (listCount !== null) mode = DiscoveryMode.LIST;
  else if (init) mode = DiscoveryMode.INIT;
  else if (all) mode = DiscoveryMode.ALL;

  return { mode, listCount: listCount ?? 0, json };
}

export function formatListEntry(video: UploadRecord): string[] {
  const { docket } = parseCaseInfo(video.title);
  const docketSuffix = docket ? ` [${docket}]` : "";

  return [
    `  ${video.id} - ${video.title.slice(0, 60)}${docketSuffix}`,
    `             Published: ${video.published_at.slice(0, 10)}`
  ];
}

export function formatNewEntry(video: UploadRecord): string[] {
  const { docket } = parseCaseInfo(video.title);

  return [
    `  NEW: ${video.title}`,
    `       ID: ${video.id}`,
    `       Docket: ${docket ?? "N/A"}`,
    `       URL: ${watchUrl(video.id)}`,
    ""
  ];
}

export interface DiscoveryJobDeps {
  /** Defaults to a reporter that is quiet in JSON mode */
  reporter?: JobReporter;
  /** Sink for stdout lines */
  out?: (line: string) => void;
}

async function runMode(
  service: DiscoveryService,
  options: DiscoveryOptions,
  reporter: JobReporter,
  out: (line: string) => void
): Promise<ExitCode> {
  const report = { commit: !options.json };

  switch (options.mode) {
    case DiscoveryMode.LIST: {
      const videos = await service.listRecent(options.listCount);
      reporter.incrementDiscovered(videos.length);
      if (options.json) {
        out(JSON.stringify(videos, null, 2));
      } else {
        out(`Recent ${videos.length} uploads:\n`);
        videos.forEach((v) => formatListEntry(v).forEach((line) => out(line)));
      }
      return ExitCode.FOUND;
    }

    case DiscoveryMode.INIT: {
      const videos = await service.initialize(report);
      reporter.incrementDiscovered(videos.length);
      if (options.json) {
        out(JSON.stringify(videos, null, 2));
      } else {
        out(`Initialized state with ${videos.length} existing videos`);
        out("Future runs will only report new uploads");
      }
      return ExitCode.FOUND;
    }

    case DiscoveryMode.CHECK:
    case DiscoveryMode.ALL: {
      const videos =
        options.mode === DiscoveryMode.ALL
          ? await service.backfill(report)
          : await service.checkForNew(report);
      reporter.incrementDiscovered(videos.length);

      if (options.json) {
        out(JSON.stringify(videos, null, 2));
      } else if (videos.length > 0) {
        out(`Found ${videos.length} new video(s):\n`);
        videos.forEach((v) => formatNewEntry(v).forEach((line) => out(line)));
      } else {
        out("No new videos found");
      }
      return videos.length > 0 ? ExitCode.FOUND : ExitCode.NONE_FOUND;
    }
  }
}

/**
 * Executes one discovery run in the requested mode.
 * In JSON mode only the JSON document is written to `out` and state is never
 * committed; the processing stage acknowledges ids once they are in the catalog.
 * Progress goes through the reporter, which JSON mode keeps quiet so stdout stays parseable.
 * @param service - Discovery service wired to the upload source and state file
 * @param options - Parsed command line
 * @param deps - Reporter and output overrides
 * @returns The process exit status
 * @throws Whatever the upload source or state file raised, after logging it
 */
export async function runDiscoveryJob(
  service: DiscoveryService,
  options: DiscoveryOptions,
  deps: DiscoveryJobDeps = {}
): Promise<ExitCode> {
  const reporter =
    deps.reporter ?? new JobReporter("monitor", { quiet: options.json });
  const out = deps.out ?? console.log;

  reporter.startRun();
  reporter.info(`Mode: ${options.mode}${options.json ? " (json)" : ""}`);

  try {
    const exitCode = await runMode(service, options, reporter, out);
    if (options.json && options.mode !== DiscoveryMode.LIST) {
      reporter.info("State left unchanged; processing acknowledges consumed ids");
    }
    reporter.finishRun();
    return exitCode;
  } catch (criticalError: unknown) {
    const criticalMessage =
      criticalError instanceof Error
        ? criticalError.message
        : String(criticalError);
    reporter.error(`CRITICAL JOB FAILURE: ${criticalMessage}`);
    reporter.finishRun(
      criticalError instanceof Error
        ? criticalError
        : new Error(criticalMessage)
    );
    throw criticalError;
  }
}
