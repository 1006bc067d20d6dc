import { spawn } from "child_process";

export interface CommandResult {
  code: number | null;
  stderr: string;
}

/**
 * Check if a command is present and runnable by spawning it with the given args.
 * Returns true only if the process exits with code 0. ENOENT or non-zero exit = false.
 */
export function checkCommand(
  command: string,
  args: string[],
  timeoutMs = 5000
): Promise<boolean> {
  return new Promise((resolve) => {
    const child = spawn(command, args, { stdio: "ignore" });
    const timer = setTimeout(() => {
      child.kill("SIGKILL");
      resolve(false);
    }, timeoutMs);
    child.on("error", () => {
      clearTimeout(timer);
      resolve(false);
    });
    child.on("close", (code) => {
      clearTimeout(timer);
      resolve(code === 0);
    });
  });
}

/**
 * Runs an external tool to completion, capturing its stderr.
 * If this process is interrupted while the tool runs, the child is killed
 * and the signal is raised again, so the batch ends instead of moving on to
 * the next record.
 * @param command - Executable name or path
 * @param args - Arguments passed verbatim (no shell)
 * @returns Exit code with captured stderr
 * @throws Error if the executable could not be started at all
 */
export function runCommand(
  command: string,
  args: string[]
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "ignore", "pipe"] });

    let stderr = "";
    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    const killChild = () => {
      if (child.exitCode === null && !child.killed) {
        console.warn(
          `🧹 Killing orphaned ${command} process (PID: ${child.pid})...`
        );
        child.kill("SIGKILL");
      }
    };
    const onSignal = (signal: NodeJS.Signals) => {
      killChild();
      detach();
      // With our listener gone, the default handler terminates the process
      process.kill(process.pid, signal);
    };
    const detach = () => {
      process.off("SIGTERM", onSignal);
      process.off("SIGINT", onSignal);
      process.off("exit", killChild);
    };

    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
    process.on("exit", killChild);

    child.once("error", (err) => {
      detach();
      reject(new Error(`Failed to start ${command}`, { cause: err }));
    });
    child.once("close", (code) => {
      detach();
      resolve({ code, stderr });
    });
  });
}
