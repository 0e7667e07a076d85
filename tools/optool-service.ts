import { execa } from "execa";
import { DEFAULT_OPTOOL_BIN } from "./optool-env";
import { OptoolNotFoundError, OptoolProcessError } from "./optool-errors";
import { logDebug } from "./optool-log";

export type OptoolRunOutcome = {
  command: string;
  stdout: string;
  stderr: string;
};

export class OptoolService {
  constructor(private readonly binary: string = DEFAULT_OPTOOL_BIN) {}

  /**
   * Probes `optool --version`. Optool has no real version flag, so a non-zero
   * exit still counts as present when either stream mentions "optool".
   */
  async isAvailable(): Promise<boolean> {
    try {
      const probe = await execa(this.binary, ["--version"], { reject: false });
      if (typeof probe.exitCode !== "number") {
        return false;
      }
      const stdout = (probe.stdout ?? "").toLowerCase();
      const stderr = (probe.stderr ?? "").toLowerCase();
      return probe.exitCode === 0 || stdout.includes("optool") || stderr.includes("optool");
    } catch (error) {
      logDebug(`probe of ${this.binary} failed: ${error instanceof Error ? error.message : String(error)}`, "optool");
      return false;
    }
  }

  async ensureAvailable(): Promise<void> {
    if (!(await this.isAvailable())) {
      throw new OptoolNotFoundError(this.binary);
    }
  }

  async run(args: readonly string[]): Promise<OptoolRunOutcome> {
    const command = [this.binary, ...args].join(" ");
    logDebug(`exec ${command}`, "optool");
    const child = await execa(this.binary, [...args], { reject: false });
    const stdout = child.stdout ?? "";
    const stderr = child.stderr ?? "";
    if (typeof child.exitCode !== "number") {
      throw new OptoolProcessError(`Failed to start Optool: ${command}`, undefined, stdout, stderr);
    }
    if (child.exitCode !== 0) {
      throw new OptoolProcessError(
        `Command '${command}' returned non-zero exit status ${child.exitCode}.`,
        child.exitCode,
        stdout,
        stderr,
      );
    }
    return { command, stdout, stderr };
  }
}

export const optoolService = new OptoolService();
