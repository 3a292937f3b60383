import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

/**
 * Runs an executable to completion; rejects on a non-zero exit.
 */
export type ProcessRunner = (file: string, args: readonly string[]) => Promise<void>;

export const runProcess: ProcessRunner = async (file, args) => {
  await execFileAsync(file, [...args]);
};
