import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
}

/** Run a program without a shell and collect its output as UTF-8. */
export type ExecFileFn = (
  file: string,
  args: string[],
) => Promise<ExecResult>;

/** 16 MiB: a broad index query can return many thousands of paths. */
const MAX_BUFFER = 16 * 1024 * 1024;

export const execFileUtf8: ExecFileFn = (file, args) =>
  execFileAsync(file, args, { encoding: "utf8", maxBuffer: MAX_BUFFER });
