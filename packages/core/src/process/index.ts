export { execFileUtf8, type ExecFileFn, type ExecResult } from "./exec.js";
