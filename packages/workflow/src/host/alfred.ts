/**
 * Driving Alfred from a workflow script.
 *
 * Alfred is scripted through JavaScript for Automation (`osascript -l
 * JavaScript`); files are opened with `open`.
 */

import type { Logger } from "pino";
import { execFileUtf8, type ExecFileFn } from "@fuzzy-folders/core/process";

export const ALFRED_APP_ID = "com.runningwithcrayons.Alfred";

export interface AlfredHost {
  /** Run an External Trigger of this workflow. */
  runTrigger(name: string, arg?: string): Promise<void>;
  /** Open Alfred with `query` typed into it. */
  search(query: string): Promise<void>;
  /** Make Alfred re-read this workflow's info.plist. */
  reloadWorkflow(): Promise<void>;
  open(path: string): Promise<void>;
}

export interface AlfredHostOptions {
  bundleId: string;
  exec?: ExecFileFn;
  appId?: string;
  logger?: Logger;
}

function application(appId: string): string {
  return `Application(${JSON.stringify(appId)})`;
}

export function runTriggerScript(
  appId: string,
  bundleId: string,
  name: string,
  arg?: string,
): string {
  const options = { inWorkflow: bundleId, withArgument: arg };
  return `${application(appId)}.runTrigger(${JSON.stringify(name)}, ${JSON.stringify(options)})`;
}

export function searchScript(appId: string, query: string): string {
  return `${application(appId)}.search(${JSON.stringify(query)})`;
}

export function reloadWorkflowScript(appId: string, bundleId: string): string {
  return `${application(appId)}.reloadWorkflow(${JSON.stringify(bundleId)})`;
}

export function createAlfredHost(options: AlfredHostOptions): AlfredHost {
  const exec = options.exec ?? execFileUtf8;
  const appId = options.appId ?? ALFRED_APP_ID;
  const { bundleId, logger } = options;

  async function jxa(script: string): Promise<void> {
    logger?.debug({ script }, "Running JXA");
    await exec("osascript", ["-l", "JavaScript", "-e", script]);
  }

  return {
    runTrigger: (name, arg) => jxa(runTriggerScript(appId, bundleId, name, arg)),
    search: (query) => jxa(searchScript(appId, query)),
    reloadWorkflow: () => jxa(reloadWorkflowScript(appId, bundleId)),
    async open(path) {
      logger?.debug({ path }, "Opening file");
      await exec("open", [path]);
    },
  };
}
