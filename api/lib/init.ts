import type { VercelRequest } from "@vercel/node";
import { loadSettings, type Settings } from "../../src/config/index.js";
import {
  createPipelineServices,
  type PipelineServices,
} from "../../src/pipeline.js";

export interface Services extends PipelineServices {
  settings: Settings;
}

export function verifyCronSecret(
  req: VercelRequest,
  cronSecret: string | undefined = process.env.CRON_SECRET
): boolean {
  // In development, allow requests without secret
  if (!cronSecret) {
    return true;
  }

  return req.headers.authorization === `Bearer ${cronSecret}`;
}

// Built per invocation: the mail transport is closed after each send.
export function initServices(env: Record<string, string | undefined> = process.env): Services {
  const settings = loadSettings(env);
  return { settings, ...createPipelineServices(settings) };
}
