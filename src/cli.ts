import { loadSettings, type Settings } from "./config/index.js";
import { DigestError, describeError } from "./errors.js";
import {
  createPipelineServices,
  runDigestPipeline,
  type PipelineServices,
} from "./pipeline.js";

export const EXIT_OK = 0;
export const EXIT_ABORTED = 1;
export const EXIT_PARTIAL = 2;

export interface CliOptions {
  createServices?: (settings: Settings) => PipelineServices;
  now?: Date;
}

function reportAbort(error: unknown): void {
  if (error instanceof DigestError) {
    console.error(`${error.category} error: ${error.message}`);
  } else {
    console.error(`unexpected error: ${describeError(error)}`);
  }
}

/**
 * Runs the digest once and maps the outcome to a process exit code.
 * Settings are validated before any service is created.
 */
export async function runCli(
  env: Record<string, string | undefined>,
  options: CliOptions = {}
): Promise<number> {
  let settings: Settings;
  try {
    settings = loadSettings(env);
  } catch (error) {
    reportAbort(error);
    return EXIT_ABORTED;
  }

  console.log(`Feed: ${settings.feed.url}`);
  console.log(`Summary length: ${settings.feed.summaryLength} (${settings.feed.maxTokens} tokens)`);
  console.log(`Recipient: ${settings.mail.to}`);

  try {
    const services = (options.createServices ?? createPipelineServices)(settings);
    const report = await runDigestPipeline(settings, services, options.now);

    for (const failure of report.failures) {
      console.error(`${failure.stage} failed for "${failure.title}" (${failure.link}): ${failure.reason}`);
    }

    if (!report.sent) {
      console.log("Nothing to send");
      return EXIT_OK;
    }

    console.log(
      `Digest for ${report.digestDate}: ${report.summarizedCount}/${report.entryCount} articles summarized`
    );
    return report.failures.length > 0 ? EXIT_PARTIAL : EXIT_OK;
  } catch (error) {
    reportAbort(error);
    return EXIT_ABORTED;
  }
}
