import type { VercelRequest, VercelResponse } from "@vercel/node";
import { DigestError } from "../../src/errors.js";
import { runDigestPipeline } from "../../src/pipeline.js";
import { initServices, verifyCronSecret } from "../lib/init.js";

export const config = {
  maxDuration: 300,
};

export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  // Only allow GET requests
  if (req.method !== "GET") {
    res.status(405).json({ error: "Method not allowed" });
    return;
  }

  if (!verifyCronSecret(req)) {
    res.status(401).json({ error: "Unauthorized" });
    return;
  }

  try {
    console.log("Digest run triggered");
    const { settings, ...services } = initServices();
    const report = await runDigestPipeline(settings, services);

    res.status(200).json({
      success: true,
      digestDate: report.digestDate,
      sent: report.sent,
      entryCount: report.entryCount,
      summarizedCount: report.summarizedCount,
      failures: report.failures,
    });
  } catch (error) {
    console.error("Digest run error:", error);
    if (error instanceof DigestError) {
      res.status(500).json({ error: error.message, category: error.category });
      return;
    }
    res.status(500).json({
      error: error instanceof Error ? error.message : "Unknown error",
    });
  }
}
