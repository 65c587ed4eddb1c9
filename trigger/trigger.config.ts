import { defineConfig } from "@trigger.dev/sdk";
import { additionalFiles, syncEnvVars } from "@trigger.dev/build/extensions/core";

export default defineConfig({
  // Set TRIGGER_PROJECT_REF to the project's ref from the Trigger.dev dashboard
  project: process.env.TRIGGER_PROJECT_REF ?? "proj_foia_campaign_engine",
  runtime: "node",
  logLevel: "log",
  maxDuration: 300,
  retries: {
    enabledInDev: true,
    default: {
      maxAttempts: 3,
      minTimeoutInMs: 1000,
      maxTimeoutInMs: 30000,
      factor: 2,
    },
  },
  dirs: ["./tasks"],
  build: {
    extensions: [
      additionalFiles({ files: ["./migrations/*.sql"] }),
      syncEnvVars(async () => {
        // Sync env vars from the CLI process into the Trigger.dev deploy
        const vars = [
          "OPENAI_API_KEY",
          "ANTHROPIC_API_KEY",
          "FOIA_API_URL",
          "FOIA_API_TOKEN",
          "FOIA_API_TIMEOUT_MS",
          "DUE_SOON_WARNING_DAYS",
          "AUTO_FOLLOWUP",
          "APPEAL_DRAFT_MODE",
          "APPEAL_DRAFT_MODEL",
          "APPEAL_FALLBACK_MODEL",
          "SUBMISSION_MAX_ATTEMPTS",
        ];
        const result = vars.flatMap((name) => {
          const value = process.env[name];
          return value ? [{ name, value }] : [];
        });

        // DATABASE_PUBLIC_URL when the database sits on a private network
        const dbUrl = process.env["DATABASE_PUBLIC_URL"] || process.env["DATABASE_URL"];
        if (dbUrl) {
          result.push({ name: "DATABASE_URL", value: dbUrl });
        }

        return result;
      }),
    ],
  },
});
