import { z } from "zod";

/**
 * Application configuration for the campsite watcher
 */
export const AppConfigSchema = z.object({
  // Discord Bot
  DISCORD_BOT_TOKEN: z.string().min(1).describe("Discord bot token"),
  DISCORD_CLIENT_ID: z.string().min(1).describe("Discord application client ID"),

  // Notifications
  DISCORD_WEBHOOK_URLS: z
    .string()
    .min(1)
    .transform((val) =>
      val
        .split(",")
        .map((url) => url.trim())
        .filter((url) => url.length > 0)
    )
    .pipe(z.array(z.string().url()).min(1))
    .describe("Comma-separated Discord webhook URLs that receive availability alerts"),

  // Recreation.gov API
  RECREATION_API_BASE: z
    .string()
    .url()
    .default("https://www.recreation.gov")
    .describe("Base URL of the reservation provider"),
  REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(30000)
    .describe("Milliseconds before an availability request is abandoned"),
  PROXY_URL: z
    .string()
    .url()
    .optional()
    .describe("HTTPS proxy for availability requests"),
  DEBUG_SCHEMAS: z
    .string()
    .optional()
    .transform((val) => val?.toLowerCase() === "true")
    .describe("Log unknown fields in provider responses"),

  // Job scheduling
  CHECK_INTERVAL_MS: z.coerce
    .number()
    .int()
    .min(10000)
    .default(300000)
    .describe("Milliseconds between checks of one recurring job"),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Load and validate configuration from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = AppConfigSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration - ${problems}`);
  }
  return result.data;
}
