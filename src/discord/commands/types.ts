import type { ChatInputCommandInteraction } from "discord.js";
import type { CheckJobScheduler } from "../../services/job-scheduler";

/**
 * Services shared by slash command handlers
 */
export interface CommandContext {
  jobs: CheckJobScheduler;
  checkIntervalMs: number;
}

export type CommandHandler = (
  interaction: ChatInputCommandInteraction,
  context: CommandContext
) => Promise<void>;
