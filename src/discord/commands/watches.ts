/**
 * /watches command - List recurring availability checks
 */
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  EmbedBuilder,
  MessageFlags,
} from "discord.js";
import type { CheckJob } from "../../services/job-scheduler";
import type { CommandContext } from "./types";

/**
 * One job as a few lines of embed text
 */
export function formatJob(job: CheckJob): string {
  const lastRun = job.lastRunAt
    ? `<t:${Math.floor(job.lastRunAt.getTime() / 1000)}:R>`
    : "never";

  return (
    `**${job.name}** - campground ${job.request.campground}\n` +
    `  Stay: ${job.request.arrival} to ${job.request.departure}\n` +
    `  Checks: ${job.runCount} | Last: ${lastRun}\n` +
    `  Outcome: ${job.lastOutcome ?? "pending"}`
  );
}

export const watchesCommand = new SlashCommandBuilder()
  .setName("watches")
  .setDescription("Show active campground watches");

export async function handleWatches(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  const jobs = context.jobs.listJobs();

  const embed = new EmbedBuilder()
    .setTitle("Campground Watches")
    .setColor(jobs.length > 0 ? 0x2ecc71 : 0xf39c12);

  if (jobs.length === 0) {
    embed.setDescription("None - use /watch to add one");
  } else {
    embed.addFields({
      name: `Active (${jobs.length})`,
      value: jobs.map(formatJob).join("\n\n").slice(0, 1024),
    });
  }

  await interaction.editReply({ embeds: [embed] });
}
