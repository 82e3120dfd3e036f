/**
 * /unwatch command - Stop a recurring availability check
 */
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  EmbedBuilder,
  MessageFlags,
} from "discord.js";
import { JobNotFoundError, describeError } from "../../errors";
import type { CommandContext } from "./types";

export const unwatchCommand = new SlashCommandBuilder()
  .setName("unwatch")
  .setDescription("Stop watching a campground")
  .addStringOption((option) =>
    option
      .setName("name")
      .setDescription("Watch name (see /watches)")
      .setRequired(true)
  );

export async function handleUnwatch(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  const name = interaction.options.getString("name", true).trim();

  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    await context.jobs.deleteJob(name);

    const embed = new EmbedBuilder()
      .setTitle("Watch Stopped")
      .setDescription(`No more checks will run for **${name}**`)
      .setColor(0x3498db);

    await interaction.editReply({ embeds: [embed] });
  } catch (error) {
    const notFound = error instanceof JobNotFoundError;
    const embed = new EmbedBuilder()
      .setTitle(notFound ? "Watch Not Found" : "Error")
      .setDescription(
        notFound
          ? `No watch named **${name}**`
          : `An error occurred: ${describeError(error)}`
      )
      .setColor(notFound ? 0xf39c12 : 0xe74c3c);

    if (notFound) {
      embed.setFooter({ text: "Use /watches to see active watches" });
    }

    await interaction.editReply({ embeds: [embed] });
  }
}
