/**
 * /watch command - Start a recurring availability check for a stay
 */
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  EmbedBuilder,
  MessageFlags,
} from "discord.js";
import { JobConflictError, MalformedRequestError } from "../../errors";
import { formatRequestDate, formatStayDate, parseStay, spansMonths } from "../../stay";
import type { CheckRequest } from "../../request";
import type { CommandContext } from "./types";

export const watchCommand = new SlashCommandBuilder()
  .setName("watch")
  .setDescription("Watch a campground for open sites over a stay")
  .addStringOption((option) =>
    option
      .setName("campground")
      .setDescription("recreation.gov campground ID (e.g., 232447)")
      .setRequired(true)
  )
  .addStringOption((option) =>
    option
      .setName("arrival")
      .setDescription("Arrival date (YYYY-M-D, e.g., 2024-6-14)")
      .setRequired(true)
  )
  .addStringOption((option) =>
    option
      .setName("departure")
      .setDescription("Departure date (YYYY-M-D, e.g., 2024-6-16)")
      .setRequired(true)
  )
  .addStringOption((option) =>
    option
      .setName("name")
      .setDescription("Name for this watch (default: campground-arrival)")
      .setRequired(false)
      .setMaxLength(100)
  );

export async function handleWatch(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  const campground = interaction.options.getString("campground", true).trim();
  const arrivalInput = interaction.options.getString("arrival", true);
  const departureInput = interaction.options.getString("departure", true);
  const nameInput = interaction.options.getString("name")?.trim();

  // Defer reply since the first check hits the provider
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  let request: CheckRequest;
  let stayLabel: string;
  let crossesMonth: boolean;
  try {
    const stay = parseStay({ arrival: arrivalInput, departure: departureInput });

    if (stay.departure <= stay.arrival) {
      const embed = new EmbedBuilder()
        .setTitle("Invalid Stay")
        .setDescription("Departure must be after arrival")
        .setColor(0xe74c3c);

      await interaction.editReply({ embeds: [embed] });
      return;
    }

    const arrival = formatRequestDate(stay.arrival);
    request = {
      name: nameInput || `${campground}-${arrival}`,
      campground,
      arrival,
      departure: formatRequestDate(stay.departure),
    };
    stayLabel = `${formatStayDate(stay.arrival)} - ${formatStayDate(stay.departure)}`;
    crossesMonth = spansMonths(stay);
  } catch (error) {
    if (!(error instanceof MalformedRequestError)) throw error;

    const embed = new EmbedBuilder()
      .setTitle("Invalid Date Format")
      .setDescription(`${error.message} (e.g., 2024-6-14)`)
      .setColor(0xe74c3c);

    await interaction.editReply({ embeds: [embed] });
    return;
  }

  try {
    context.jobs.createJob(request, interaction.user.id);
  } catch (error) {
    if (!(error instanceof JobConflictError)) throw error;

    const embed = new EmbedBuilder()
      .setTitle("Watch Already Exists")
      .setDescription(`A watch named **${request.name}** is already running`)
      .setColor(0xf39c12)
      .setFooter({ text: "Pick another name or use /unwatch first" });

    await interaction.editReply({ embeds: [embed] });
    return;
  }

  // First check right away instead of waiting a full interval
  await context.jobs.runJob(request.name);
  const job = context.jobs.getJob(request.name);
  const firstCheck = job
    ? job.lastOutcome ?? "pending"
    : "Sites found - watch closed";

  const embed = buildWatchCreatedEmbed({
    request,
    stayLabel,
    crossesMonth,
    firstCheck,
    checkIntervalMs: context.checkIntervalMs,
  });

  await interaction.editReply({ embeds: [embed] });
}

/**
 * Confirmation embed for a new watch
 */
export function buildWatchCreatedEmbed(details: {
  request: CheckRequest;
  stayLabel: string;
  crossesMonth: boolean;
  firstCheck: string;
  checkIntervalMs: number;
}): EmbedBuilder {
  const { request } = details;

  const embed = new EmbedBuilder()
    .setTitle("Watch Created")
    .setDescription(`Watching campground **${request.campground}** as **${request.name}**`)
    .setColor(details.crossesMonth ? 0xf39c12 : 0x2ecc71)
    .addFields(
      { name: "Stay", value: details.stayLabel, inline: true },
      {
        name: "Check Interval",
        value: `${Math.round(details.checkIntervalMs / 60000)} minutes`,
        inline: true,
      },
      { name: "First Check", value: details.firstCheck.slice(0, 1024) }
    )
    .setFooter({ text: "Use /watches to see status, /unwatch to stop" });

  // Only the arrival month is fetched, so nights past it never show as free
  if (details.crossesMonth) {
    embed.addFields({
      name: "Warning",
      value: "This stay crosses into the next month. Only the arrival month is checked, so this watch cannot find a match.",
    });
  }

  return embed;
}
