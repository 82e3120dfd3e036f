/**
 * Discord Bot
 * Handles watch management slash commands
 */
import {
  Client,
  Events,
  GatewayIntentBits,
  MessageFlags,
  REST,
  Routes,
  type Interaction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";
import { logger } from "../logger";
import { describeError } from "../errors";

// Import commands
import { watchCommand, handleWatch } from "./commands/watch";
import { unwatchCommand, handleUnwatch } from "./commands/unwatch";
import { watchesCommand, handleWatches } from "./commands/watches";
import type { CommandContext, CommandHandler } from "./commands/types";

/**
 * All slash commands
 */
const commands: RESTPostAPIChatInputApplicationCommandsJSONBody[] = [
  watchCommand.toJSON(),
  unwatchCommand.toJSON(),
  watchesCommand.toJSON(),
];

/**
 * Command handlers map
 */
const commandHandlers: Record<string, CommandHandler> = {
  watch: handleWatch,
  unwatch: handleUnwatch,
  watches: handleWatches,
};

/**
 * Discord bot class
 */
export class DiscordBot {
  private client: Client;
  private token: string;
  private clientId: string;
  private context: CommandContext;

  constructor(config: { token: string; clientId: string; context: CommandContext }) {
    this.token = config.token;
    this.clientId = config.clientId;
    this.context = config.context;

    this.client = new Client({
      intents: [GatewayIntentBits.Guilds],
    });

    this.setupEventHandlers();
  }

  /**
   * Set up event handlers
   */
  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, () => {
      logger.info(
        { username: this.client.user?.tag },
        "Discord bot is ready"
      );
    });

    this.client.on(Events.InteractionCreate, async (interaction: Interaction) => {
      if (!interaction.isChatInputCommand()) return;

      const handler = commandHandlers[interaction.commandName];
      if (!handler) {
        logger.warn(
          { command: interaction.commandName },
          "Unknown command received"
        );
        return;
      }

      try {
        await handler(interaction, this.context);
      } catch (error) {
        logger.error(
          { command: interaction.commandName, error: describeError(error) },
          "Error handling command"
        );

        const errorMessage = "An error occurred while processing your command.";
        try {
          if (interaction.replied || interaction.deferred) {
            await interaction.followUp({ content: errorMessage, flags: MessageFlags.Ephemeral });
          } else {
            await interaction.reply({ content: errorMessage, flags: MessageFlags.Ephemeral });
          }
        } catch (replyError) {
          logger.error(
            { command: interaction.commandName, error: describeError(replyError) },
            "Failed to report command error"
          );
        }
      }
    });

    this.client.on(Events.Error, (error) => {
      logger.error({ error: describeError(error) }, "Discord client error");
    });
  }

  /**
   * Register slash commands with Discord
   */
  async registerCommands(): Promise<void> {
    const rest = new REST().setToken(this.token);

    try {
      logger.info(
        { commandCount: commands.length },
        "Registering slash commands..."
      );

      await rest.put(Routes.applicationCommands(this.clientId), {
        body: commands,
      });

      logger.info("Slash commands registered successfully");
    } catch (error) {
      logger.error({ error: describeError(error) }, "Failed to register commands");
      throw error;
    }
  }

  /**
   * Start the bot
   */
  async start(): Promise<void> {
    await this.registerCommands();
    await this.client.login(this.token);
    logger.info("Discord bot started");
  }

  /**
   * Stop the bot
   */
  async stop(): Promise<void> {
    await this.client.destroy();
    logger.info("Discord bot stopped");
  }
}
