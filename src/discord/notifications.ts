/**
 * Discord Notifications Service
 * Posts availability alerts to Discord webhooks
 */
import { EmbedBuilder, WebhookClient } from "discord.js";
import { NotificationError, describeError } from "../errors";
import { logger } from "../logger";

/**
 * What gets announced when a stay can be booked
 */
export interface AvailabilityNotification {
  campground: string;
  sites: string[];
  arrival: string; // formatted, e.g. "Tue Mar 5"
  departure: string;
}

/**
 * A notification channel. Resolves once delivery is acknowledged,
 * rejects if it was not.
 */
export interface NotificationSender {
  readonly channel: string;
  send(notification: AvailabilityNotification): Promise<void>;
}

const MAX_LISTED_SITES = 50;

/**
 * Build the alert embed for a set of available sites
 */
export function buildAvailabilityEmbed(notification: AvailabilityNotification): EmbedBuilder {
  const { campground, sites, arrival, departure } = notification;

  const listed = sites.slice(0, MAX_LISTED_SITES).join(",");
  const moreCount = sites.length > MAX_LISTED_SITES ? ` (+${sites.length - MAX_LISTED_SITES} more)` : "";

  return new EmbedBuilder()
    .setTitle(`Available sites found for ${campground} between ${arrival} and ${departure}`)
    .setDescription(`Found these available sites: ${listed}${moreCount}`)
    .setColor(0x2ecc71)
    .setURL(`https://www.recreation.gov/camping/campgrounds/${encodeURIComponent(campground)}`)
    .setTimestamp();
}

/**
 * Sends alerts through a single Discord webhook
 */
export class DiscordWebhookNotifier implements NotificationSender {
  readonly channel: string;
  private webhook: WebhookClient;

  constructor(url: string) {
    this.webhook = new WebhookClient({ url });
    this.channel = `webhook:${this.webhook.id}`;
  }

  async send(notification: AvailabilityNotification): Promise<void> {
    await this.webhook.send({ embeds: [buildAvailabilityEmbed(notification)] });
    logger.debug(
      { channel: this.channel, campground: notification.campground },
      "Sent webhook notification"
    );
  }

  destroy(): void {
    this.webhook.destroy();
  }
}

/**
 * Delivers to every channel at once and waits for all acknowledgements.
 * Any failed channel fails the whole send.
 */
export class FanOutNotifier implements NotificationSender {
  readonly channel = "fan-out";
  private senders: NotificationSender[];

  constructor(senders: NotificationSender[]) {
    this.senders = senders;
  }

  async send(notification: AvailabilityNotification): Promise<void> {
    if (this.senders.length === 0) {
      throw new NotificationError("No notification channels configured");
    }

    const results = await Promise.allSettled(
      this.senders.map((sender) => sender.send(notification))
    );

    const failures: unknown[] = [];
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        failures.push(result.reason);
        logger.error(
          { channel: this.senders[index].channel, error: describeError(result.reason) },
          "Failed to deliver notification"
        );
      }
    });

    if (failures.length > 0) {
      throw new NotificationError(
        `${failures.length} of ${this.senders.length} notifications did not send`,
        failures
      );
    }
  }
}

/**
 * Create the fan-out notifier for the configured webhook URLs
 */
export function createWebhookNotifier(urls: string[]): {
  notifier: FanOutNotifier;
  destroy: () => void;
} {
  const webhooks = urls.map((url) => new DiscordWebhookNotifier(url));
  return {
    notifier: new FanOutNotifier(webhooks),
    destroy: () => webhooks.forEach((webhook) => webhook.destroy()),
  };
}
