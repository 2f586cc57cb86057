// Slack Web API client for Bug Sleuth notifications.
// Limitations: Only chat.postMessage is supported.

import { ServiceApiError } from "./errors.js";
import { logger } from "./logger.js";
import type { ChatNotifier, SlackBlock, SlackConfig } from "./types.js";

const SLACK_API_BASE = "https://slack.com/api";

export class SlackClient implements ChatNotifier {
  private config: SlackConfig;
  private fetchImpl: typeof fetch;

  constructor(config: SlackConfig, fetchImpl: typeof fetch = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async postMessage(
    channel: string,
    text: string,
    blocks?: SlackBlock[]
  ): Promise<void> {
    logger.debug("Posting Slack message.", { channel });

    const response = await this.fetchImpl(`${SLACK_API_BASE}/chat.postMessage`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.botToken}`,
        "Content-Type": "application/json; charset=utf-8",
      },
      body: JSON.stringify(blocks ? { channel, text, blocks } : { channel, text }),
    });
    if (response.status !== 200) {
      throw new ServiceApiError("Slack", response.status, await response.text());
    }

    // Slack reports most failures as 200 with ok=false.
    const data: unknown = await response.json();
    if (typeof data !== "object" || data === null || !("ok" in data) || data.ok !== true) {
      const detail =
        typeof data === "object" && data !== null && "error" in data && typeof data.error === "string"
          ? data.error
          : "unknown error";
      throw new ServiceApiError("Slack", response.status, detail);
    }
  }
}
