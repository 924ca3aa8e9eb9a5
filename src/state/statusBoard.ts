import type { StatusDisplay, StatusSnapshot } from "../types.js";
import { buildStatusCard, type StatusCard } from "../ui/builders.js";

type PublishStatus = (card: StatusCard, options: { forced: boolean }) => void | Promise<void>;

interface StatusBoardOptions {
  /** Called with every refresh, e.g. to push the card to a client. */
  publish?: PublishStatus;
  now?: () => Date;
}

/**
 * Keeps the most recent status card and publishes every refresh, telling periodic
 * countdown updates apart from forced ones (state transitions).
 */
export class StatusBoard implements StatusDisplay {
  private card: StatusCard;
  private readonly publish?: PublishStatus;
  private readonly now: () => Date;
  private refreshCount = 0;

  constructor(options: StatusBoardOptions = {}) {
    this.publish = options.publish;
    this.now = options.now ?? (() => new Date());
    this.card = buildStatusCard({ status: "idle", intervalIndex: -1, remainingMs: 0, lapCount: 0 }, this.now());
  }

  get latest(): StatusCard {
    return this.card;
  }

  get refreshes(): number {
    return this.refreshCount;
  }

  async refresh(status: StatusSnapshot, options: { forced: boolean }): Promise<void> {
    this.card = buildStatusCard(status, this.now());
    this.refreshCount += 1;
    if (this.publish) {
      await this.publish(this.card, { forced: options.forced });
    }
  }
}
