/**
 * Probability-plus-cooldown gate for random events.
 *
 * A personal cooldown (`personalIntervalSec >= 0`) is tracked per (event,
 * user). With the personal gate off (`-1`), a group can share one cooldown
 * per (event, group). The random draw only happens once the gate is open,
 * and a timestamp is stamped only when the event fires.
 */
import type { ChannelType } from "../config/types.js";
import { normalizeId } from "../config/types.js";
import { MutationGate } from "../infra/mutation-gate.js";
import { logDebug } from "../logger.js";

export type RandomSource = () => number;

export type TriggerContext = {
  channelType: ChannelType;
  groupId?: string | number;
  userId: string | number;
};

export type TriggerParams = {
  probability: number;
  personalIntervalSec: number;
  sharedIntervalSec: number;
};

export type CooldownGate = "personal" | "shared" | "none";

export type TriggerEvaluation = {
  fired: boolean;
  gate: CooldownGate;
  /** The gate was still cooling down; no draw was made. */
  coolingDown: boolean;
  /** Key to stamp with `now` when `fired`. */
  stampKey?: string;
};

/** Last-trigger timestamps (epoch ms) by cooldown key. */
export type CooldownLookup = (key: string) => number | undefined;

export function personalCooldownKey(eventId: string, userId: string | number): string {
  return `${eventId}:user:${normalizeId(userId)}`;
}

export function sharedCooldownKey(eventId: string, groupId: string | number): string {
  return `${eventId}:group:${normalizeId(groupId)}`;
}

function elapsed(last: number | undefined, nowMs: number, intervalSec: number): boolean {
  return last === undefined || nowMs - last >= intervalSec * 1000;
}

/**
 * Decide whether an event fires. Pure: reads timestamps through `lastTrigger`
 * and never writes them.
 */
export function evaluateEventTrigger(params: {
  eventId: string;
  context: TriggerContext;
  trigger: TriggerParams;
  nowMs: number;
  lastTrigger: CooldownLookup;
  random: RandomSource;
}): TriggerEvaluation {
  const { eventId, context, trigger, nowMs, lastTrigger, random } = params;

  let gate: CooldownGate = "none";
  let stampKey: string | undefined;
  if (trigger.personalIntervalSec >= 0) {
    gate = "personal";
    stampKey = personalCooldownKey(eventId, context.userId);
    if (!elapsed(lastTrigger(stampKey), nowMs, trigger.personalIntervalSec)) {
      return { fired: false, gate, coolingDown: true };
    }
  } else if (
    trigger.personalIntervalSec === -1 &&
    context.channelType === "group" &&
    context.groupId !== undefined &&
    trigger.sharedIntervalSec > 0
  ) {
    gate = "shared";
    stampKey = sharedCooldownKey(eventId, context.groupId);
    if (!elapsed(lastTrigger(stampKey), nowMs, trigger.sharedIntervalSec)) {
      return { fired: false, gate, coolingDown: true };
    }
  }

  const fired = random() < trigger.probability;
  return { fired, gate, coolingDown: false, stampKey };
}

export class EventCooldownTracker {
  private readonly lastTriggered = new Map<string, number>();
  private readonly gate = new MutationGate("cooldown");
  private readonly random: RandomSource;
  private readonly now: () => number;

  constructor(options: { random?: RandomSource; now?: () => number } = {}) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => Date.now());
  }

  tryTrigger(eventId: string, context: TriggerContext, trigger: TriggerParams): boolean {
    return this.gate.run(eventId, () => {
      const nowMs = this.now();
      const result = evaluateEventTrigger({
        eventId,
        context,
        trigger,
        nowMs,
        lastTrigger: (key) => this.lastTriggered.get(key),
        random: this.random,
      });
      if (result.fired && result.stampKey !== undefined) {
        this.lastTriggered.set(result.stampKey, nowMs);
      }
      if (result.fired) {
        logDebug(`Random event '${eventId}' fired (gate: ${result.gate})`);
      }
      return result.fired;
    });
  }

  /** Epoch ms of the last personal or shared trigger for a key, if any. */
  lastTriggeredAt(key: string): number | undefined {
    return this.lastTriggered.get(key);
  }

  reset(): void {
    this.gate.run("reset", () => this.lastTriggered.clear());
  }
}
