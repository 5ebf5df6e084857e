/**
 * Picks which random events fire for an inbound message. The event handlers
 * themselves (repeating a message, …) live with the message layer.
 */
import type { Resolver } from "../config/resolve.js";
import { RandomEventSchema } from "../config/schema.js";
import type { ConfigStore } from "../config/store.js";
import type { ScopeContext } from "../config/types.js";
import { logDebug, logWarn } from "../logger.js";
import type { PermissionRegistry } from "../rbac/registry.js";
import type { EventCooldownTracker } from "./cooldown.js";

export class RandomEventDispatcher {
  private readonly store: ConfigStore;
  private readonly resolver: Resolver;
  private readonly registry: PermissionRegistry;
  private readonly tracker: EventCooldownTracker;

  constructor(deps: {
    store: ConfigStore;
    resolver: Resolver;
    registry: PermissionRegistry;
    tracker: EventCooldownTracker;
  }) {
    this.store = deps.store;
    this.resolver = deps.resolver;
    this.registry = deps.registry;
    this.tracker = deps.tracker;
  }

  /** Ids of the events declared under the top-level `random_events` section. */
  eventIds(): string[] {
    return Object.keys(this.store.snapshot().random_events)
      .filter((id) => !id.includes("."))
      .sort();
  }

  /** Run every enabled event through its cooldown gate; returns the ids that fired. */
  select(context: ScopeContext): string[] {
    const scoped: ScopeContext = { ...context, role: context.role ?? this.registry.roleBlockFor(context) };
    const groupId = scoped.channelType === "group" ? scoped.groupId : undefined;

    if (!this.resolver.resolveBoolean("settings.enable_random_events", scoped)) {
      return [];
    }
    if (this.registry.isBlacklisted(scoped.userId, groupId)) {
      logDebug(`Skipping random events for blacklisted user ${scoped.userId}`);
      return [];
    }

    const fired: string[] = [];
    for (const eventId of this.eventIds()) {
      const parsed = RandomEventSchema.safeParse(this.resolver.resolve(`random_events.${eventId}`, scoped).value);
      if (!parsed.success) {
        logWarn(`Random event '${eventId}' has an invalid effective config; skipping`);
        continue;
      }
      const event = parsed.data;
      if (!event.enabled) {
        continue;
      }
      const triggered = this.tracker.tryTrigger(eventId, scoped, {
        probability: event.probability,
        personalIntervalSec: event.min_interval,
        sharedIntervalSec: event.shared_min_interval,
      });
      if (triggered) {
        fired.push(eventId);
      }
    }
    return fired;
  }
}
