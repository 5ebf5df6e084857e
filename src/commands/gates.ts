import { PermissionDeniedError } from "../config/errors.js";
import { normalizeId } from "../config/types.js";
import type { InboundMessage, PolicyEngine } from "../gateway/policy-engine.js";
import { logDebug } from "../logger.js";
import { hasCapability, type Capability } from "../rbac/permissions.js";
import type { CommandHandlerResult, CommandInvocation } from "./types.js";

export function invocationContext(invocation: CommandInvocation): InboundMessage {
  return {
    channelType: invocation.channelType,
    groupId: invocation.groupId,
    userId: invocation.senderId,
  };
}

/**
 * Blocks every command while `settings.enable_chat_commands` is off for the
 * sender's context. Returns null when commands may run.
 */
export function rejectDisabledCommands(
  engine: PolicyEngine,
  invocation: CommandInvocation,
): CommandHandlerResult | null {
  if (engine.resolveBoolean("settings.enable_chat_commands", invocationContext(invocation))) {
    return null;
  }
  logDebug(`Ignoring command from ${normalizeId(invocation.senderId)}: chat commands are disabled here`);
  return {
    ok: false,
    reply: { text: "⚠️ Chat commands are disabled. Set settings.enable_chat_commands=true to enable." },
  };
}

/**
 * Gate for commands that need a capability (in practice: admin-only ones).
 * Returns a rejection when the sender lacks it; null otherwise.
 */
export function rejectWithoutCapability(
  engine: PolicyEngine,
  invocation: CommandInvocation,
  capability: Capability,
  commandLabel: string,
): CommandHandlerResult | null {
  const senderId = normalizeId(invocation.senderId);
  if (hasCapability(engine.roles(senderId), capability)) {
    return null;
  }
  logDebug(`Blocking ${commandLabel} (needs ${capability}) from sender ${senderId}`);
  const error = new PermissionDeniedError({ requesterId: senderId, reason: `${commandLabel} requires admin access.` });
  return { ok: false, reply: { text: `⛔ ${error.message}` }, error };
}

/** First gate that rejects, or null. */
export function firstRejection(
  ...gates: Array<() => CommandHandlerResult | null>
): CommandHandlerResult | null {
  for (const gate of gates) {
    const rejection = gate();
    if (rejection) {
      return rejection;
    }
  }
  return null;
}
