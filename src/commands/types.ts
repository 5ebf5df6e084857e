import type { PolicyError } from "../config/errors.js";
import type { ChannelType } from "../config/types.js";

/** Who issued a command and where. Parsing the chat text into a request is the caller's job. */
export type CommandInvocation = {
  senderId: string | number;
  channelType: ChannelType;
  groupId?: string | number;
};

export type ReplyPayload = {
  text: string;
};

export type CommandHandlerResult =
  | { ok: true; reply: ReplyPayload }
  | { ok: false; reply: ReplyPayload; error?: PolicyError };
