export { packMessages, splitLongLine } from "./packer";

export { renderDigestBlocks, formatEntryLine, resolveTimeZone } from "./renderer";
export type { DigestRenderInput } from "./renderer";

export { createDiscordSender } from "./sender";
export type { SendResult, SendMessageFn, DiscordSenderOptions } from "./sender";

export { runDigest } from "./orchestrator";
export type { DigestRunDeps, DigestRunSummary, SleepFn } from "./orchestrator";
