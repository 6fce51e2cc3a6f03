import { promises as fs } from "node:fs";
import path from "node:path";
import type { TelegramBotLike } from "../telegram/sendTelegramMessageSafe.js";
import { sendTelegramMessageSafe } from "../telegram/sendTelegramMessageSafe.js";
import { describeError } from "./errors.js";

export type StartupAnnounceResult =
  | { sent: true; skipped: false; reason: "sent" }
  | { sent: false; skipped: true; reason: "cooldown" }
  | { sent: false; skipped: true; reason: "state_read_error" }
  | { sent: false; skipped: true; reason: "send_failed" };

/** What the engine was started with; a change is announced even inside the cooldown. */
export type StartupProfile = {
  route: string;
  alertMode: string;
  runLimit: number;
};

function profileKey(profile: StartupProfile | undefined): string {
  return profile ? `${profile.route}|${profile.alertMode}|${profile.runLimit}` : "";
}

function getDefaultStateFile(instanceId: string): string {
  // /tmp survives most restart loops on the same host, which keeps the chat quiet.
  return `/tmp/autopilot-startup-${instanceId}.json`;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function announceStartupThrottled(opts: {
  bot: TelegramBotLike;
  chatId: number;
  instanceId: string;
  text: string;
  profile?: StartupProfile;
  cooldownMs?: number;
  stateFile?: string;
  now?: number;
}): Promise<StartupAnnounceResult> {
  const cooldownMs = opts.cooldownMs ?? 10 * 60 * 1000; // 10 minutes
  const stateFile = (opts.stateFile || process.env.STARTUP_ANNOUNCE_STATE_FILE || getDefaultStateFile(opts.instanceId)).trim();

  const now = opts.now ?? Date.now();
  const profile = profileKey(opts.profile);

  try {
    const raw = await fs.readFile(stateFile, "utf8");
    const parsed: unknown = JSON.parse(raw);
    const record = typeof parsed === "object" && parsed !== null ? parsed : {};
    const lastSentAt: unknown = Reflect.get(record, "lastSentAt");
    const lastProfile: unknown = Reflect.get(record, "profile") ?? "";
    const sameProfile = lastProfile === profile;
    if (sameProfile && typeof lastSentAt === "number" && lastSentAt > 0 && now - lastSentAt < cooldownMs) {
      return { sent: false, skipped: true, reason: "cooldown" };
    }
  } catch (err: unknown) {
    // Unreadable or corrupt state: skip announcing rather than make a restart loop noisier.
    if (!isMissingFile(err)) {
      console.warn(`[startup] startup announce state read failed: ${describeError(err)}`);
      return { sent: false, skipped: true, reason: "state_read_error" };
    }
  }

  try {
    await sendTelegramMessageSafe(opts.bot, opts.chatId, opts.text);
  } catch (err: unknown) {
    console.warn(`[startup] startup announce send failed: ${describeError(err)}`);
    return { sent: false, skipped: true, reason: "send_failed" };
  }

  try {
    await fs.mkdir(path.dirname(stateFile), { recursive: true });
    await fs.writeFile(stateFile, JSON.stringify({ lastSentAt: now, profile }) + "\n", "utf8");
  } catch (err: unknown) {
    // Already sent; only the throttle record is lost.
    console.warn(`[startup] startup announce state write failed: ${describeError(err)}`);
  }

  return { sent: true, skipped: false, reason: "sent" };
}
