import fs from "fs";
import os from "os";
import path from "path";
import { z } from "zod";
import { DEFAULT_BASE_URL } from "./client.js";

export type Profile = {
  baseUrl: string;
  token: string;
  username?: string;
};

export type ConfigFile = {
  current: string;
  profiles: Record<string, Profile>;
};

export class ProfileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProfileError";
  }
}

const storedProfileSchema = z.object({
  base_url: z.string().nullish(),
  token: z.string().nullish(),
  username: z.string().nullish()
});

const storedConfigSchema = z.object({
  current: z.string().nullish(),
  profiles: z.record(storedProfileSchema).nullish()
});

export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  if (xdg && xdg.trim().length > 0) {
    return path.join(xdg.trim(), "bb");
  }
  return path.join(os.homedir(), ".config", "bb");
}

export function getConfigPath(): string {
  return explicitConfigPath() ?? path.join(getConfigDir(), "config.json");
}

/** Where earlier releases kept the file: the platform's own config directory. */
export function getLegacyConfigPath(): string | undefined {
  if (explicitConfigPath()) {
    return undefined;
  }
  let base: string | undefined;
  if (process.platform === "darwin") {
    base = path.join(os.homedir(), "Library", "Application Support");
  } else if (process.platform === "win32") {
    base = process.env.APPDATA?.trim() || undefined;
  }
  if (!base) {
    return undefined;
  }
  const legacy = path.join(base, "bb", "config.json");
  return legacy === getConfigPath() ? undefined : legacy;
}

export function ensureConfigDir(): void {
  const file = getConfigPath();
  const dir = path.dirname(file);

  fs.mkdirSync(dir, { recursive: true, mode: 0o700 });

  // An explicit BB_CONFIG_PATH may live in a shared directory; only the
  // default location is held to owner-only permissions.
  if (explicitConfigPath()) {
    return;
  }

  const stats = fs.statSync(dir);
  const mode = stats.mode & 0o777;
  if (mode & 0o077) {
    throw new Error(
      `Config directory has insecure permissions (${mode.toString(8)}). ` +
      `Fix with: chmod 700 ${dir}`
    );
  }

  if (process.platform !== "win32") {
    const uid = process.getuid?.();
    if (uid !== undefined && stats.uid !== uid) {
      throw new Error("Config directory not owned by current user");
    }
  }
}

export function loadConfig(): ConfigFile {
  const file = getConfigPath();
  let raw = readIfExists(file);
  if (raw === undefined) {
    const legacy = getLegacyConfigPath();
    raw = legacy ? readIfExists(legacy) : undefined;
  }
  if (raw === undefined) {
    return emptyConfig();
  }
  return decodeConfig(raw);
}

export function decodeConfig(raw: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`decode config: ${error instanceof Error ? error.message : String(error)}`);
  }
  const result = storedConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new Error(`decode config: ${where}: ${issue?.message ?? "unexpected shape"}`);
  }

  const profiles: Record<string, Profile> = {};
  for (const [name, stored] of Object.entries(result.data.profiles ?? {})) {
    const profile: Profile = {
      baseUrl: stored.base_url ?? "",
      token: stored.token ?? ""
    };
    if (stored.username) profile.username = stored.username;
    profiles[name] = profile;
  }
  return { current: result.data.current ?? "", profiles };
}

export function saveConfig(config: ConfigFile): void {
  ensureConfigDir();
  const file = getConfigPath();

  const profiles: Record<string, { base_url: string; token: string; username?: string }> = {};
  for (const [name, profile] of Object.entries(config.profiles)) {
    profiles[name] = {
      base_url: profile.baseUrl,
      token: profile.token,
      ...(profile.username ? { username: profile.username } : {})
    };
  }
  const payload = JSON.stringify({ current: config.current, profiles }, null, 2);

  // Atomic write pattern: write to temp file, then rename
  const tempFile = `${file}.${process.pid}.${Date.now()}.tmp`;
  fs.writeFileSync(tempFile, payload, {
    encoding: "utf8",
    mode: 0o600,
  });
  fs.renameSync(tempFile, file);
  fs.chmodSync(file, 0o600);
}

/** Upserts a profile and makes it current. */
export function setProfile(
  config: ConfigFile,
  name: string,
  auth: { token: string; username?: string | undefined; baseUrl?: string | undefined }
): string {
  const profileName = name.trim() || "default";
  const profile: Profile = {
    baseUrl: auth.baseUrl?.trim() || DEFAULT_BASE_URL,
    token: auth.token
  };
  const username = auth.username?.trim();
  if (username) profile.username = username;
  config.profiles[profileName] = profile;
  config.current = profileName;
  return profileName;
}

/**
 * Deletes a profile, the current one when no name is given. Removing the
 * current profile selects the alphabetically first one left.
 */
export function removeProfile(config: ConfigFile, name: string): { name: string; removed: boolean } {
  const target = name.trim() || config.current;
  if (target === "") {
    return { name: "", removed: false };
  }
  if (!Object.hasOwn(config.profiles, target)) {
    return { name: target, removed: false };
  }
  delete config.profiles[target];
  if (config.current === target) {
    config.current = Object.keys(config.profiles).sort()[0] ?? "";
  }
  return { name: target, removed: true };
}

export function activeProfile(config: ConfigFile, override?: string): { name: string; profile: Profile } {
  const name = override?.trim() || config.current;
  if (name === "") {
    throw new ProfileError("no active profile");
  }
  const stored = Object.hasOwn(config.profiles, name) ? config.profiles[name] : undefined;
  if (!stored) {
    throw new ProfileError(`profile "${name}" not found`);
  }
  return {
    name,
    profile: { ...stored, baseUrl: stored.baseUrl || DEFAULT_BASE_URL }
  };
}

function emptyConfig(): ConfigFile {
  return { current: "", profiles: {} };
}

function explicitConfigPath(): string | undefined {
  const value = process.env.BB_CONFIG_PATH?.trim();
  return value ? value : undefined;
}

function readIfExists(file: string): string | undefined {
  if (!fs.existsSync(file)) return undefined;
  return fs.readFileSync(file, "utf8");
}
