import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import { FieldReader } from "../runtime/validation.ts";
import { errorMessage } from "../types/errors.ts";
import type { AutomationEngine } from "./automation-engine.ts";
import { AUTOMATION_PROFILES, DEFAULT_TOGGLES } from "./types.ts";
import type { AutomationProfile, AutomationToggles } from "./types.ts";

// ── Settings ────────────────────────────────────────────────────────────────

export interface AutomationSettings {
  readonly profile: AutomationProfile;
  readonly toggles: AutomationToggles;
  readonly killSwitch: boolean;
}

export const DEFAULT_AUTOMATION_SETTINGS: AutomationSettings = {
  profile: "off",
  toggles: DEFAULT_TOGGLES,
  killSwitch: false,
};

export class SettingsError extends Error {
  override readonly name = "SettingsError";

  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
  }
}

// ── File System (DI for testability) ────────────────────────────────────────

export interface SettingsFileSystem {
  /** File contents, or null when the file does not exist. */
  readFile(path: string): Promise<string | null>;
  writeFile(path: string, content: string): Promise<void>;
  mkdir(path: string): Promise<void>;
}

export const NODE_SETTINGS_FILE_SYSTEM: SettingsFileSystem = {
  readFile: async (path) => {
    try {
      return await readFile(path, "utf-8");
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }
  },
  writeFile: async (path, content) => {
    await writeFile(path, content, "utf-8");
  },
  mkdir: async (path) => {
    await mkdir(path, { recursive: true });
  },
};

// ── Parsing ─────────────────────────────────────────────────────────────────

/** Missing keys fall back to defaults; present keys must be well-typed. */
export function parseSettings(text: string, path: string): AutomationSettings {
  let value: unknown;
  try {
    value = parseYaml(text);
  } catch (err: unknown) {
    throw new SettingsError(`Could not parse ${path}: ${errorMessage(err)}`, path);
  }
  if (value === null || value === undefined) return DEFAULT_AUTOMATION_SETTINGS;

  const errors: string[] = [];
  const fields = FieldReader.of(value, "settings", errors);
  if (!fields) throw new SettingsError(`Invalid ${path}: ${errors.join("; ")}`, path);

  const profile = fields.has("profile")
    ? fields.oneOf("profile", AUTOMATION_PROFILES)
    : DEFAULT_AUTOMATION_SETTINGS.profile;
  const killSwitch = fields.has("killSwitch")
    ? fields.boolean("killSwitch")
    : DEFAULT_AUTOMATION_SETTINGS.killSwitch;

  let toggles: AutomationToggles | undefined = DEFAULT_TOGGLES;
  if (fields.has("toggles")) {
    const t = FieldReader.of(fields.raw("toggles"), fields.at("toggles"), errors);
    const read = (key: keyof AutomationToggles): boolean | undefined =>
      t?.has(key) ? t.boolean(key) : DEFAULT_TOGGLES[key];
    const quickEDAOnMount = read("quickEDAOnMount");
    const cleanOnHighNulls = read("cleanOnHighNulls");
    const plotsOnMissing = read("plotsOnMissing");
    toggles =
      quickEDAOnMount !== undefined && cleanOnHighNulls !== undefined && plotsOnMissing !== undefined
        ? { quickEDAOnMount, cleanOnHighNulls, plotsOnMissing }
        : undefined;
  }

  if (errors.length > 0 || !profile || killSwitch === undefined || !toggles) {
    throw new SettingsError(`Invalid ${path}: ${errors.join("; ")}`, path);
  }
  return { profile, toggles, killSwitch };
}

// ── Settings Store ──────────────────────────────────────────────────────────

export interface SettingsStoreOptions {
  readonly fs?: SettingsFileSystem;
  readonly logger?: Logger;
}

/**
 * User-facing automation settings, persisted as YAML. Every change made
 * through the store is applied to the engine and written back to disk.
 */
export class AutomationSettingsStore {
  private readonly fs: SettingsFileSystem;
  private readonly logger: Logger;
  private current: AutomationSettings = DEFAULT_AUTOMATION_SETTINGS;

  constructor(
    readonly filePath: string,
    private readonly engine: AutomationEngine,
    options: SettingsStoreOptions = {},
  ) {
    this.fs = options.fs ?? NODE_SETTINGS_FILE_SYSTEM;
    this.logger = (options.logger ?? NULL_LOGGER).child({ module: "settings-store" });
  }

  settings(): AutomationSettings {
    return this.current;
  }

  /** Read the file (defaults when absent) and apply it to the engine. */
  async load(): Promise<AutomationSettings> {
    const text = await this.fs.readFile(this.filePath);
    this.current = text === null ? DEFAULT_AUTOMATION_SETTINGS : parseSettings(text, this.filePath);
    this.sync();
    this.logger.info("automation_settings_loaded", {
      path: this.filePath,
      profile: this.current.profile,
      killSwitch: this.current.killSwitch,
    });
    return this.current;
  }

  /** Push the current settings into the engine. */
  sync(): void {
    this.engine.updateProfile(this.current.profile);
    this.engine.updateToggles(this.current.toggles);
    this.engine.setKillSwitch(this.current.killSwitch);
  }

  async setProfile(profile: AutomationProfile): Promise<void> {
    this.current = { ...this.current, profile };
    this.engine.updateProfile(profile);
    await this.save();
  }

  async setToggles(toggles: AutomationToggles): Promise<void> {
    this.current = { ...this.current, toggles: { ...toggles } };
    this.engine.updateToggles(toggles);
    await this.save();
  }

  async setKillSwitch(enabled: boolean): Promise<void> {
    this.current = { ...this.current, killSwitch: enabled };
    this.engine.setKillSwitch(enabled);
    await this.save();
  }

  pauseForTenMinutes(): void {
    this.engine.pauseForTenMinutes();
  }

  resume(): void {
    this.engine.resume();
  }

  private async save(): Promise<void> {
    await this.fs.mkdir(dirname(this.filePath));
    await this.fs.writeFile(this.filePath, stringifyYaml(this.current));
  }
}
