import { posix } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_BASE_URL } from "./network";

export const DEFAULT_MOUNT_POINT = "/mnt/temp_usb";
export const BOOT_FILE_PATH = "EFI/BOOT/BOOTX64.EFI";

export const ConfigSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((u) => /^https?:\/\//i.test(u), { message: "must be an http(s) URL" }),
  mountPoint: z
    .string()
    .refine((p) => p.startsWith("/") && p !== "/", { message: "must be an absolute path below /" }),
  sudo: z.boolean(),
  verbose: z.boolean(),
});

export type BootmakerConfig = z.infer<typeof ConfigSchema>;
export type ConfigOverrides = Partial<BootmakerConfig>;

export const DEFAULT_CONFIG: BootmakerConfig = {
  baseUrl: DEFAULT_BASE_URL,
  mountPoint: DEFAULT_MOUNT_POINT,
  sudo: true,
  verbose: false,
};

const ENV_PREFIX = "ZOS_BOOTMAKER_";

function envFlag(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[ENV_PREFIX + name];
  if (raw === undefined || raw === "") return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  throw new ConfigError(`Invalid value for ${ENV_PREFIX + name}: '${raw}' (expected 1/0, true/false, yes/no)`);
}

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[ENV_PREFIX + name];
  return raw === undefined || raw.trim() === "" ? undefined : raw.trim();
}

function definedOnly(overrides: ConfigOverrides): ConfigOverrides {
  const out: ConfigOverrides = {};
  if (overrides.baseUrl !== undefined) out.baseUrl = overrides.baseUrl;
  if (overrides.mountPoint !== undefined) out.mountPoint = overrides.mountPoint;
  if (overrides.sudo !== undefined) out.sudo = overrides.sudo;
  if (overrides.verbose !== undefined) out.verbose = overrides.verbose;
  return out;
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  return definedOnly({
    baseUrl: envString(env, "BASE_URL"),
    mountPoint: envString(env, "MOUNT_POINT"),
    sudo: envFlag(env, "SUDO"),
    verbose: envFlag(env, "VERBOSE"),
  });
}

/** Defaults, then environment, then command-line flags. */
export function resolveConfig(env: NodeJS.ProcessEnv, flags: ConfigOverrides = {}): BootmakerConfig {
  const merged = { ...DEFAULT_CONFIG, ...configFromEnv(env), ...definedOnly(flags) };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const mountPoint = parsed.data.mountPoint.replace(/\/+$/, "");
  return { ...parsed.data, mountPoint };
}

export function bootFileTarget(config: BootmakerConfig): string {
  return posix.join(config.mountPoint, BOOT_FILE_PATH);
}

export function bootDirectory(config: BootmakerConfig): string {
  return posix.dirname(bootFileTarget(config));
}
