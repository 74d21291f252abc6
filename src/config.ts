import { Ecc, type Version } from "./tables";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type Config = Readonly<{
  logLevel: LogLevel;
  // "auto" picks the smallest version that fits the text.
  version: Version | "auto";
  ecc: Ecc;
  // Pixels per module in PNG output.
  pngScale: number;
}>;

type Env = Readonly<Record<string, string | undefined>>;

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name];
  return value?.trim().length ? value.trim() : undefined;
}

function asIntStrict(name: string, value: string): number {
  if (!/^-?\d+$/.test(value)) throw new Error(`Invalid int env ${name}: ${value}`);
  return Number(value);
}

function parseLogLevel(env: Env): LogLevel {
  const raw = optional(env, "QR_LOG_LEVEL")?.toLowerCase() ?? "warn";
  if (!isLogLevel(raw)) throw new Error(`Invalid QR_LOG_LEVEL: ${raw}`);
  return raw;
}

function parseVersion(env: Env): Version | "auto" {
  const raw = optional(env, "QR_VERSION")?.toLowerCase() ?? "auto";
  if (raw === "auto") return "auto";
  if (raw === "1") return 1;
  if (raw === "2") return 2;
  throw new Error(`Invalid QR_VERSION (expected 1, 2 or auto): ${raw}`);
}

function parseEcc(env: Env): Ecc {
  const raw = optional(env, "QR_ECC") ?? "M";
  try {
    return Ecc.fromName(raw);
  } catch (err) {
    throw new Error(`Invalid QR_ECC (expected L, M, Q or H): ${raw}`, { cause: err });
  }
}

function parsePngScale(env: Env): number {
  const raw = optional(env, "QR_PNG_SCALE");
  if (raw === undefined) return 10;
  const value = asIntStrict("QR_PNG_SCALE", raw);
  if (value <= 0) throw new Error(`QR_PNG_SCALE must be > 0 (got: ${value})`);
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  return Object.freeze({
    logLevel: parseLogLevel(env),
    version: parseVersion(env),
    ecc: parseEcc(env),
    pngScale: parsePngScale(env),
  });
}
