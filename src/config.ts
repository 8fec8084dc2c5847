import {
  DEFAULT_ACCOUNT_CURRENCY,
  DEFAULT_EXPORT_TIMEZONE,
  DEFAULT_KEY_FIELD,
  DEFAULT_OUTPUT_FILE,
  DEFAULT_SECRET_FIELD,
  T212_BASE_URLS,
} from "./constants.js";
import { ConfigError } from "./errors.js";

export type T212Environment = keyof typeof T212_BASE_URLS;

export interface KeePassConfig {
  databasePath: string;
  entryPath: string;
  keyFilePath: string | null;
  password: string | null;
  keyField: string;
  secretField: string;
}

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new ConfigError(`Missing required env var: ${name}`, name);
  }
  return value;
}

function optional(name: string): string | null {
  return process.env[name] || null;
}

function parseEnvironment(raw: string): T212Environment {
  if (raw === "live" || raw === "demo") {
    return raw;
  }
  throw new ConfigError(`T212_ENVIRONMENT must be "live" or "demo", got "${raw}"`, "T212_ENVIRONMENT");
}

function parseCurrency(raw: string): string {
  const code = raw.trim().toUpperCase();
  if (!/^[A-Z]{3}$/.test(code)) {
    throw new ConfigError(`ACCOUNT_CURRENCY must be a 3-letter ISO code, got "${raw}"`, "ACCOUNT_CURRENCY");
  }
  return code;
}

function parseTimeZone(raw: string): string {
  try {
    new Intl.DateTimeFormat("de-DE", { timeZone: raw });
  } catch {
    throw new ConfigError(`EXPORT_TIMEZONE is not a known time zone: "${raw}"`, "EXPORT_TIMEZONE");
  }
  return raw;
}

const environment = parseEnvironment(process.env.T212_ENVIRONMENT || "live");

export const config = {
  keepass: {
    databasePath: required("KEEPASS_DATABASE"),
    entryPath: required("KEEPASS_ENTRY"),
    keyFilePath: optional("KEEPASS_KEYFILE"),
    password: optional("KEEPASS_PASSWORD"),
    keyField: process.env.KEEPASS_KEY_FIELD || DEFAULT_KEY_FIELD,
    secretField: process.env.KEEPASS_SECRET_FIELD || DEFAULT_SECRET_FIELD,
  } satisfies KeePassConfig,
  environment,
  baseUrl: T212_BASE_URLS[environment],
  accountCurrency: parseCurrency(process.env.ACCOUNT_CURRENCY || DEFAULT_ACCOUNT_CURRENCY),
  timeZone: parseTimeZone(process.env.EXPORT_TIMEZONE || DEFAULT_EXPORT_TIMEZONE),
  outputFile: process.env.OUTPUT_FILE || DEFAULT_OUTPUT_FILE,
} as const;
