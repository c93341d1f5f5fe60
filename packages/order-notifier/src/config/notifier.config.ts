import { registerAs } from "@nestjs/config";
import { ConfigurationError } from "../errors";

/**
 * MoySklad credential, picked once when configuration loads.
 *
 * `bearer` comes from MS_TOKEN, `basic` from MS_BASIC_TOKEN (already
 * base64-encoded `login:password`).
 */
export type MoyskladCredential =
  | { readonly kind: "bearer"; readonly token: string }
  | { readonly kind: "basic"; readonly token: string };

export interface NotifierConfig {
  readonly port: number;
  readonly httpTimeoutMs: number;
  readonly moysklad: {
    /** Base of every entity href the notifier will request */
    readonly apiUrl: string;
    readonly credential: MoyskladCredential;
  };
  readonly telegram: {
    readonly apiUrl: string;
    readonly botToken: string;
    readonly chatId: string;
  };
}

export const DEFAULT_MOYSKLAD_API_URL = "https://api.moysklad.ru/api/remap/1.2";
export const DEFAULT_TELEGRAM_API_URL = "https://api.telegram.org";

function readVariable(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function parseInteger(
  name: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const raw = readVariable(name);
  if (raw === undefined) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(
      `${name} must be an integer between ${min} and ${max}`,
      [name],
    );
  }
  return value;
}

function parseBaseUrl(name: string, fallback: string): string {
  const value = (readVariable(name) ?? fallback).replace(/\/+$/, "");
  const invalid = new ConfigurationError(`${name} must be an http(s) URL`, [
    name,
  ]);
  let protocol: string;
  try {
    protocol = new URL(value).protocol;
  } catch {
    throw invalid;
  }
  if (protocol !== "http:" && protocol !== "https:") {
    throw invalid;
  }
  return value;
}

function resolveCredential(): MoyskladCredential {
  const token = readVariable("MS_TOKEN");
  const basicToken = readVariable("MS_BASIC_TOKEN");

  if (token && basicToken) {
    throw new ConfigurationError(
      "MS_TOKEN and MS_BASIC_TOKEN are mutually exclusive, set only one",
      ["MS_TOKEN", "MS_BASIC_TOKEN"],
    );
  }
  if (token) {
    return { kind: "bearer", token };
  }
  if (basicToken) {
    return { kind: "basic", token: basicToken };
  }

  throw new ConfigurationError(
    "Missing MoySklad credentials: set MS_TOKEN or MS_BASIC_TOKEN",
    ["MS_TOKEN", "MS_BASIC_TOKEN"],
  );
}

export function loadNotifierConfig(): NotifierConfig {
  const credential = resolveCredential();
  const botToken = readVariable("TG_BOT_TOKEN");
  const chatId = readVariable("TG_CHAT_ID");

  if (!botToken || !chatId) {
    const missing = [
      ...(botToken ? [] : ["TG_BOT_TOKEN"]),
      ...(chatId ? [] : ["TG_CHAT_ID"]),
    ];
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(", ")}`,
      missing,
    );
  }

  const moyskladApiUrl = parseBaseUrl("MS_API_URL", DEFAULT_MOYSKLAD_API_URL);
  const apiUrl = parseBaseUrl("TG_API_URL", DEFAULT_TELEGRAM_API_URL);

  return Object.freeze({
    port: parseInteger("PORT", 3000, 1, 65535),
    httpTimeoutMs: parseInteger("HTTP_TIMEOUT_MS", 5000, 1000, 30000),
    moysklad: Object.freeze({
      apiUrl: moyskladApiUrl,
      credential: Object.freeze(credential),
    }),
    telegram: Object.freeze({ apiUrl, botToken, chatId }),
  });
}

export default registerAs("notifier", loadNotifierConfig);
