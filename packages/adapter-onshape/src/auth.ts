/**
 * HMAC-SHA256 request signing for the Onshape REST API.
 */

import { createHmac, randomInt } from "crypto";
import { ConfigurationError } from "@cadsync/core";

export const DEFAULT_BASE_URL = "https://cad.onshape.com";

const NONCE_CHARS = "abcdefghijklmnopqrstuvwxyz0123456789";
const NONCE_LENGTH = 25;

export interface OnshapeCredentials {
  accessKey: string;
  secretKey: string;
  /** No trailing slash */
  baseUrl: string;
}

/**
 * Inputs of one signature. `query` is the already sorted, encoded query string.
 */
export interface SignatureInput {
  method: string;
  path: string;
  query: string;
  nonce: string;
  date: string;
  contentType: string;
}

/**
 * Read credentials from the environment (ONSHAPE_ACCESS_KEY,
 * ONSHAPE_SECRET_KEY, ONSHAPE_BASE_URL). `baseUrl` applies when
 * ONSHAPE_BASE_URL is unset.
 * @throws ConfigurationError if either key is missing
 */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env, baseUrl?: string): OnshapeCredentials {
  const accessKey = env.ONSHAPE_ACCESS_KEY ?? "";
  const secretKey = env.ONSHAPE_SECRET_KEY ?? "";
  if (!accessKey || !secretKey) {
    throw new ConfigurationError(
      "Missing Onshape API credentials. Set ONSHAPE_ACCESS_KEY and ONSHAPE_SECRET_KEY environment variables."
    );
  }
  return {
    accessKey,
    secretKey,
    baseUrl: (env.ONSHAPE_BASE_URL || baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, ""),
  };
}

export function generateNonce(): string {
  let nonce = "";
  for (let i = 0; i < NONCE_LENGTH; i++) {
    nonce += NONCE_CHARS[randomInt(NONCE_CHARS.length)];
  }
  return nonce;
}

/**
 * RFC 7231 date, e.g. "Tue, 02 Jan 2024 03:04:05 GMT".
 */
export function formatHttpDate(date: Date): string {
  return date.toUTCString();
}

/**
 * Query string with keys sorted, as the signature expects.
 */
export function buildQueryString(params: { [key: string]: string } = {}): string {
  const sorted = Object.entries(params).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return new URLSearchParams(sorted).toString();
}

/**
 * Base64 HMAC-SHA256 over the lower-cased
 * `method\nnonce\ndate\ncontentType\npath\nquery\n`.
 */
export function computeSignature(secretKey: string, input: SignatureInput): string {
  const stringToSign = [
    input.method,
    input.nonce,
    input.date,
    input.contentType,
    input.path,
    input.query,
    "",
  ]
    .join("\n")
    .toLowerCase();
  return createHmac("sha256", secretKey).update(stringToSign, "utf8").digest("base64");
}

/**
 * Headers for one signed request.
 */
export function signedHeaders(
  credentials: OnshapeCredentials,
  input: SignatureInput
): { [header: string]: string } {
  const signature = computeSignature(credentials.secretKey, input);
  return {
    Authorization: `On ${credentials.accessKey}:HmacSHA256:${signature}`,
    Date: input.date,
    "On-Nonce": input.nonce,
    "Content-Type": input.contentType,
    Accept: "application/json",
  };
}
