import type { FastifyReply } from "fastify";
import { type WikiFailure, statusCodeForFailure } from "../lib/errors.js";

export const WRITE_RATE_LIMIT = { rateLimit: { max: 30, timeWindow: "1 minute" } };
export const READ_RATE_LIMIT = { rateLimit: { max: 120, timeWindow: "1 minute" } };

export const asObject = (value: unknown): Record<string, unknown> => {
  if (!value || typeof value !== "object") return {};
  return { ...value };
};

export const readSingle = (value: unknown): string => {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value.length > 0) {
    return String(value[0] ?? "");
  }
  return "";
};

export const readMany = (value: unknown): string[] => {
  if (Array.isArray(value)) {
    return value.map((entry) => String(entry ?? "").trim()).filter((entry) => entry.length > 0);
  }
  if (typeof value === "string") {
    return value
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }
  return [];
};

export const readLimit = (value: unknown, fallback: number, max: number): number => {
  const requested = Number.parseInt(readSingle(value), 10);
  return Number.isFinite(requested) ? Math.min(Math.max(requested, 1), max) : fallback;
};

export const sendFailure = (reply: FastifyReply, failure: WikiFailure): FastifyReply =>
  reply.code(statusCodeForFailure(failure.code)).send({ ok: false, code: failure.code, error: failure.error });

export const createPageEtag = (updatedAt: string): string => `"${updatedAt}"`;

const normalizeWeakEtag = (value: string): string => value.trim().replace(/^W\//i, "");

export const ifNoneMatchMatches = (ifNoneMatchHeader: string | string[] | undefined, etag: string): boolean => {
  if (!ifNoneMatchHeader) return false;
  const value = Array.isArray(ifNoneMatchHeader) ? ifNoneMatchHeader.join(",") : ifNoneMatchHeader;
  const candidates = value.split(",").map((entry) => entry.trim());
  if (candidates.includes("*")) return true;
  const normalizedExpected = normalizeWeakEtag(etag);
  return candidates.some((entry) => normalizeWeakEtag(entry) === normalizedExpected);
};

/**
 * Turns an `If-Match` header into the timestamp the client last saw.
 * Returns undefined when the header is absent or `*`.
 */
export const readIfMatchTimestamp = (ifMatchHeader: string | string[] | undefined): string | undefined => {
  if (!ifMatchHeader) return undefined;
  const value = Array.isArray(ifMatchHeader) ? ifMatchHeader.join(",") : ifMatchHeader;
  const first = value.split(",")[0]?.trim() ?? "";
  if (!first || first === "*") return undefined;
  return normalizeWeakEtag(first).replace(/^"(.*)"$/, "$1");
};
