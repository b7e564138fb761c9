import { v4 as uuidv4 } from "uuid";

export const generateCorrelationId = (): string => {
  return `req-${uuidv4()}`;
};

const pad = (value: number, length = 2): string =>
  String(value).padStart(length, "0");

/**
 * `ORD` + UTC `yyyyMMddHHmmss` + six hex characters of a random uuid,
 * e.g. `ORD20261018143055A1B2C3`. Uniqueness is enforced by the store.
 */
export const generateOrderNumber = (at: Date = new Date()): string => {
  const timestamp =
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}` +
    `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  const suffix = uuidv4().replace(/-/g, "").slice(0, 6).toUpperCase();
  return `ORD${timestamp}${suffix}`;
};
