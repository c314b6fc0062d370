import {toHex} from "./bytes.js";

/**
 * Format bytes as `0x1234…1234`
 * 4 bytes can represent 4294967296 values, so the chance of collision is low
 */
export function prettyBytes(root: Uint8Array | string): string {
  const str = typeof root === "string" ? root : toHex(root);
  return `${str.slice(0, 6)}…${str.slice(-4)}`;
}

/**
 * Truncate and format bytes as `0x123456789abcdef0`, the first 8 bytes.
 * Enough to tell validator keys apart in logs and metric labels
 */
export function truncBytes(root: Uint8Array | string): string {
  const str = typeof root === "string" ? root : toHex(root);
  return str.slice(0, 18);
}
