import type { Encoding } from "node:crypto";
import { TextDecoder, TextEncoder } from "node:util";

/**
 * Byte strings are rendered as UTF-8 text
 */
export const encoding = "utf-8" as const satisfies Encoding;

/**
 * Exports TextEncoder and TextDecoder instances for UTF-8 encoding.
 */
export const encoder = new TextEncoder();
export const decoder = new TextDecoder(encoding);
