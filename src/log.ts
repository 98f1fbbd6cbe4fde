import { debuglog } from "node:util";

/**
 * Enabled with `NODE_DEBUG=bencode`.
 */
export const log = debuglog("bencode");
