/**
 * Lua 5.4 binary chunk constants (as written by `luac` on a little-endian
 * host with 64-bit integers and doubles).
 */

export const LUA_SIGNATURE = new Uint8Array([0x1b, 0x4c, 0x75, 0x61]); // "\x1bLua"
export const LUAC_VERSION = 0x54;
export const LUAC_FORMAT = 0;
export const LUAC_DATA = new Uint8Array([0x19, 0x93, 0x0d, 0x0a, 0x1a, 0x0a]); // "\x19\x93\r\n\x1a\n"

export const INSTRUCTION_SIZE = 4;
export const INTEGER_SIZE = 8;
export const NUMBER_SIZE = 8;

/** Written as a lua_Integer to detect byte order */
export const LUAC_INT = 0x5678n;
/** Written as a lua_Number to detect float format */
export const LUAC_NUM = 370.5;

/** Constant tags (variant type codes) */
export const CONSTANT_TAG = {
  NIL: 0x00,
  FALSE: 0x01,
  TRUE: 0x11,
  INTEGER: 0x03,
  FLOAT: 0x13,
  SHORT_STRING: 0x04,
  LONG_STRING: 0x14,
} as const;

/** Strings up to this length are written with the short-string tag */
export const MAX_SHORT_STRING = 40;
