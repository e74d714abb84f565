/**
 * Raw terminal input -> key codes.
 *
 * Without keypad mode every input byte is its own key code. With keypad mode
 * the escape sequences xterm-compatible terminals send for cursor and
 * function keys decode to the curses key numbers below; anything unrecognised
 * falls back to one code per byte.
 */

import type { KeyCode } from "@termloop/core";

export const KEY_DOWN = 258;
export const KEY_UP = 259;
export const KEY_LEFT = 260;
export const KEY_RIGHT = 261;
export const KEY_HOME = 262;
/** KEY_F(n) = KEY_F0 + n, for n in 1..12. */
export const KEY_F0 = 264;
export const KEY_DC = 330;
export const KEY_IC = 331;
export const KEY_NPAGE = 338;
export const KEY_PPAGE = 339;
export const KEY_END = 360;

export function keyF(n: number): KeyCode {
  return KEY_F0 + n;
}

const ESC = "\x1b";

// Both CSI (ESC [) and SS3 (ESC O) forms; terminals pick one depending on
// whether application keypad mode is on.
const SEQUENCES: ReadonlyArray<readonly [string, KeyCode]> = [
  ["[A", KEY_UP],
  ["[B", KEY_DOWN],
  ["[C", KEY_RIGHT],
  ["[D", KEY_LEFT],
  ["[H", KEY_HOME],
  ["[F", KEY_END],
  ["OA", KEY_UP],
  ["OB", KEY_DOWN],
  ["OC", KEY_RIGHT],
  ["OD", KEY_LEFT],
  ["OH", KEY_HOME],
  ["OF", KEY_END],
  ["[1~", KEY_HOME],
  ["[7~", KEY_HOME],
  ["[4~", KEY_END],
  ["[8~", KEY_END],
  ["[2~", KEY_IC],
  ["[3~", KEY_DC],
  ["[5~", KEY_PPAGE],
  ["[6~", KEY_NPAGE],
  ["OP", keyF(1)],
  ["OQ", keyF(2)],
  ["OR", keyF(3)],
  ["OS", keyF(4)],
  ["[11~", keyF(1)],
  ["[12~", keyF(2)],
  ["[13~", keyF(3)],
  ["[14~", keyF(4)],
  ["[15~", keyF(5)],
  ["[17~", keyF(6)],
  ["[18~", keyF(7)],
  ["[19~", keyF(8)],
  ["[20~", keyF(9)],
  ["[21~", keyF(10)],
  ["[23~", keyF(11)],
  ["[24~", keyF(12)],
];

type SequenceTable = ReadonlyMap<string, KeyCode>;

const TABLE: SequenceTable = new Map(SEQUENCES.map(([seq, key]) => [`${ESC}${seq}`, key]));
const LONGEST = Math.max(...[...TABLE.keys()].map((seq) => seq.length));

function toBinaryString(chunk: Uint8Array | string): string {
  return typeof chunk === "string"
    ? Buffer.from(chunk, "utf8").toString("latin1")
    : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength).toString("latin1");
}

/**
 * Decode one input chunk. Sequences split across chunks are not reassembled.
 */
export function decodeKeys(chunk: Uint8Array | string, keypad: boolean): KeyCode[] {
  // latin1 maps each byte to one UTF-16 unit, so indices below are byte offsets.
  const bytes = toBinaryString(chunk);
  const out: KeyCode[] = [];
  let i = 0;
  while (i < bytes.length) {
    if (keypad && bytes.charCodeAt(i) === 0x1b) {
      let matched = 0;
      for (let len = Math.min(LONGEST, bytes.length - i); len >= 2; len--) {
        const key = TABLE.get(bytes.slice(i, i + len));
        if (key !== undefined) {
          out.push(key);
          matched = len;
          break;
        }
      }
      if (matched > 0) {
        i += matched;
        continue;
      }
    }
    out.push(bytes.charCodeAt(i));
    i++;
  }
  return out;
}
