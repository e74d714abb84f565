import { assert, describe, test } from "@termloop/testkit";
import {
  KEY_DC,
  KEY_DOWN,
  KEY_END,
  KEY_HOME,
  KEY_IC,
  KEY_LEFT,
  KEY_NPAGE,
  KEY_PPAGE,
  KEY_RIGHT,
  KEY_UP,
  decodeKeys,
  keyF,
} from "../terminal/keyDecoder.js";

describe("decodeKeys", () => {
  test("without keypad every byte is a key", () => {
    assert.deepEqual(decodeKeys("a\x1b[A", false), [97, 27, 91, 65]);
  });

  test("multi-byte characters yield their UTF-8 bytes", () => {
    assert.deepEqual(decodeKeys("é", false), [0xc3, 0xa9]);
  });

  test("arrow keys in both CSI and SS3 form", () => {
    assert.deepEqual(decodeKeys("\x1b[A\x1b[B\x1b[C\x1b[D", true), [
      KEY_UP,
      KEY_DOWN,
      KEY_RIGHT,
      KEY_LEFT,
    ]);
    assert.deepEqual(decodeKeys("\x1bOA\x1bOD", true), [259, 260]);
  });

  test("editing and paging keys", () => {
    assert.deepEqual(decodeKeys("\x1b[H\x1b[F\x1b[2~\x1b[3~\x1b[5~\x1b[6~", true), [
      KEY_HOME,
      KEY_END,
      KEY_IC,
      KEY_DC,
      KEY_PPAGE,
      KEY_NPAGE,
    ]);
    assert.deepEqual([KEY_HOME, KEY_END, KEY_IC, KEY_DC], [262, 360, 331, 330]);
  });

  test("function keys F1 through F12", () => {
    assert.deepEqual(decodeKeys("\x1bOP\x1bOS\x1b[15~\x1b[21~\x1b[24~", true), [
      265, 268, 269, 274, 276,
    ]);
    assert.equal(keyF(12), 276);
  });

  test("unknown sequences and a lone escape fall back to bytes", () => {
    assert.deepEqual(decodeKeys("\x1b", true), [27]);
    assert.deepEqual(decodeKeys("\x1b[Z", true), [27, 91, 90]);
    assert.deepEqual(decodeKeys("\x1bx", true), [27, 120]);
  });

  test("accepts raw bytes", () => {
    assert.deepEqual(decodeKeys(Buffer.from([0x1b, 0x4f, 0x41, 0x71]), true), [KEY_UP, 113]);
  });
});
