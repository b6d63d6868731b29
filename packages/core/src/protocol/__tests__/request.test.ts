import { assert, describe, test } from "@barline/testkit";
import { isBarlineError } from "../../errors.js";
import { MAX_REQUEST_ID, decodeRequest, encodeRequest, parseRequestId } from "../request.js";

describe("request codec", () => {
  test("encodes ids as four little-endian bytes", () => {
    assert.deepEqual([...encodeRequest(6)], [6, 0, 0, 0]);
    assert.deepEqual([...encodeRequest(0x01020304)], [4, 3, 2, 1]);
    assert.deepEqual([...encodeRequest(MAX_REQUEST_ID)], [255, 255, 255, 255]);
  });

  test("decodes the first four bytes and ignores the rest", () => {
    assert.equal(decodeRequest(new Uint8Array([4, 3, 2, 1, 9, 9])), 0x01020304);
    assert.equal(decodeRequest(encodeRequest(3)), 3);
  });

  test("decodes from a view with a non-zero offset", () => {
    const backing = new Uint8Array([0xaa, 2, 0, 0, 0]);
    assert.equal(decodeRequest(backing.subarray(1)), 2);
  });

  test("short payloads decode to null", () => {
    assert.equal(decodeRequest(new Uint8Array([1, 0, 0])), null);
    assert.equal(decodeRequest(new Uint8Array(0)), null);
  });

  test("rejects ids outside uint32", () => {
    for (const bad of [-1, 2 ** 32, 1.5, Number.NaN]) {
      assert.throws(
        () => encodeRequest(bad),
        (e: unknown) => isBarlineError(e, "BARLINE_INVALID_REQUEST"),
      );
    }
  });

  test("parses decimal command-line ids", () => {
    assert.equal(parseRequestId("0"), 0);
    assert.equal(parseRequestId("6"), 6);
    assert.equal(parseRequestId("4294967295"), MAX_REQUEST_ID);
  });

  test("rejects anything that is not a decimal uint32", () => {
    for (const bad of ["", "-1", "4294967296", "abc", "1e3", " 5", "0x10", "3.0"]) {
      assert.equal(parseRequestId(bad), null, `expected null for ${JSON.stringify(bad)}`);
    }
  });
});
