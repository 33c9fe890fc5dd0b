import test from "node:test";
import assert from "node:assert/strict";
import { BatchDecodeError, parseNdjson, parseRecordArray } from "../src/etl/decode.js";

test("parseNdjson reads one object per line and skips blank lines", () => {
  const content = ['{"id":"1","name":"A"}', "", "   ", '{"id":"2","name":"B"}', ""].join("\n");

  const records = parseNdjson(content);
  assert.deepEqual(records, [
    { id: "1", name: "A" },
    { id: "2", name: "B" }
  ]);
});

test("parseNdjson accepts CRLF line endings", () => {
  const records = parseNdjson('{"id":"1"}\r\n{"id":"2"}\r\n');
  assert.equal(records.length, 2);
});

test("parseNdjson rejects a malformed line with its line number", () => {
  assert.throws(
    () => parseNdjson('{"id":"1"}\n{"id":\n'),
    (error: unknown) =>
      error instanceof BatchDecodeError &&
      error.statusCode === 400 &&
      error.code === "batch_decode_error" &&
      error.message.startsWith("Line 2 is not valid JSON")
  );
});

test("parseNdjson rejects lines that are not objects", () => {
  assert.throws(() => parseNdjson('{"id":"1"}\n[1,2]'), { message: "Line 2 is not a JSON object" });
  assert.throws(() => parseNdjson("42"), { message: "Line 1 is not a JSON object" });
});

test("parseNdjson returns an empty batch for empty content", () => {
  assert.deepEqual(parseNdjson(""), []);
});

test("parseRecordArray accepts an array of objects", () => {
  assert.deepEqual(parseRecordArray([{ id: "1" }, {}]), [{ id: "1" }, {}]);
});

test("parseRecordArray rejects non-arrays and non-object items", () => {
  assert.throws(() => parseRecordArray({ id: "1" }), { message: "Expected a JSON array of records" });
  assert.throws(() => parseRecordArray([{ id: "1" }, "nope"]), { message: "Item 1 is not a JSON object" });
  assert.throws(() => parseRecordArray([null]), BatchDecodeError);
});
