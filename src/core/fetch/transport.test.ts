import assert from "node:assert/strict";
import test from "node:test";
import { TransientNetworkError } from "../errors";
import { classifyTransportError, errorCode, parseRetryAfter } from "./transport";

const TARGET = "https://shop.example.com/p/1";

function failure(code: string): Error {
  const cause = Object.assign(new Error("socket"), { code });
  return new TypeError("fetch failed", { cause });
}

test("errorCode follows the cause chain", () => {
  assert.equal(errorCode(failure("ECONNRESET")), "ECONNRESET");
  assert.equal(errorCode(new Error("plain")), null);
  assert.equal(errorCode("text"), null);
});

test("connection and certificate failures are transient", () => {
  for (const code of [
    "ECONNRESET",
    "UND_ERR_SOCKET",
    "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
    "CERT_HAS_EXPIRED",
    "SELF_SIGNED_CERT_IN_CHAIN",
    "ERR_TLS_CERT_ALTNAME_INVALID",
  ]) {
    const classified = classifyTransportError(failure(code), TARGET);
    assert.ok(classified instanceof TransientNetworkError, code);
    assert.equal(classified.message, `${code} fetching ${TARGET}`);
  }
});

test("timeouts are transient", () => {
  const abort = Object.assign(new Error("aborted"), { name: "AbortError" });
  const classified = classifyTransportError(abort, TARGET);
  assert.ok(classified instanceof TransientNetworkError);
  assert.equal(classified.message, `timeout fetching ${TARGET}`);
});

test("other failures pass through unchanged", () => {
  const error = failure("ERR_INVALID_URL");
  assert.equal(classifyTransportError(error, TARGET), error);
  assert.equal(classifyTransportError("boom", TARGET).message, "boom");
});

test("Retry-After accepts seconds and rejects garbage", () => {
  assert.equal(parseRetryAfter("30"), 30);
  assert.equal(parseRetryAfter("-4"), 0);
  assert.equal(parseRetryAfter(null), null);
  assert.equal(parseRetryAfter("soon"), null);
});
