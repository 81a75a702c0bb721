import assert from "node:assert/strict";
import test from "node:test";
import { capture, isWorkflowError, LedgerError, PublishError, SecretError } from "../errors.js";
import { serializeError } from "../logging.js";

const asLedger = (message: string, cause: unknown) => new LedgerError(message, undefined, { cause });

test("capture returns the value of a successful step", async () => {
  const result = await capture(async () => 42, asLedger);
  assert.deepEqual(result, { ok: true, value: 42 });
});

test("capture keeps workflow errors as they are", async () => {
  const original = new PublishError("Failed to commit app.py: boom", { failedPath: "app.py" });
  const result = await capture(async () => {
    throw original;
  }, asLedger);

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error, original);
    assert.equal(result.error.kind, "publish");
    assert.deepEqual(result.error.details, { failedPath: "app.py" });
  }
});

test("capture wraps foreign errors into the step's kind", async () => {
  const cause = new Error("socket hang up");
  const result = await capture(async () => {
    throw cause;
  }, asLedger);

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.ok(result.error instanceof LedgerError);
    assert.equal(result.error.kind, "ledger");
    assert.equal(result.error.message, "socket hang up");
    assert.equal(result.error.cause, cause);
  }

  const fromString = await capture(async () => {
    throw "plain failure";
  }, asLedger);
  assert.equal(fromString.ok ? "" : fromString.error.message, "plain failure");
});

test("workflow errors carry their class name and kind", () => {
  const error = new SecretError("Failed to provision secret HEROKU_API_KEY: denied");

  assert.equal(error.name, "SecretError");
  assert.equal(isWorkflowError(error), true);
  assert.equal(isWorkflowError(new Error("other")), false);

  const serialized = serializeError(error);
  assert.equal(serialized.message, "Failed to provision secret HEROKU_API_KEY: denied");
  assert.equal(serialized.kind, "secret");
});

test("serializeError handles non-error values", () => {
  assert.deepEqual(serializeError("just text"), { message: "just text" });
});
