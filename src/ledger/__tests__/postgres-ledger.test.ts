import assert from "node:assert/strict";
import test from "node:test";
import { InMemoryQueryable } from "../../__tests__/helpers/fake-postgres.js";
import { LedgerError } from "../../lib/errors.js";
import { DeploymentRecord } from "../../types.js";
import { PostgresLedger } from "../postgres-ledger.js";

function makeRecord(uniqueId: string, createdTime = "2026-01-02T03:04:05.000Z"): DeploymentRecord {
  return {
    uniqueId,
    prompt: "A habit tracker",
    repoName: "habit-app",
    status: "In Progress",
    pitchDeck: true,
    document: false,
    pitchDeckUrl: null,
    documentUrl: null,
    appUrl: null,
    createdTime
  };
}

function setup() {
  const pool = new InMemoryQueryable();
  return { pool, ledger: new PostgresLedger({ pool }) };
}

test("PostgresLedger creates its table on initialize", async () => {
  const { pool, ledger } = setup();
  await ledger.initialize();
  assert.deepEqual(pool.statements, ["CREATE TABLE"]);
});

test("PostgresLedger inserts rows as In Progress", async () => {
  const { ledger } = setup();

  const inserted = await ledger.insert({ ...makeRecord("rec-1"), status: "Done" });

  assert.deepEqual(inserted, makeRecord("rec-1"));
  assert.deepEqual(await ledger.findByUniqueId("rec-1"), makeRecord("rec-1"));
  assert.equal(await ledger.findByUniqueId("missing"), null);
});

test("PostgresLedger rejects a duplicate identifier", async () => {
  const { ledger } = setup();
  await ledger.insert(makeRecord("rec-1"));

  await assert.rejects(
    () => ledger.insert(makeRecord("rec-1")),
    (error: unknown) =>
      error instanceof LedgerError &&
      error.message === 'Ledger insert failed: duplicate key value violates unique constraint "deployment_records_pkey"'
  );
});

test("PostgresLedger status only moves forward", async () => {
  const { ledger } = setup();
  await ledger.insert(makeRecord("rec-1"));

  const done = await ledger.markDone("rec-1", { repoName: "habit-app-0a1b2c3d", appUrl: "https://habit.example.test" });
  assert.equal(done.status, "Done");
  assert.equal(done.repoName, "habit-app-0a1b2c3d");
  assert.equal(done.appUrl, "https://habit.example.test");

  const again = await ledger.markDone("rec-1", { appUrl: "https://other.example.test" });
  assert.equal(again.status, "Done");
  assert.equal(again.appUrl, "https://habit.example.test");

  const updated = await ledger.update("rec-1", { documentUrl: "https://docs.example.test/habit.pdf" });
  assert.equal(updated.status, "Done");
  assert.equal(updated.documentUrl, "https://docs.example.test/habit.pdf");
  assert.equal(updated.appUrl, "https://habit.example.test");
});

test("PostgresLedger reports unknown identifiers", async () => {
  const { ledger } = setup();

  await assert.rejects(
    () => ledger.markDone("missing-id"),
    (error: unknown) => error instanceof LedgerError && error.message === "No ledger row for missing-id."
  );
  await assert.rejects(() => ledger.update("missing-id", { appUrl: "https://x.example.test" }), LedgerError);
});

test("PostgresLedger lists every row oldest first", async () => {
  const { ledger } = setup();
  await ledger.insert(makeRecord("later", "2026-03-01T00:00:00.000Z"));
  await ledger.insert(makeRecord("earlier", "2026-02-01T00:00:00.000Z"));

  assert.deepEqual(
    (await ledger.listAll()).map((record) => record.uniqueId),
    ["earlier", "later"]
  );
});

test("PostgresLedger wraps driver failures and leaves injected pools open", async () => {
  const { pool, ledger } = setup();
  pool.failNext(new Error("connection terminated"));

  await assert.rejects(
    () => ledger.listAll(),
    (error: unknown) => error instanceof LedgerError && error.message === "Ledger scan failed: connection terminated"
  );

  await ledger.close();
  assert.equal(pool.ended, false);
});
