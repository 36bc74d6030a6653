import assert from "node:assert/strict";
import test from "node:test";
import { closeDb, openDb } from "./connection";
import type { SyncMapping } from "../types/job";
import {
  InMemoryJobRepository,
  InMemorySyncMappingRepository,
  SqliteJobRepository,
  SqliteSyncMappingRepository,
  type SyncMappingRepository,
} from "./repositories";

test("sync mappings round-trip and are replaced on save", async () => {
  const handles = openDb(":memory:");
  try {
    const repo = new SqliteSyncMappingRepository(handles.orm);
    assert.equal(await repo.find("fixture-shop", "TJ-100"), null);

    await repo.save({
      siteId: "fixture-shop",
      externalId: "TJ-100",
      remoteProductId: null,
      lastSyncStatus: "failed",
      lastSyncedAt: "2026-01-01T00:00:00.000Z",
      lastPayloadSnapshot: null,
      lastError: "HTTP 500",
    });
    await repo.save({
      siteId: "fixture-shop",
      externalId: "TJ-100",
      remoteProductId: 501,
      lastSyncStatus: "success",
      lastSyncedAt: "2026-01-02T00:00:00.000Z",
      lastPayloadSnapshot: '{"name":"Trail Jacket"}',
      lastError: null,
    });

    assert.deepEqual(await repo.find("fixture-shop", "TJ-100"), {
      siteId: "fixture-shop",
      externalId: "TJ-100",
      remoteProductId: 501,
      lastSyncStatus: "success",
      lastSyncedAt: "2026-01-02T00:00:00.000Z",
      lastPayloadSnapshot: '{"name":"Trail Jacket"}',
      lastError: null,
    });
    assert.equal(await repo.find("other-shop", "TJ-100"), null);
  } finally {
    closeDb(handles);
  }
});

test("scrape jobs start pending and take partial updates", async () => {
  const handles = openDb(":memory:");
  try {
    const repo = new SqliteJobRepository(handles.orm);
    const job = await repo.create("fixture-shop");
    assert.equal(job.status, "pending");
    assert.equal(job.totalFound, 0);

    await repo.update(job.id, { status: "running", startedAt: "2026-01-01T00:00:00.000Z" });
    const done = await repo.update(job.id, { status: "success", totalFound: 34, totalCreated: 30, totalFailed: 4 });

    assert.equal(done.status, "success");
    assert.equal(done.startedAt, "2026-01-01T00:00:00.000Z");
    assert.equal(done.totalCreated, 30);
    assert.deepEqual(await repo.get(job.id), done);

    const second = await repo.create("fixture-shop");
    assert.deepEqual(
      (await repo.recent("fixture-shop", 5)).map((j) => j.id),
      [second.id, job.id],
    );
  } finally {
    closeDb(handles);
  }
});

test("the in-memory job repository behaves like the sqlite one", async () => {
  const repo = new InMemoryJobRepository();
  const job = await repo.create("fixture-shop");
  await repo.update(job.id, { status: "failed", errorMessage: "boom" });

  const stored = await repo.get(job.id);
  assert.equal(stored?.status, "failed");
  assert.equal(stored?.errorMessage, "boom");
  await assert.rejects(repo.update(99, { status: "running" }), /Unknown scrape job 99/);
});

const mapping = (siteId: string, externalId: string, remoteProductId: number | null): SyncMapping => ({
  siteId,
  externalId,
  remoteProductId,
  lastSyncStatus: remoteProductId === null ? "failed" : "success",
  lastSyncedAt: "2026-01-01T00:00:00.000Z",
  lastPayloadSnapshot: null,
  lastError: null,
});

async function listsMappedRows(repo: SyncMappingRepository): Promise<void> {
  await repo.save(mapping("tommy", "B-2", 12));
  await repo.save(mapping("nike", "A-1", null));
  await repo.save(mapping("nike", "C-3", 11));
  await repo.save(mapping("lululemon", "D-4", 10));

  assert.deepEqual(
    (await repo.listMapped()).map((m) => [m.siteId, m.remoteProductId]),
    [
      ["lululemon", 10],
      ["nike", 11],
      ["tommy", 12],
    ],
  );
  assert.deepEqual(
    (await repo.listMapped(2)).map((m) => m.externalId),
    ["D-4", "C-3"],
  );
}

test("only mappings with a remote id are listed, in site order", async () => {
  const handles = openDb(":memory:");
  try {
    await listsMappedRows(new SqliteSyncMappingRepository(handles.orm));
  } finally {
    closeDb(handles);
  }
  await listsMappedRows(new InMemorySyncMappingRepository());
});
