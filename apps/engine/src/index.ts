import "dotenv/config";
import { v7 as uuid } from "uuid";
import { loadConfig } from "./config";
import { applySchema, createPool, createRedis } from "./db";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import { PgTaskConfigRepository } from "./repositories/config.repository";
import { PgExecutionRepository } from "./repositories/execution.repository";
import { LockManager, RedisLockStore } from "@runledger/sdk";
import {
  PeriodicJanitor,
  Reaper,
  Reconciler,
  RedisResultBackend,
  RetentionCleaner,
  TaskTracker,
} from "./services";

const TAG = "[runledger]";

const config = loadConfig();
const workerId = `worker-${uuid().slice(0, 8)}`;

// Wiring
const pool = createPool(config.databaseUrl);
const redis = createRedis(config.redisUrl);

pool.on("error", (err) => console.error(`${TAG} idle client error:`, err));

const store = new PgExecutionRepository(pool);
const overrides = new PgTaskConfigRepository(pool);
const locks = new LockManager(new RedisLockStore(redis), config.lockKeyPrefix);
const reconciler = new Reconciler(
  store,
  new RedisResultBackend(redis, config.resultKeyPrefix),
  config.reconciler.batchSize,
);
const tracker = new TaskTracker(store, reconciler);

const reaper = new Reaper(store, {
  timeoutSeconds: config.reaper.timeoutSeconds,
  batchSize: config.reaper.batchSize,
  overrides,
  reconciler,
});
const cleaner = new RetentionCleaner(store, {
  retentionDays: config.cleaner.retentionDays,
  onlyCompleted: config.cleaner.onlyCompleted,
  batchSize: config.cleaner.batchSize,
  overrides,
});

const janitorDefaults = { maxRetries: config.janitorMaxRetries, workerId };
const janitors: Pick<PeriodicJanitor<unknown>, "start" | "stop">[] = [];

if (config.reconciler.enabled) {
  janitors.push(new PeriodicJanitor(locks, store, {
    ...janitorDefaults,
    name: "runledger.reconcile",
    intervalMs: config.reconciler.intervalMs,
    lockTtlMs: config.reconciler.lockTtlSeconds * 1000,
    pass: () => reconciler.reconcileAll(),
  }));
}
if (config.reaper.enabled) {
  janitors.push(new PeriodicJanitor(locks, store, {
    ...janitorDefaults,
    name: "runledger.reap_stale",
    intervalMs: config.reaper.intervalMs,
    lockTtlMs: config.reaper.lockTtlSeconds * 1000,
    pass: () => reaper.reap(),
  }));
}
if (config.cleaner.enabled) {
  janitors.push(new PeriodicJanitor(locks, store, {
    ...janitorDefaults,
    name: "runledger.cleanup",
    intervalMs: config.cleaner.intervalMs,
    lockTtlMs: config.cleaner.lockTtlSeconds * 1000,
    pass: () => cleaner.cleanup(),
  }));
}

const grpcServer = createGrpcServer({ tracker, db: pool, redis });

async function main() {
  console.log(`${TAG} starting... (worker: ${workerId})`);

  // Health checks
  await pool.query("SELECT 1");
  console.log(`${TAG} postgres connected`);

  await redis.ping();
  console.log(`${TAG} redis connected`);

  await applySchema(pool);
  console.log(`${TAG} schema applied`);

  await startGrpcServer(grpcServer, config.port);

  for (const janitor of janitors) janitor.start();

  console.log(`${TAG} ready`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);

  await Promise.all(janitors.map((j) => j.stop()));
  await stopGrpcServer(grpcServer);

  await pool.end();
  await redis.quit();
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
