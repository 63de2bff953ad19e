import * as grpc from "@grpc/grpc-js";
import { loadHealthService, loadTrackerService } from "@runledger/sdk";
import { SqlQueryable } from "../db";
import { TaskTracker } from "../services/task-tracker";
import { HealthService, Pingable } from "./health.service";
import { TrackerServiceImpl } from "./tracker.service";

export interface GrpcDeps {
  tracker: TaskTracker;
  db: SqlQueryable;
  redis: Pingable;
}

export function createGrpcServer({ tracker, db, redis }: GrpcDeps): grpc.Server {
  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  const healthService = new HealthService(db, redis);
  server.addService(loadHealthService().service, {
    check: healthService.check.bind(healthService),
  });

  const trackerService = new TrackerServiceImpl(tracker);
  server.addService(loadTrackerService().service, {
    registerTask: trackerService.registerTask.bind(trackerService),
    updateTask: trackerService.updateTask.bind(trackerService),
    getTask: trackerService.getTask.bind(trackerService),
  });

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50051,
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`[runledger] grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
  return new Promise((resolve) => server.tryShutdown(() => resolve()));
}
