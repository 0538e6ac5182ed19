import type { Server } from "http";
import { runBridge, type BridgeRunSummary } from "../application/run-bridge/runBridge.usecase";
import { SourceTask } from "../application/source-task/sourceTask";
import { MongoRecordSink } from "../infrastructure/mongo/MongoRecordSink";
import { createZeebeOriginClient } from "../infrastructure/zeebe/ZeebeOriginClient";
import { createServer } from "../server";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

// Resolves once the port is bound; a bind failure (EADDRINUSE, EACCES) rejects instead of crashing the process.
const listen = (server: Server, port: number): Promise<void> =>
  new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("listening", onListening);
      reject(err);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port);
  });

const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve) => {
    server.close(() => resolve());
  });

export const runBridgeProcess = async (): Promise<BridgeRunSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv(env);

  const task = new SourceTask(createZeebeOriginClient);
  const sink = new MongoRecordSink(env.MONGO_URI, env.MONGO_DB_NAME);

  // SIGINT/SIGTERM request a stop; the loop keeps polling until the task has released everything.
  const shutdown = new AbortController();
  const onSignal = () => shutdown.abort();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  let server: Server | undefined;
  try {
    if (runtime.healthPort != null) {
      server = createServer(() => ({ state: task.state, version: task.version() }));
      await listen(server, runtime.healthPort);
    }

    await task.start(runtime.sourceProps);
    return await runBridge({ task, sink, config: runtime.runConfig, signal: shutdown.signal });
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await sink.close();
    if (server) await closeServer(server);
  }
};
