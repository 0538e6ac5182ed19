import { EventEmitter } from "events";

const createFakeHealthServer = (outcome: "listening" | "error") => {
  const emitter = new EventEmitter();
  return Object.assign(emitter, {
    listen: jest.fn((_port: number) => {
      process.nextTick(() => {
        if (outcome === "listening") emitter.emit("listening");
        else emitter.emit("error", Object.assign(new Error("listen EADDRINUSE: address already in use :::8081"), { code: "EADDRINUSE" }));
      });
    }),
    close: jest.fn((callback: () => void) => callback())
  });
};

describe("composition root", () => {
  const envSnapshot = { ...process.env };

  const mockDependencies = (runBridge: jest.Mock) => {
    const close = jest.fn().mockResolvedValue(undefined);
    const sink = { close };
    const start = jest.fn().mockResolvedValue(undefined);
    const task = { start, state: "running", version: () => "0.1.0" };
    const loadEnv = jest.fn().mockReturnValue({
      ZEEBE_GATEWAY_ADDRESS: "zeebe:26500",
      MONGO_URI: "mongodb://localhost:27017/job-bridge",
      MONGO_DB_NAME: "records"
    });
    const sinkCtor = jest.fn().mockImplementation(() => sink);
    const taskCtor = jest.fn().mockImplementation(() => task);
    const createZeebeOriginClient = jest.fn();

    jest.doMock("../../src/shared/config/env", () => ({ loadEnv }));
    jest.doMock("../../src/application/run-bridge/runBridge.usecase", () => ({ runBridge }));
    jest.doMock("../../src/application/source-task/sourceTask", () => ({ SourceTask: taskCtor }));
    jest.doMock("../../src/infrastructure/mongo/MongoRecordSink", () => ({ MongoRecordSink: sinkCtor }));
    jest.doMock("../../src/infrastructure/zeebe/ZeebeOriginClient", () => ({ createZeebeOriginClient }));

    return { close, sink, start, task, loadEnv, sinkCtor, taskCtor, createZeebeOriginClient };
  };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("wires dependencies and closes the sink after the run", async () => {
    process.env = { ...envSnapshot };
    for (const name of Object.keys(process.env)) {
      if (name.startsWith("BRIDGE_") || name === "ZEEBE_REQUEST_TIMEOUT_MS") delete process.env[name];
    }
    const summary = { batches: 1, records: 2, committed: 2, cancelledCommits: 0 };
    const runBridge = jest.fn().mockResolvedValue(summary);
    const deps = mockDependencies(runBridge);

    const { runBridgeProcess } = await import("../../src/composition/root");
    await expect(runBridgeProcess()).resolves.toEqual(summary);

    expect(deps.loadEnv).toHaveBeenCalledTimes(1);
    expect(deps.taskCtor).toHaveBeenCalledWith(deps.createZeebeOriginClient);
    expect(deps.sinkCtor).toHaveBeenCalledWith("mongodb://localhost:27017/job-bridge", "records");
    expect(deps.start).toHaveBeenCalledWith({ "zeebe.client.gateway.address": "zeebe:26500" });
    expect(runBridge).toHaveBeenCalledWith({
      task: deps.task,
      sink: deps.sink,
      config: { commitConcurrency: 10, idleDelayMs: 250 },
      signal: expect.any(AbortSignal)
    });
    expect(deps.close).toHaveBeenCalledTimes(1);
  });

  it("passes connector overrides from env to the task", async () => {
    process.env = {
      ...envSnapshot,
      BRIDGE_JOB_TYPES: "orders",
      BRIDGE_COMMIT_CONCURRENCY: "3"
    };
    const runBridge = jest.fn().mockResolvedValue({ batches: 0, records: 0, committed: 0, cancelledCommits: 0 });
    const deps = mockDependencies(runBridge);

    const { runBridgeProcess } = await import("../../src/composition/root");
    await runBridgeProcess();

    expect(deps.start).toHaveBeenCalledWith(expect.objectContaining({ "job.types": "orders" }));
    expect(runBridge).toHaveBeenCalledWith(expect.objectContaining({ config: expect.objectContaining({ commitConcurrency: 3 }) }));
  });

  it("aborts the run on SIGTERM", async () => {
    process.env = { ...envSnapshot };
    let seen: AbortSignal | undefined;
    const runBridge = jest.fn().mockImplementation(async ({ signal }: { signal: AbortSignal }) => {
      seen = signal;
      const listeners = process.listeners("SIGTERM");
      listeners[listeners.length - 1]?.("SIGTERM");
      return { batches: 0, records: 0, committed: 0, cancelledCommits: 0 };
    });
    mockDependencies(runBridge);

    const { runBridgeProcess } = await import("../../src/composition/root");
    await runBridgeProcess();

    expect(seen?.aborted).toBe(true);
  });

  it("closes the sink when the run fails", async () => {
    process.env = { ...envSnapshot };
    const runBridge = jest.fn().mockRejectedValue(new Error("sink down"));
    const deps = mockDependencies(runBridge);

    const { runBridgeProcess } = await import("../../src/composition/root");
    await expect(runBridgeProcess()).rejects.toThrow("sink down");
    expect(deps.close).toHaveBeenCalledTimes(1);
  });

  it("fails fast when runtime caps are violated", async () => {
    process.env = { ...envSnapshot, BRIDGE_COMMIT_CONCURRENCY: "999" };
    const runBridge = jest.fn();
    mockDependencies(runBridge);

    const { runBridgeProcess } = await import("../../src/composition/root");
    await expect(runBridgeProcess()).rejects.toThrow("BRIDGE_COMMIT_CONCURRENCY=999 is out of allowed range [1..50]");
    expect(runBridge).not.toHaveBeenCalled();
  });

  it("serves health once the port is bound and closes it after the run", async () => {
    process.env = { ...envSnapshot, BRIDGE_HEALTH_PORT: "8081" };
    const server = createFakeHealthServer("listening");
    jest.doMock("../../src/server", () => ({ createServer: jest.fn(() => server) }));
    const runBridge = jest.fn().mockResolvedValue({ batches: 0, records: 0, committed: 0, cancelledCommits: 0 });
    const deps = mockDependencies(runBridge);

    const { runBridgeProcess } = await import("../../src/composition/root");
    await runBridgeProcess();

    expect(server.listen).toHaveBeenCalledWith(8081);
    expect(deps.start).toHaveBeenCalledTimes(1);
    expect(server.close).toHaveBeenCalledTimes(1);
  });

  it("rejects before starting the task when the health port is taken", async () => {
    process.env = { ...envSnapshot, BRIDGE_HEALTH_PORT: "8081" };
    const server = createFakeHealthServer("error");
    jest.doMock("../../src/server", () => ({ createServer: jest.fn(() => server) }));
    const runBridge = jest.fn();
    const deps = mockDependencies(runBridge);

    const { runBridgeProcess } = await import("../../src/composition/root");
    await expect(runBridgeProcess()).rejects.toMatchObject({ code: "EADDRINUSE" });

    expect(deps.start).not.toHaveBeenCalled();
    expect(runBridge).not.toHaveBeenCalled();
    expect(deps.close).toHaveBeenCalledTimes(1);
    expect(server.close).toHaveBeenCalledTimes(1);
  });
});
