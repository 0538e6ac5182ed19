import { OperationCancelledError } from "../../src/ports/OriginClient";
import { pause, raceWithAbort } from "../../src/shared/concurrency/abort";

describe("raceWithAbort", () => {
  it("passes the promise through without a signal", async () => {
    await expect(raceWithAbort(Promise.resolve(5), "complete")).resolves.toBe(5);
  });

  it("rejects immediately for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort("shutdown");

    const error = await raceWithAbort(Promise.resolve(5), "poll", controller.signal).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error).toMatchObject({ operation: "poll", message: "poll aborted", cause: "shutdown" });
  });

  it("keeps the original rejection when the work fails first", async () => {
    const controller = new AbortController();
    await expect(raceWithAbort(Promise.reject(new Error("down")), "complete", controller.signal)).rejects.toThrow(
      "down"
    );
  });

  it("rejects once the signal aborts while the work is pending", async () => {
    const controller = new AbortController();
    const pending = raceWithAbort(new Promise<number>(() => undefined), "complete", controller.signal);

    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: "OperationCancelledError", operation: "complete" });
  });
});

describe("pause", () => {
  it("resolves after the delay", async () => {
    const started = Date.now();
    await pause(20);
    expect(Date.now() - started).toBeGreaterThanOrEqual(15);
  });

  it("resolves early once the signal aborts", async () => {
    const controller = new AbortController();
    const pending = pause(60000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeUndefined();
  });

  it("resolves immediately for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(pause(60000, controller.signal)).resolves.toBeUndefined();
  });
});
