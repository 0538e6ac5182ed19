import http from "http";
import type { LifecycleState } from "./core/lifecycle/lifecycleState";

export type BridgeStatus = {
  state: LifecycleState;
  version: string;
};

/**
 * Health endpoint: 200 while the bridge can still deliver records, 503 once it has stopped.
 */
export const createServer = (getStatus: () => BridgeStatus) => {
  return http.createServer((_req, res) => {
    const { state, version } = getStatus();
    const ok = state !== "stopped";
    res.writeHead(ok ? 200 : 503, { "content-type": "application/json" });
    res.end(JSON.stringify({ ok, state, version }));
  });
};
