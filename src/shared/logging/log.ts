export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogPayload = {
  event: string;
  [key: string]: unknown;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

/**
 * Writes one JSON line per event. Debug lines are dropped unless DEBUG is enabled.
 */
export const logEvent = (level: LogLevel, payload: LogPayload): void => {
  const line = JSON.stringify(payload);
  /* eslint-disable no-console */
  switch (level) {
    case "debug":
      if (isDebugMode()) console.debug(line);
      return;
    case "info":
      console.log(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
  }
  /* eslint-enable no-console */
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
