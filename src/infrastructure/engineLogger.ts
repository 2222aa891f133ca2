/**
 * What the extraction engine logs through. Any pino logger satisfies it; the engine defaults to
 * `noopLogger` so it stays silent unless a caller opts in.
 */
export type EngineLogger = {
  debug: (obj: object, msg?: string) => void;
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
};

export const noopLogger: EngineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
