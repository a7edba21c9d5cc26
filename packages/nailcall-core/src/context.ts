// Ambient inputs for a command: working directory, environment, separators.

import path from "node:path";

export type EnvTable = Readonly<Record<string, string | undefined>>;

/** Read-only view of the calling process, sampled at execution time. */
export interface ExecutionContext {
  cwd(): string;
  env(): EnvTable;
  readonly fileSeparator: string;
  readonly pathSeparator: string;
}

/** The current Node.js process. */
export const processContext: ExecutionContext = {
  cwd: () => process.cwd(),
  env: () => process.env,
  fileSeparator: path.sep,
  pathSeparator: path.delimiter,
};
