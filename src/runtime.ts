/**
 * Process boundary used by CLI commands. Tests pass their own.
 */
export type RuntimeEnv = {
  log: (msg: string) => void;
  error: (msg: string) => void;
  exit: (code: number) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (msg) => console.log(msg),
  error: (msg) => console.error(msg),
  exit: (code) => {
    process.exit(code);
  },
};
