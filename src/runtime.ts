export type RuntimeEnv = {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  exit: (code: number) => never;
};

export const defaultRuntime: RuntimeEnv = {
  log: console.log,
  error: console.error,
  exit: (code: number): never => {
    process.exit(code);
  },
};
