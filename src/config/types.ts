import type { z } from "zod";

import type {
  GreeterConfigSchema,
  InviteApiSchema,
  LogLevelSchema,
  MatrixAccountSchema,
} from "./schema.js";

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type GreeterConfig = DeepReadonly<z.output<typeof GreeterConfigSchema>>;
export type MatrixAccountConfig = DeepReadonly<z.output<typeof MatrixAccountSchema>>;
export type InviteApiConfig = DeepReadonly<z.output<typeof InviteApiSchema>>;
export type LogLevel = z.output<typeof LogLevelSchema>;
