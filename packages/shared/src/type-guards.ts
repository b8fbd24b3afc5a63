// shared/type-guards.ts — Runtime type guards for values thrown by the SDK or read from disk

export function isString(val: unknown): val is string {
  return typeof val === "string";
}

export function hasMessage(err: unknown): err is {
  message: string;
} {
  return err !== null && typeof err === "object" && "message" in err && typeof err.message === "string";
}

/** Narrow to an object carrying a string-valued `field` (e.g. `Code` on EC2 service exceptions). */
export function hasStringField<K extends string>(
  val: unknown,
  field: K,
): val is {
  [P in K]: string;
} {
  return val !== null && typeof val === "object" && field in val && isString(Reflect.get(val, field));
}

