export { isString, hasMessage, hasStringField } from "./type-guards";
export { parseJsonWith } from "./parse";
export { type Result, Ok, Err } from "./result";
