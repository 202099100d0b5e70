export { Persister } from "./Persister";
export type { PersisterOptions } from "./Persister";
export { IncompleteWriteError, PersistError } from "./errors";
