export { FireStateStore, type FireStateMutator, type FireStateStoreOptions } from "./store.js";
export { SessionLock, type LockRecord, type SessionLockOptions } from "./lock.js";
export { StopRequestFile, type StopRequest, type StopRequestFileOptions } from "./stop-request.js";
