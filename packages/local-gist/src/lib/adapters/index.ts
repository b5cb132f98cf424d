export { fsFileStore } from "./fs-file-store.js";
export { createLoggingObserver, combineObservers } from "./logging-observer.js";
