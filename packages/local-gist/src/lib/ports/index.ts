export type { GistObserver, PageFetchedEvent } from "./observer.js";
export type { FileStore } from "./file-store.js";
