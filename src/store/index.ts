export { JsonFileFleetStore, matchesFilter } from './fleet-store.js';
export { FileLock, type FileLockOptions } from './file-lock.js';
export { KeyedMutex } from './keyed-mutex.js';
export { loadJsonFile, saveJsonFile } from './json-file.js';
