/**
 * Storage module exports
 */

export { QuillDatabase, type NewJob, type RunLock, type RunRecord } from './database.js';
export { ResultWriter, sidecarPathFor } from './result-writer.js';
