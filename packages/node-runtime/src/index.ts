// packages/node-runtime/src/index.ts
export * from '../../core/src/index.js';
export { decodeContainer, type DecodeOptions, type DecodeResult } from './decodeContainer.js';
export { embedCover, canEmbedCover }           from './embedCover.js';
export { FileByteSource }                     from './FileByteSource.js';
export {
  writeFileAtomic,
  writeStreamAtomic,
  stageFile,
  stageStream,
  commitAll,
  discardAll,
  type StagedOutput,
} from './output.js';
export { WorkerPool }                         from './pool.js';
export {
  findContainers,
  planFromDirectory,
  planFromLists,
  planInPlace,
  readListFile,
  runBatch,
  writeListFiles,
  type BatchFailure,
  type BatchJob,
  type BatchOptions,
  type BatchSummary,
} from './batch.js';
