export type { Chunk, ChunkerOptions } from './adaptive-chunker.js'
export {
  AdaptiveChunker,
  findChunkEnd,
  findNextStart,
  reassembleChunks,
  validateChunkerOptions,
} from './adaptive-chunker.js'
