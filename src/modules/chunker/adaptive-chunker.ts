/**
 * AdaptiveChunker: splits large text inputs into line-aligned chunks whose
 * size follows live memory feedback from the ResourceMonitor.
 *
 * Boundary rules (shared by the batch and streaming paths):
 *  - a chunk ends at the first line end at or after `start + size`, or at
 *    the end of input;
 *  - the next chunk starts at the first line start at or after
 *    `end - min(overlap, chunkLength)`, strictly after the previous start;
 *  - so every chunk starts and ends on a line boundary, and
 *    `reassembleChunks()` reproduces the input exactly.
 */

import { createReadStream } from 'node:fs'
import { StringDecoder } from 'node:string_decoder'
import { ConfigError } from '../../core/errors.js'
import type { ResourceMonitor } from '../resource-monitor/resource-monitor.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('chunker')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ChunkerOptions {
  initialChunkSize: number
  minChunkSize: number
  maxChunkSize: number
  /** Characters shared with the previous chunk; must be below minChunkSize */
  overlap: number
  /** Shrink multiplier in (0, 1); growth divides by the same factor */
  adjustmentFactor: number
  /** Memory usage percentage the chunker tries to stay under */
  targetMemoryPercent: number
}

export interface Chunk {
  index: number
  content: string
  /** Offset of the first character in the original input */
  start: number
  /** Offset one past the last character in the original input */
  end: number
  /** Leading characters repeated from the previous chunk */
  overlap: number
  /** Chunk size in effect when this chunk was cut */
  targetSize: number
}

// ---------------------------------------------------------------------------
// Boundary helpers
// ---------------------------------------------------------------------------

/**
 * End offset for a chunk starting at `start`, or null when the text does not
 * yet contain a line end past the target and more input may arrive.
 */
export function findChunkEnd(text: string, start: number, size: number, final: boolean): number | null {
  const target = start + size
  const newline = text.indexOf('\n', Math.max(start, target - 1))
  if (newline !== -1) return newline + 1
  return final ? text.length : null
}

/** Start offset of the chunk following `[start, end)` */
export function findNextStart(text: string, start: number, end: number, overlap: number): number {
  const overlapLength = Math.min(overlap, end - start)
  if (overlapLength <= 0) return end

  const lower = Math.max(end - overlapLength, start + 1)
  if (lower >= end) return end
  if (text[lower - 1] === '\n') return lower

  const newline = text.indexOf('\n', lower)
  if (newline === -1 || newline + 1 > end) return end
  return newline + 1
}

/** Concatenate chunk contents after removing each declared overlap */
export function reassembleChunks(chunks: readonly Chunk[]): string {
  return chunks.map((c) => c.content.slice(c.overlap)).join('')
}

// ---------------------------------------------------------------------------
// AdaptiveChunker
// ---------------------------------------------------------------------------

export class AdaptiveChunker {
  private readonly _options: ChunkerOptions
  private readonly _monitor: ResourceMonitor
  private _currentSize: number

  constructor(monitor: ResourceMonitor, options: ChunkerOptions) {
    validateChunkerOptions(options)
    this._monitor = monitor
    this._options = { ...options }
    this._currentSize = options.initialChunkSize
  }

  /** Size used by the most recent calculation */
  get currentSize(): number {
    return this._currentSize
  }

  /**
   * Recompute the chunk size from current memory usage. Stateful: each call
   * adjusts the size remembered from the previous call.
   */
  calculateChunkSize(): number {
    this._monitor.update()
    const usage = this._monitor.memoryPercentage()
    const { targetMemoryPercent, adjustmentFactor, minChunkSize, maxChunkSize } = this._options
    const previous = this._currentSize

    if (usage > targetMemoryPercent) {
      this._currentSize = Math.max(minChunkSize, Math.floor(previous * adjustmentFactor))
    } else if (usage < targetMemoryPercent / 2) {
      this._currentSize = Math.min(maxChunkSize, Math.floor(previous / adjustmentFactor))
    }

    if (this._currentSize !== previous) {
      logger.debug({ usage, from: previous, to: this._currentSize }, 'Chunk size adjusted')
    }
    return this._currentSize
  }

  /** Split `content` with a single size calculation */
  chunk(content: string): Chunk[] {
    const size = this.calculateChunkSize()
    const chunks: Chunk[] = []
    let start = 0
    let previousEnd = 0

    for (;;) {
      const end = findChunkEnd(content, start, size, true) ?? content.length
      chunks.push({
        index: chunks.length,
        content: content.slice(start, end),
        start,
        end,
        overlap: chunks.length === 0 ? 0 : previousEnd - start,
        targetSize: size,
      })
      if (end >= content.length) break
      previousEnd = end
      start = findNextStart(content, start, end, this._options.overlap)
    }

    logger.debug({ length: content.length, chunks: chunks.length, size }, 'Content chunked')
    return chunks
  }

  /**
   * Streaming variant of chunk(). Only the text from the pending chunk's
   * start onward is buffered; the size is recalculated after every flush.
   */
  async *chunkStream(source: AsyncIterable<string | Buffer>): AsyncGenerator<Chunk> {
    const decoder = new StringDecoder('utf8')
    let buffer = ''
    /** Absolute offset of buffer[0]; always the pending chunk's start */
    let bufferOffset = 0
    let previousEnd = 0
    let index = 0
    let size = this.calculateChunkSize()

    const cut = (end: number): Chunk => {
      const chunk: Chunk = {
        index,
        content: buffer.slice(0, end),
        start: bufferOffset,
        end: bufferOffset + end,
        overlap: index === 0 ? 0 : previousEnd - bufferOffset,
        targetSize: size,
      }
      index++
      previousEnd = bufferOffset + end
      return chunk
    }

    const advance = (end: number): void => {
      const next = findNextStart(buffer, 0, end, this._options.overlap)
      buffer = buffer.slice(next)
      bufferOffset += next
      size = this.calculateChunkSize()
    }

    for await (const piece of source) {
      buffer += typeof piece === 'string' ? piece : decoder.write(piece)
      let end = findChunkEnd(buffer, 0, size, false)
      while (end !== null) {
        yield cut(end)
        advance(end)
        end = findChunkEnd(buffer, 0, size, false)
      }
    }

    buffer += decoder.end()
    // Remaining text: anything not yet emitted, or a single empty chunk
    while (index === 0 || bufferOffset + buffer.length > previousEnd) {
      const end = findChunkEnd(buffer, 0, size, true) ?? buffer.length
      yield cut(end)
      if (end >= buffer.length) break
      advance(end)
    }
  }

  /** Stream a UTF-8 file through chunkStream() */
  chunkFile(filePath: string): AsyncGenerator<Chunk> {
    const stream = createReadStream(filePath, { highWaterMark: this._options.maxChunkSize })
    return this.chunkStream(stream)
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export function validateChunkerOptions(options: ChunkerOptions): void {
  const { initialChunkSize, minChunkSize, maxChunkSize, overlap, adjustmentFactor } = options
  if (minChunkSize < 1) {
    throw new ConfigError('minChunkSize must be at least 1', { minChunkSize })
  }
  if (minChunkSize > maxChunkSize) {
    throw new ConfigError('minChunkSize must not exceed maxChunkSize', { minChunkSize, maxChunkSize })
  }
  if (initialChunkSize < minChunkSize || initialChunkSize > maxChunkSize) {
    throw new ConfigError('initialChunkSize must lie within [minChunkSize, maxChunkSize]', {
      initialChunkSize,
      minChunkSize,
      maxChunkSize,
    })
  }
  if (overlap < 0 || overlap >= minChunkSize) {
    throw new ConfigError('overlap must be non-negative and below minChunkSize', { overlap, minChunkSize })
  }
  if (!(adjustmentFactor > 0 && adjustmentFactor < 1)) {
    throw new ConfigError('adjustmentFactor must lie strictly between 0 and 1', { adjustmentFactor })
  }
}
