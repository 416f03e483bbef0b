/**
 * Test helpers for Model implementations.
 */

import { Model, type StreamOptions } from '../models/model.js'
import type { ModelStreamEvent } from '../models/streaming.js'
import type { TranscriptEntry } from '../types/messages.js'

/**
 * Model whose stream is produced by a caller-supplied generator.
 */
export class TestModelProvider extends Model {
  private readonly _eventGenerator: (
    transcript: TranscriptEntry[],
    options?: StreamOptions
  ) => AsyncGenerator<ModelStreamEvent>

  constructor(
    eventGenerator: (transcript: TranscriptEntry[], options?: StreamOptions) => AsyncGenerator<ModelStreamEvent>
  ) {
    super()
    this._eventGenerator = eventGenerator
  }

  stream(transcript: TranscriptEntry[], options?: StreamOptions): AsyncIterable<ModelStreamEvent> {
    return this._eventGenerator(transcript, options)
  }
}

/**
 * Drains a generator, returning the yielded items and the return value.
 */
export async function collectGenerator<T, R>(
  generator: AsyncGenerator<T, R, undefined>
): Promise<{ items: T[]; result: R }> {
  const items: T[] = []
  let next = await generator.next()
  while (!next.done) {
    items.push(next.value)
    next = await generator.next()
  }
  return { items, result: next.value }
}
