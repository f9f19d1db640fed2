import type { OperationOutcome } from '@labelsync/core'
import { describe, expect, test, vi } from 'vitest'
import { createOutcome, createTestLogger } from '../../test/fixtures'
import type { OperationLogSink } from './sink'
import { OperationLogWriter } from './writer'

class MemorySink implements OperationLogSink {
  readonly entries: OperationOutcome[] = []
  append(outcome: OperationOutcome): void {
    this.entries.push(outcome)
  }
}

/** Sink whose first append waits until released */
function createBlockedSink() {
  const entries: OperationOutcome[] = []
  let release = () => {}
  const gate = new Promise<void>((resolve) => {
    release = resolve
  })
  const sink: OperationLogSink = {
    async append(outcome) {
      await gate
      entries.push(outcome)
    },
  }
  return { sink, entries, release }
}

describe('OperationLogWriter', () => {
  test('does not call the sink synchronously', async () => {
    const sink = new MemorySink()
    const writer = new OperationLogWriter(sink, createTestLogger())

    writer.append(createOutcome())
    expect(sink.entries).toHaveLength(0)

    await writer.flush()
    expect(sink.entries).toHaveLength(1)
  })

  test('writes outcomes in order', async () => {
    const sink = new MemorySink()
    const writer = new OperationLogWriter(sink, createTestLogger())
    const outcomes = [createOutcome(), createOutcome(), createOutcome()]

    for (const outcome of outcomes) writer.append(outcome)
    await writer.flush()

    expect(sink.entries).toEqual(outcomes)
    expect(writer.getStats()).toEqual({ pending: 0, written: 3, dropped: 0, failed: 0 })
  })

  test('drops the oldest pending entry when the queue is full', async () => {
    const { sink, entries, release } = createBlockedSink()
    const writer = new OperationLogWriter(sink, createTestLogger(), { capacity: 2 })
    const [first, second, third, fourth] = [
      createOutcome(),
      createOutcome(),
      createOutcome(),
      createOutcome(),
    ]

    writer.append(first)
    // first is taken by the drain task and blocks in the sink
    await Promise.resolve()
    await Promise.resolve()
    writer.append(second)
    writer.append(third)
    writer.append(fourth)

    expect(writer.getStats()).toMatchObject({ pending: 2, dropped: 1 })

    release()
    await writer.flush()

    expect(entries.map((o) => o.id)).toEqual([first.id, third.id, fourth.id])
  })

  test('counts sink failures without propagating them', async () => {
    const sink: OperationLogSink = {
      append: vi.fn(() => {
        throw new Error('disk full')
      }),
    }
    const writer = new OperationLogWriter(sink, createTestLogger())

    expect(() => writer.append(createOutcome())).not.toThrow()
    await writer.flush()

    expect(writer.getStats()).toMatchObject({ written: 0, failed: 1 })
  })

  test('keeps draining after a failed write', async () => {
    const entries: OperationOutcome[] = []
    let calls = 0
    const sink: OperationLogSink = {
      append(outcome) {
        calls++
        if (calls === 1) throw new Error('locked')
        entries.push(outcome)
      },
    }
    const writer = new OperationLogWriter(sink, createTestLogger())
    const second = createOutcome()

    writer.append(createOutcome())
    writer.append(second)
    await writer.flush()

    expect(entries).toEqual([second])
  })

  test('close drains the queue and refuses later entries', async () => {
    const sink = new MemorySink()
    const writer = new OperationLogWriter(sink, createTestLogger())

    writer.append(createOutcome())
    await writer.close()
    writer.append(createOutcome())
    await writer.flush()

    expect(sink.entries).toHaveLength(1)
    expect(writer.getStats().dropped).toBe(1)
  })
})
